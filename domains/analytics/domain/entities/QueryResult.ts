import type { ErrorCode } from '@errors';

import type { DateRange } from '../dateExpressions';
import type { Property } from './Property';

// ============================================================================
// Property matching
// ============================================================================

/** How a reference was matched to a property */
export type MatchKind = 'exact_id' | 'alias' | 'exact_name' | 'fuzzy';

export interface MatchResult {
  property: Property;
  /** Score in [0, 1] */
  confidence: number;
  matchedOn: MatchKind;
}

/**
* Best match for a reference, flagged when another property ties its score
*/
export interface ResolvedMatch extends MatchResult {
  ambiguous: boolean;
  /** Other properties with the same confidence as the best match */
  alternatives: MatchResult[];
}

// ============================================================================
// Report requests
// ============================================================================

export const STRING_FILTER_OPERATORS = ['EXACT', 'CONTAINS', 'BEGINS_WITH', 'ENDS_WITH', 'REGEXP'] as const;
export const NUMERIC_FILTER_OPERATORS = ['GREATER_THAN', 'LESS_THAN', 'EQUAL'] as const;
export const FILTER_OPERATORS = [...STRING_FILTER_OPERATORS, ...NUMERIC_FILTER_OPERATORS, 'IN_LIST'] as const;

export type StringFilterOperator = typeof STRING_FILTER_OPERATORS[number];
export type NumericFilterOperator = typeof NUMERIC_FILTER_OPERATORS[number];
export type FilterOperator = typeof FILTER_OPERATORS[number];

export interface ReportFilter {
  field: string;
  operator: FilterOperator;
  value: string | number | Array<string | number>;
}

export interface ReportOrderBy {
  field: string;
  desc: boolean;
}

/**
* One logical query, applied to one or many properties
*/
export interface QuerySpec {
  metrics: string[];
  dimensions: string[];
  dateRange: DateRange;
  limit: number;
  filters: ReportFilter[];
  orderBy?: ReportOrderBy | undefined;
}

// ============================================================================
// Report results
// ============================================================================

/** Dimension values stay strings; metric values are numbers when numeric */
export type CellValue = string | number;
export type ReportRow = Record<string, CellValue>;

/** Where a property's totals came from */
export type TotalsSource = 'api' | 'rows';

/**
* Normalized Data API response for one property. This is what gets cached.
*/
export interface ReportSnapshot {
  propertyId: string;
  dimensions: string[];
  metrics: string[];
  rows: ReportRow[];
  /** Rows returned */
  rowCount: number;
  /** Rows the API reports as matching, before the limit */
  totalRows: number;
  /** Per-metric grand totals; only numeric metrics appear */
  totals: Record<string, number>;
  totalsSource: TotalsSource;
  /** Metrics with a non-numeric value somewhere in the rows */
  nonNumericMetrics: string[];
}

export interface QueryError {
  kind: ErrorCode;
  message: string;
  hint?: string | undefined;
}

export interface QueryResultOk extends ReportSnapshot {
  status: 'ok';
  /** Reference as the caller gave it */
  propertyRef: string;
  propertyName: string;
  match: ResolvedMatch;
}

export interface QueryResultError {
  status: 'error';
  propertyRef: string;
  propertyId?: string | undefined;
  propertyName?: string | undefined;
  rows: [];
  rowCount: 0;
  error: QueryError;
}

export type QueryResult = QueryResultOk | QueryResultError;

export function isQueryResultOk(result: QueryResult): result is QueryResultOk {
  return result.status === 'ok';
}

export interface MultiQuerySummary {
  requested: number;
  succeeded: number;
  failed: number;
  /** Sum per metric over successful results; metrics numeric everywhere only */
  totals: Record<string, number>;
  nonNumericMetrics: string[];
  /** Present when row-summed totals may under-report */
  caveat?: string | undefined;
}

export interface MultiQueryResult {
  results: QueryResult[];
  summary: MultiQuerySummary;
}

// ============================================================================
// Realtime and metadata
// ============================================================================

export interface RealtimeResult {
  propertyId: string;
  propertyName: string;
  match: ResolvedMatch;
  /** Window covered by GA4 realtime reports */
  lookbackMinutes: number;
  dimensions: string[];
  metrics: string[];
  rows: ReportRow[];
  rowCount: number;
  totals: Record<string, number>;
}

export interface FieldDefinition {
  apiName: string;
  uiName: string;
  description: string;
  category?: string | undefined;
  custom: boolean;
}

export interface PropertyFieldCatalog {
  propertyId: string;
  propertyName: string;
  dimensions: FieldDefinition[];
  metrics: FieldDefinition[];
  customDimensions: FieldDefinition[];
  customMetrics: FieldDefinition[];
}
