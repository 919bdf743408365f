import type { CacheStatus } from '@cache';
import { ErrorCodes, type ToolErrorPayload } from '@errors';
import type { Property } from '@domain/analytics/domain/entities/Property';
import type {
  FieldDefinition,
  MatchResult,
  MultiQuerySummary,
  PropertyFieldCatalog,
  QueryError,
  QueryResult,
  RealtimeResult,
  ResolvedMatch,
} from '@domain/analytics/domain/entities/QueryResult';

// Tool outputs use snake_case keys; these turn domain objects into them.

function roundConfidence(confidence: number): number {
  return Math.round(confidence * 10000) / 10000;
}

export function presentProperty(property: Property) {
  return {
  property_id: property.id,
  display_name: property.displayName,
  resource_name: property.resourceName,
  account_id: property.accountId,
  ...(property.accountName !== undefined && { account_name: property.accountName }),
  ...(property.propertyType !== undefined && { property_type: property.propertyType }),
  };
}

export function presentMatch(match: MatchResult) {
  return {
  property_id: match.property.id,
  display_name: match.property.displayName,
  confidence: roundConfidence(match.confidence),
  matched_on: match.matchedOn,
  ...(match.property.accountName !== undefined && { account_name: match.property.accountName }),
  };
}

function presentResolvedMatch(match: ResolvedMatch) {
  return {
  matched_on: match.matchedOn,
  confidence: roundConfidence(match.confidence),
  ambiguous: match.ambiguous,
  ...(match.alternatives.length > 0 && { alternatives: match.alternatives.map(presentMatch) }),
  };
}

export function presentQueryError(error: QueryError): ToolErrorPayload {
  return {
  error_kind: error.kind,
  message: error.message,
  ...(error.hint !== undefined && { hint: error.hint }),
  };
}

export function presentQueryResult(result: QueryResult) {
  if (result.status === 'error') {
  return {
    status: result.status,
    property: result.propertyRef,
    ...(result.propertyId !== undefined && { property_id: result.propertyId }),
    ...(result.propertyName !== undefined && { property_name: result.propertyName }),
    rows: result.rows,
    row_count: result.rowCount,
    error: presentQueryError(result.error),
  };
  }

  return {
  status: result.status,
  property: result.propertyRef,
  property_id: result.propertyId,
  property_name: result.propertyName,
  match: presentResolvedMatch(result.match),
  dimensions: result.dimensions,
  metrics: result.metrics,
  rows: result.rows,
  row_count: result.rowCount,
  total_rows: result.totalRows,
  totals: result.totals,
  totals_source: result.totalsSource,
  ...(result.nonNumericMetrics.length > 0 && { non_numeric_metrics: result.nonNumericMetrics }),
  };
}

export function presentSummary(summary: MultiQuerySummary) {
  return {
  properties_queried: summary.requested,
  properties_successful: summary.succeeded,
  properties_failed: summary.failed,
  totals: summary.totals,
  non_numeric_metrics: summary.nonNumericMetrics,
  ...(summary.caveat !== undefined && { caveat: summary.caveat }),
  };
}

/**
* Warning attached to a result whose reference tied with other properties
*/
export function ambiguityWarning(reference: string, match: ResolvedMatch): ToolErrorPayload | undefined {
  if (!match.ambiguous) return undefined;
  const others = match.alternatives.map(alt => alt.property.label).join(', ');
  return {
  error_kind: ErrorCodes.AMBIGUOUS_PROPERTY,
  message: `'${reference}' also matches ${others}; using ${match.property.label}.`,
  hint: 'Pass the property id to pick a specific property.',
  };
}

export function presentRealtime(result: RealtimeResult) {
  return {
  property_id: result.propertyId,
  property_name: result.propertyName,
  match: presentResolvedMatch(result.match),
  lookback_minutes: result.lookbackMinutes,
  dimensions: result.dimensions,
  metrics: result.metrics,
  rows: result.rows,
  row_count: result.rowCount,
  totals: result.totals,
  };
}

function presentField(field: FieldDefinition) {
  return {
  api_name: field.apiName,
  ui_name: field.uiName,
  description: field.description,
  ...(field.category !== undefined && { category: field.category }),
  };
}

export function presentCatalog(catalog: PropertyFieldCatalog) {
  return {
  property_id: catalog.propertyId,
  property_name: catalog.propertyName,
  dimensions: catalog.dimensions.map(presentField),
  metrics: catalog.metrics.map(presentField),
  custom_dimensions: catalog.customDimensions.map(presentField),
  custom_metrics: catalog.customMetrics.map(presentField),
  total_dimensions: catalog.dimensions.length + catalog.customDimensions.length,
  total_metrics: catalog.metrics.length + catalog.customMetrics.length,
  };
}

export function presentCacheStatus(status: CacheStatus, maxEntries: number) {
  return {
  entry_count: status.entryCount,
  valid_count: status.validCount,
  expired_count: status.expiredCount,
  max_entries: maxEntries,
  entries: status.entries.map(entry => ({
    key: entry.key,
    age_ms: entry.ageMs,
    ttl_ms: entry.ttlMs,
    expired: entry.expired,
  })),
  };
}
