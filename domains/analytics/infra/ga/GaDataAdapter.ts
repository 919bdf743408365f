import { BetaAnalyticsDataClient, protos } from '@google-analytics/data';

import type { FieldDefinition, ReportFilter, ReportOrderBy } from '../../domain/entities/QueryResult';
import type {
  DataApiClient,
  MetricHeader,
  PropertyMetadata,
  RealtimeReportRequest,
  ReportRequest,
  ReportTable,
} from '../../application/ports/DataApiClient';
import { throwIfAborted, toExternalApiError } from './googleErrors';

type IFilterExpression = protos.google.analytics.data.v1beta.IFilterExpression;
type IFilter = protos.google.analytics.data.v1beta.IFilter;
type IOrderBy = protos.google.analytics.data.v1beta.IOrderBy;
type IRow = protos.google.analytics.data.v1beta.IRow;
type IMetricHeader = protos.google.analytics.data.v1beta.IMetricHeader;

export interface GaDataAdapterOptions {
  /** Path to the service account JSON key file */
  keyFilename: string;
  /** Per-call deadline passed to the gRPC client */
  timeoutMs: number;
}

/**
* Validates property ID format
* @throws Error if property ID is invalid
*/
function validatePropertyId(propertyId: string): string {
  // GA4 property IDs are numeric
  const trimmed = propertyId.trim();
  if (!/^\d+$/.test(trimmed)) {
  throw new Error('Property ID must be a numeric string');
  }
  return trimmed;
}

// ============================================================================
// Request builders
// ============================================================================

export function buildFilter(filter: ReportFilter): IFilter {
  const base: IFilter = { fieldName: filter.field };
  const values = Array.isArray(filter.value) ? filter.value : [filter.value];

  switch (filter.operator) {
  case 'EXACT':
  case 'CONTAINS':
  case 'BEGINS_WITH':
  case 'ENDS_WITH':
    return { ...base, stringFilter: { matchType: filter.operator, value: String(values[0] ?? '') } };
  case 'REGEXP':
    return { ...base, stringFilter: { matchType: 'FULL_REGEXP', value: String(values[0] ?? '') } };
  case 'GREATER_THAN':
  case 'LESS_THAN':
  case 'EQUAL':
    return { ...base, numericFilter: { operation: filter.operator, value: { doubleValue: Number(values[0]) } } };
  case 'IN_LIST':
    return { ...base, inListFilter: { values: values.map(String) } };
  }
}

function combine(filters: readonly ReportFilter[]): IFilterExpression | undefined {
  if (filters.length === 0) return undefined;
  const expressions = filters.map(filter => ({ filter: buildFilter(filter) }));
  return expressions.length === 1 ? expressions[0] : { andGroup: { expressions } };
}

/**
* Filters on a requested metric go to metricFilter, the rest to dimensionFilter
*/
export function buildFilterExpressions(
  filters: readonly ReportFilter[],
  metrics: readonly string[]
): { dimensionFilter?: IFilterExpression; metricFilter?: IFilterExpression } {
  const metricSet = new Set(metrics);
  const dimensionFilter = combine(filters.filter(f => !metricSet.has(f.field)));
  const metricFilter = combine(filters.filter(f => metricSet.has(f.field)));
  return {
  ...(dimensionFilter && { dimensionFilter }),
  ...(metricFilter && { metricFilter }),
  };
}

export function buildOrderBy(orderBy: ReportOrderBy, metrics: readonly string[]): IOrderBy {
  return metrics.includes(orderBy.field)
  ? { metric: { metricName: orderBy.field }, desc: orderBy.desc }
  : { dimension: { dimensionName: orderBy.field }, desc: orderBy.desc };
}

// ============================================================================
// Response readers
// ============================================================================

function metricType(header: IMetricHeader): string | undefined {
  const type = header.type;
  if (typeof type === 'string') return type;
  if (typeof type === 'number') return protos.google.analytics.data.v1beta.MetricType[type];
  return undefined;
}

function readRows(rows: readonly IRow[] | null | undefined): ReportTable['rows'] {
  return (rows ?? []).map(row => ({
  dimensionValues: (row.dimensionValues ?? []).map(v => v.value ?? ''),
  metricValues: (row.metricValues ?? []).map(v => v.value ?? ''),
  }));
}

interface ReportResponseLike {
  dimensionHeaders?: Array<{ name?: string | null }> | null;
  metricHeaders?: IMetricHeader[] | null;
  rows?: IRow[] | null;
  totals?: IRow[] | null;
  rowCount?: number | null;
}

export function toReportTable(response: ReportResponseLike): ReportTable {
  const metricHeaders: MetricHeader[] = (response.metricHeaders ?? []).map(header => ({
  name: header.name ?? '',
  type: metricType(header),
  }));
  const rows = readRows(response.rows);
  const totalsRow = response.totals?.[0];

  return {
  dimensionHeaders: (response.dimensionHeaders ?? []).map(header => header.name ?? ''),
  metricHeaders,
  rows,
  rowCount: response.rowCount ?? rows.length,
  totals: totalsRow ? (totalsRow.metricValues ?? []).map(v => v.value ?? '') : undefined,
  };
}

function toFieldDefinition(field: {
  apiName?: string | null;
  uiName?: string | null;
  description?: string | null;
  category?: string | null;
  customDefinition?: boolean | null;
}): FieldDefinition {
  return {
  apiName: field.apiName ?? '',
  uiName: field.uiName ?? field.apiName ?? '',
  description: field.description ?? '',
  category: field.category ?? undefined,
  custom: field.customDefinition ?? false,
  };
}

// ============================================================================
// Adapter
// ============================================================================

/**
* Google Analytics Data API Adapter
* @class GaDataAdapter
*/
export class GaDataAdapter implements DataApiClient {
  private readonly client: BetaAnalyticsDataClient;
  private readonly timeoutMs: number;

  /**
  * @param options - Key file and call deadline
  */
  constructor(options: GaDataAdapterOptions) {
  this.client = new BetaAnalyticsDataClient({ keyFilename: options.keyFilename });
  this.timeoutMs = options.timeoutMs;
  }

  async runReport(request: ReportRequest, signal?: AbortSignal): Promise<ReportTable> {
  const propertyId = validatePropertyId(request.propertyId);
  const operation = `Report for property ${propertyId}`;
  throwIfAborted(signal, operation);

  try {
    const [response] = await this.client.runReport({
    property: `properties/${propertyId}`,
    dateRanges: [{ startDate: request.dateRange.startDate, endDate: request.dateRange.endDate }],
    metrics: request.metrics.map(name => ({ name })),
    dimensions: request.dimensions.map(name => ({ name })),
    limit: request.limit,
    metricAggregations: [protos.google.analytics.data.v1beta.MetricAggregation.TOTAL],
    ...buildFilterExpressions(request.filters, request.metrics),
    ...(request.orderBy && { orderBys: [buildOrderBy(request.orderBy, request.metrics)] }),
    }, { timeout: this.timeoutMs });
    return toReportTable(response);
  } catch (error) {
    throw toExternalApiError(error, operation);
  }
  }

  async runRealtimeReport(request: RealtimeReportRequest, signal?: AbortSignal): Promise<ReportTable> {
  const propertyId = validatePropertyId(request.propertyId);
  const operation = `Realtime report for property ${propertyId}`;
  throwIfAborted(signal, operation);

  try {
    const [response] = await this.client.runRealtimeReport({
    property: `properties/${propertyId}`,
    metrics: request.metrics.map(name => ({ name })),
    dimensions: request.dimensions.map(name => ({ name })),
    limit: request.limit,
    metricAggregations: [protos.google.analytics.data.v1beta.MetricAggregation.TOTAL],
    }, { timeout: this.timeoutMs });
    return toReportTable(response);
  } catch (error) {
    throw toExternalApiError(error, operation);
  }
  }

  async getMetadata(propertyId: string, signal?: AbortSignal): Promise<PropertyMetadata> {
  const id = validatePropertyId(propertyId);
  const operation = `Metadata request for property ${id}`;
  throwIfAborted(signal, operation);

  try {
    const [metadata] = await this.client.getMetadata(
    { name: `properties/${id}/metadata` },
    { timeout: this.timeoutMs }
    );
    return {
    dimensions: (metadata.dimensions ?? []).map(toFieldDefinition),
    metrics: (metadata.metrics ?? []).map(toFieldDefinition),
    };
  } catch (error) {
    throw toExternalApiError(error, operation);
  }
  }

  /**
  * Close the client connection
  */
  async close(): Promise<void> {
  await this.client.close();
  }
}
