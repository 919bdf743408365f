import type { DateRange } from '../../domain/dateExpressions';
import type { FieldDefinition, ReportFilter, ReportOrderBy } from '../../domain/entities/QueryResult';

export interface ReportRequest {
  propertyId: string;
  metrics: string[];
  dimensions: string[];
  dateRange: DateRange;
  limit: number;
  filters: ReportFilter[];
  orderBy?: ReportOrderBy | undefined;
}

export interface RealtimeReportRequest {
  propertyId: string;
  metrics: string[];
  dimensions: string[];
  limit: number;
}

export interface MetricHeader {
  name: string;
  /** GA4 metric type, e.g. TYPE_INTEGER */
  type?: string | undefined;
}

export interface ReportTableRow {
  dimensionValues: string[];
  metricValues: string[];
}

/**
* Tabular report as returned by the Data API, values still as text
*/
export interface ReportTable {
  dimensionHeaders: string[];
  metricHeaders: MetricHeader[];
  rows: ReportTableRow[];
  /** Total matching rows, independent of the limit */
  rowCount: number;
  /** Grand total metric values, in metricHeaders order, when the API supplied them */
  totals?: string[] | undefined;
}

export interface PropertyMetadata {
  dimensions: FieldDefinition[];
  metrics: FieldDefinition[];
}

/**
* Port for the GA4 Data API.
*
* @throws {ExternalApiError} AUTH_ERROR, NETWORK_ERROR, QUOTA_EXCEEDED,
*   INVALID_REQUEST or TIMEOUT_ERROR
*/
export interface DataApiClient {
  runReport(request: ReportRequest, signal?: AbortSignal): Promise<ReportTable>;

  /** Report over the last 30 minutes */
  runRealtimeReport(request: RealtimeReportRequest, signal?: AbortSignal): Promise<ReportTable>;

  /** Dimensions and metrics available on a property, custom ones included */
  getMetadata(propertyId: string, signal?: AbortSignal): Promise<PropertyMetadata>;
}
