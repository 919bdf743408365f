/**
 * Test Mocks: Google Analytics clients
 *
 * In-process fakes of the Admin and Data API ports. Every method is a vi.fn,
 * so tests can count calls and swap in failures per property.
 */

import { vi } from 'vitest';

import type { AccessibleProperty, AdminApiClient } from '../../domains/analytics/application/ports/AdminApiClient';
import type {
  DataApiClient,
  PropertyMetadata,
  RealtimeReportRequest,
  ReportRequest,
  ReportTable,
} from '../../domains/analytics/application/ports/DataApiClient';

export function createMockAdminClient(properties: AccessibleProperty[] = []) {
  const client = {
    listAccessibleProperties: vi.fn(async (_signal?: AbortSignal) => properties.map(p => ({ ...p }))),
  };
  return client satisfies AdminApiClient;
}

/**
 * Table with one metric column per name; values are given per row.
 * Metric types are left unset unless given.
 */
export function createReportTable(
  metrics: string[],
  rows: Array<{ dimensions?: string[]; metrics: Array<string | number> }>,
  options: {
    dimensions?: string[];
    totals?: Array<string | number>;
    rowCount?: number;
    metricTypes?: string[];
  } = {}
): ReportTable {
  return {
    dimensionHeaders: options.dimensions ?? [],
    metricHeaders: metrics.map((name, i) => ({ name, type: options.metricTypes?.[i] })),
    rows: rows.map(row => ({
      dimensionValues: row.dimensions ?? [],
      metricValues: row.metrics.map(String),
    })),
    rowCount: options.rowCount ?? rows.length,
    ...(options.totals && { totals: options.totals.map(String) }),
  };
}

export interface MockDataClientOptions {
  /** Report per property id; unknown ids get an empty table */
  reports?: Record<string, ReportTable>;
  /** Failure per property id */
  failures?: Record<string, Error>;
  metadata?: PropertyMetadata;
  realtime?: ReportTable;
}

export function createMockDataClient(options: MockDataClientOptions = {}) {
  const failureFor = (propertyId: string): Error | undefined => options.failures?.[propertyId];

  const client = {
    runReport: vi.fn(async (request: ReportRequest, _signal?: AbortSignal): Promise<ReportTable> => {
      const failure = failureFor(request.propertyId);
      if (failure) throw failure;
      return options.reports?.[request.propertyId] ?? createReportTable(request.metrics, []);
    }),
    runRealtimeReport: vi.fn(async (request: RealtimeReportRequest, _signal?: AbortSignal): Promise<ReportTable> => {
      const failure = failureFor(request.propertyId);
      if (failure) throw failure;
      return options.realtime ?? createReportTable(request.metrics, []);
    }),
    getMetadata: vi.fn(async (propertyId: string, _signal?: AbortSignal): Promise<PropertyMetadata> => {
      const failure = failureFor(propertyId);
      if (failure) throw failure;
      return options.metadata ?? { dimensions: [], metrics: [] };
    }),
  };
  return client satisfies DataApiClient;
}
