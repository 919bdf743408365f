import { createHash } from 'crypto';

import pLimit from 'p-limit';

import {
  AppError,
  ErrorCodes,
  PropertyNotFoundError,
  QueryFailedError,
} from '@errors';
import { getLogger } from '@kernel/logger';

import type { Property } from '../domain/entities/Property';
import {
  type FieldDefinition,
  isQueryResultOk,
  type MultiQueryResult,
  type MultiQuerySummary,
  type PropertyFieldCatalog,
  type QueryResult,
  type QueryResultError,
  type QuerySpec,
  type RealtimeResult,
  type ReportSnapshot,
  type ResolvedMatch,
} from '../domain/entities/QueryResult';
import { type AnalyticsCache, CacheKeys, loadCached } from './analyticsCache';
import { callExternal, describeError } from './externalCalls';
import type { DataApiClient } from './ports/DataApiClient';
import type { PropertySource } from './PropertyRegistry';
import type { PropertyResolver } from './PropertyResolver';
import { toReportSnapshot } from './reportNormalizer';

const logger = getLogger('analytics:query-orchestrator');

export const DEFAULT_REALTIME_METRICS: readonly string[] = ['activeUsers'];
export const DEFAULT_REALTIME_LIMIT = 100;
const REALTIME_LOOKBACK_MINUTES = 30;

// ============================================================================
// Type Definitions
// ============================================================================

export interface QueryOrchestratorOptions {
  /** TTL of cached report results */
  cacheTtlSeconds: number;
  /** TTL of cached property metadata */
  propertyCacheTtlSeconds: number;
  /** Maximum per-property queries in flight for one batch */
  queryConcurrency: number;
  /** Upper bound on one Data API call */
  apiTimeoutMs: number;
}

export interface RealtimeQuery {
  metrics?: string[] | undefined;
  dimensions?: string[] | undefined;
  limit?: number | undefined;
}

// ============================================================================
// Query Orchestrator
// ============================================================================

/**
* Runs report queries against one or many properties.
*
* Per-property failures (unresolved reference, Data API error, timeout) are
* returned as error results; only discovery failure and a batch in which no
* reference resolves fail the whole call.
*/
export class QueryOrchestrator {
  constructor(
  private readonly properties: PropertySource,
  private readonly resolver: PropertyResolver,
  private readonly dataApi: DataApiClient,
  private readonly cache: AnalyticsCache,
  private readonly options: QueryOrchestratorOptions
  ) {}

  /**
  * Query one property
  * @throws DiscoveryFailedError
  */
  async querySingle(propertyRef: string, spec: QuerySpec): Promise<QueryResult> {
  const properties = await this.properties.listProperties();
  return this.queryAgainst(properties, propertyRef, spec);
  }

  /**
  * Query many properties concurrently; results keep the input order
  * @throws DiscoveryFailedError
  * @throws PropertyNotFoundError when no reference resolves
  */
  async queryMultiple(propertyRefs: readonly string[], spec: QuerySpec): Promise<MultiQueryResult> {
  const properties = await this.properties.listProperties();
  const limit = pLimit(Math.max(1, this.options.queryConcurrency));

  const results = await Promise.all(
    propertyRefs.map(ref => limit(() => this.queryAgainst(properties, ref, spec)))
  );

  const nothingResolved = results.every(
    result => result.status === 'error' && result.error.kind === ErrorCodes.PROPERTY_NOT_FOUND
  );
  if (nothingResolved) {
    throw new PropertyNotFoundError(
    propertyRefs.join(', '),
    [],
    `None of the requested properties were found: ${propertyRefs.map(ref => `'${ref}'`).join(', ')}.`
    );
  }

  const summary = summarize(results, spec.metrics);
  logger.info('Multi-property query complete', {
    requested: summary.requested,
    succeeded: summary.succeeded,
    failed: summary.failed,
  });
  return { results, summary };
  }

  /**
  * Realtime report for one property (last 30 minutes). Never cached.
  * @throws PropertyNotFoundError
  * @throws QueryFailedError
  */
  async queryRealtime(propertyRef: string, query: RealtimeQuery = {}): Promise<RealtimeResult> {
  const match = await this.resolver.resolveRequired(propertyRef);
  const property = match.property;
  const metrics = query.metrics && query.metrics.length > 0 ? query.metrics : [...DEFAULT_REALTIME_METRICS];

  let snapshot: ReportSnapshot;
  try {
    const table = await callExternal(
    `Realtime report for ${property.label}`,
    this.options.apiTimeoutMs,
    signal => this.dataApi.runRealtimeReport({
      propertyId: property.id,
      metrics,
      dimensions: query.dimensions ?? [],
      limit: query.limit ?? DEFAULT_REALTIME_LIMIT,
    }, signal)
    );
    snapshot = toReportSnapshot(property.id, table);
  } catch (error) {
    throw this.queryFailure(property, error);
  }

  return {
    propertyId: property.id,
    propertyName: property.displayName,
    match,
    lookbackMinutes: REALTIME_LOOKBACK_MINUTES,
    dimensions: snapshot.dimensions,
    metrics: snapshot.metrics,
    rows: snapshot.rows,
    rowCount: snapshot.rowCount,
    totals: snapshot.totals,
  };
  }

  /**
  * Dimensions and metrics of one property, split into standard and custom
  * @throws PropertyNotFoundError
  * @throws QueryFailedError
  */
  async getPropertyMetadata(propertyRef: string): Promise<PropertyFieldCatalog> {
  const match = await this.resolver.resolveRequired(propertyRef);
  const property = match.property;

  let dimensions: FieldDefinition[];
  let metrics: FieldDefinition[];
  try {
    const entry = await loadCached(
    this.cache,
    CacheKeys.metadata(property.id),
    'metadata',
    this.options.propertyCacheTtlSeconds * 1000,
    async () => ({
      kind: 'metadata' as const,
      metadata: await callExternal(
      `Metadata request for ${property.label}`,
      this.options.apiTimeoutMs,
      signal => this.dataApi.getMetadata(property.id, signal)
      ),
    })
    );
    ({ dimensions, metrics } = entry.metadata);
  } catch (error) {
    throw this.queryFailure(property, error);
  }

  return {
    propertyId: property.id,
    propertyName: property.displayName,
    dimensions: dimensions.filter(field => !field.custom),
    metrics: metrics.filter(field => !field.custom),
    customDimensions: dimensions.filter(field => field.custom),
    customMetrics: metrics.filter(field => field.custom),
  };
  }

  private async queryAgainst(
  properties: readonly Property[],
  propertyRef: string,
  spec: QuerySpec
  ): Promise<QueryResult> {
  let match: ResolvedMatch;
  try {
    match = this.resolver.resolveRequiredAgainst(properties, propertyRef);
  } catch (error) {
    return errorResult(propertyRef, error);
  }

  const property = match.property;
  try {
    const snapshot = await this.loadReport(property, spec);
    return {
    status: 'ok',
    propertyRef,
    propertyName: property.displayName,
    match,
    ...snapshot,
    };
  } catch (error) {
    const failure = this.queryFailure(property, error);
    return errorResult(propertyRef, failure, property);
  }
  }

  private async loadReport(property: Property, spec: QuerySpec): Promise<ReportSnapshot> {
  const key = CacheKeys.report(property.id, fingerprint(spec));
  let loaded = false;

  const entry = await loadCached(
    this.cache,
    key,
    'report',
    this.options.cacheTtlSeconds * 1000,
    async () => {
    loaded = true;
    const table = await callExternal(
      `Report for ${property.label}`,
      this.options.apiTimeoutMs,
      signal => this.dataApi.runReport({
      propertyId: property.id,
      metrics: spec.metrics,
      dimensions: spec.dimensions,
      dateRange: spec.dateRange,
      limit: spec.limit,
      filters: spec.filters,
      orderBy: spec.orderBy,
      }, signal)
    );
    return { kind: 'report' as const, snapshot: toReportSnapshot(property.id, table) };
    }
  );

  logger.debug(loaded ? 'Report fetched' : 'Report served from cache', {
    propertyId: property.id,
    rowCount: entry.snapshot.rowCount,
  });
  return entry.snapshot;
  }

  private queryFailure(property: Property, error: unknown): QueryFailedError {
  logger.warn('Property query failed', { propertyId: property.id, reason: describeError(error) });
  return new QueryFailedError(property.label, error);
  }
}

// ============================================================================
// Helpers
// ============================================================================

function errorResult(propertyRef: string, error: unknown, property?: Property): QueryResultError {
  const appError = error instanceof AppError
  ? error
  : new AppError('Unexpected error while querying the property', ErrorCodes.INTERNAL_ERROR);
  return {
  status: 'error',
  propertyRef,
  propertyId: property?.id,
  propertyName: property?.displayName,
  rows: [],
  rowCount: 0,
  error: {
    kind: appError.code,
    message: appError.message,
    hint: appError.hint,
  },
  };
}

/**
* JSON with object keys sorted; array order is kept
*/
export function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) {
  return `[${value.map(item => canonicalJson(item)).join(',')}]`;
  }
  if (value !== null && typeof value === 'object') {
  const entries = Object.entries(value)
    .filter(([, v]) => v !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([k, v]) => `${JSON.stringify(k)}:${canonicalJson(v)}`);
  return `{${entries.join(',')}}`;
  }
  return JSON.stringify(value);
}

/**
* Stable digest of everything that shapes a report request
*/
export function fingerprint(spec: QuerySpec): string {
  const canonical = canonicalJson({
  metrics: spec.metrics,
  dimensions: spec.dimensions,
  dateRange: spec.dateRange,
  limit: spec.limit,
  filters: spec.filters,
  orderBy: spec.orderBy,
  });
  return createHash('sha256').update(canonical).digest('hex');
}

/**
* Batch summary: a metric is summed only when every successful result
* reports a numeric total for it
*/
export function summarize(results: readonly QueryResult[], metrics: readonly string[]): MultiQuerySummary {
  const succeeded = results.filter(isQueryResultOk);

  const nonNumericMetrics = metrics.filter(metric =>
  succeeded.some(result => result.totals[metric] === undefined)
  );

  const totals: Record<string, number> = {};
  for (const metric of metrics) {
  if (nonNumericMetrics.includes(metric)) continue;
  totals[metric] = succeeded.reduce((sum, result) => sum + (result.totals[metric] ?? 0), 0);
  }

  const truncated = succeeded.filter(
  result => result.totalsSource === 'rows' && result.rowCount < result.totalRows
  );
  const caveat = truncated.length > 0
  ? `Totals for ${truncated.map(r => `${r.propertyName} (${r.rowCount} of ${r.totalRows} rows)`).join(', ')} ` +
    'are summed from the returned rows only and under-report. Raise the limit or remove dimensions for exact totals.'
  : undefined;

  return {
  requested: results.length,
  succeeded: succeeded.length,
  failed: results.length - succeeded.length,
  totals,
  nonNumericMetrics,
  ...(caveat !== undefined && { caveat }),
  };
}
