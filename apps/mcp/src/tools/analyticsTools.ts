import { z } from 'zod';

import type { AppConfig } from '@config';
import { ErrorCodes, ValidationError, toToolError, type ToolErrorPayload } from '@errors';
import { getLogger } from '@kernel/logger';
import { createRequestContext, getElapsedMs, runWithContext } from '@kernel/request-context';
import type { AnalyticsCache } from '@domain/analytics/application/analyticsCache';
import type { PropertySource } from '@domain/analytics/application/PropertyRegistry';
import type { PropertyResolver } from '@domain/analytics/application/PropertyResolver';
import type { QueryOrchestrator } from '@domain/analytics/application/QueryOrchestrator';
import {
  type DateRange,
  describeDateRange,
  parseDateRange,
} from '@domain/analytics/domain/dateExpressions';
import type { QuerySpec } from '@domain/analytics/domain/entities/QueryResult';

import {
  ambiguityWarning,
  presentCacheStatus,
  presentCatalog,
  presentMatch,
  presentProperty,
  presentQueryError,
  presentQueryResult,
  presentRealtime,
  presentSummary,
} from './presenters';
import {
  CacheStatusShape,
  ClearCacheShape,
  ListPropertiesShape,
  PropertyMetadataShape,
  QueryAnalyticsShape,
  QueryMultiplePropertiesShape,
  QueryRealtimeShape,
  SearchPropertiesShape,
  type FilterInput,
  type OrderByInput,
} from './schemas';

const logger = getLogger('mcp:tools');

// ============================================================================
// Types
// ============================================================================

export type ToolOutput = object;

export interface AnalyticsTool {
  name: string;
  description: string;
  shape: z.ZodRawShape;
  /** Validate raw arguments and run; never rejects */
  execute(args: unknown): Promise<ToolOutput>;
}

export interface AnalyticsToolDeps {
  registry: PropertySource;
  resolver: PropertyResolver;
  orchestrator: QueryOrchestrator;
  cache: AnalyticsCache;
  config: Pick<AppConfig, 'defaultRowLimit' | 'maskErrorDetails'>;
  /** Clock for date expressions */
  now?: () => Date;
}

export interface AnalyticsToolSet {
  tools: AnalyticsTool[];
  /** Run a tool by name; unknown names return an error payload */
  call(name: string, args?: unknown): Promise<ToolOutput>;
}

interface ToolDefinition<S extends z.ZodRawShape> {
  name: string;
  description: string;
  shape: S;
  handler: (input: z.output<z.ZodObject<S>>) => Promise<ToolOutput>;
}

interface ReportArgs {
  metrics: string[];
  dimensions: string[];
  start_date: string;
  end_date: string;
  filters: FilterInput[];
  order_by?: OrderByInput | undefined;
  limit?: number | undefined;
}

// ============================================================================
// Tool construction
// ============================================================================

function defineTool<S extends z.ZodRawShape>(
  definition: ToolDefinition<S>,
  maskErrorDetails: boolean
): AnalyticsTool {
  const schema = z.object(definition.shape);

  return {
  name: definition.name,
  description: definition.description,
  shape: definition.shape,
  execute: (args: unknown) =>
    runWithContext(createRequestContext({ tool: definition.name }), async () => {
    const parsed = schema.safeParse(args ?? {});
    if (!parsed.success) {
      const error = ValidationError.fromZodIssues(parsed.error.issues);
      logger.warn('Rejected tool arguments', { reason: error.message });
      return toToolError(error, maskErrorDetails);
    }

    try {
      const output = await definition.handler(parsed.data);
      logger.info('Tool call completed', { durationMs: getElapsedMs() });
      return output;
    } catch (error) {
      const payload = toToolError(error, maskErrorDetails);
      logger.warn('Tool call failed', { errorKind: payload.error_kind, durationMs: getElapsedMs() });
      return payload;
    }
    }),
  };
}

/**
* Build the analytics tools over already wired components
*/
export function createAnalyticsTools(deps: AnalyticsToolDeps): AnalyticsToolSet {
  const { registry, resolver, orchestrator, cache, config } = deps;
  const now = deps.now ?? (() => new Date());
  const mask = config.maskErrorDetails;

  function toQuerySpec(args: ReportArgs): { spec: QuerySpec; dateRange: DateRange; today: Date } {
  const today = now();
  const dateRange = parseDateRange(args.start_date, args.end_date, today);
  return {
    today,
    dateRange,
    spec: {
    metrics: args.metrics,
    dimensions: args.dimensions,
    dateRange,
    limit: args.limit ?? config.defaultRowLimit,
    filters: args.filters,
    orderBy: args.order_by,
    },
  };
  }

  function presentDateRange(dateRange: DateRange, today: Date) {
  return {
    start_date: dateRange.startDate,
    end_date: dateRange.endDate,
    description: describeDateRange(dateRange, today),
  };
  }

  const tools: AnalyticsTool[] = [
  defineTool({
    name: 'list_properties',
    description: 'List every GA4 property the service account can access, with ids, names and accounts.',
    shape: ListPropertiesShape,
    handler: async ({ force_refresh }) => {
    const properties = await registry.listProperties(force_refresh);
    return {
      properties: properties.map(presentProperty),
      count: properties.length,
    };
    },
  }, mask),

  defineTool({
    name: 'search_properties',
    description: 'Find properties by approximate name, alias or id. Returns the closest matches with confidence scores.',
    shape: SearchPropertiesShape,
    handler: async ({ query, max_results }) => {
    const matches = (await resolver.search(query, max_results)).map(presentMatch);
    return {
      query,
      matches,
      count: matches.length,
      best_match: matches[0] ?? null,
    };
    },
  }, mask),

  defineTool({
    name: 'query_analytics',
    description: 'Run a report on one GA4 property. The property may be given by id or by approximate name.',
    shape: QueryAnalyticsShape,
    handler: async ({ property, ...args }) => {
    const { spec, dateRange, today } = toQuerySpec(args);
    const result = await orchestrator.querySingle(property, spec);
    if (result.status === 'error') {
      return presentQueryError(result.error);
    }

    const warning = ambiguityWarning(property, result.match);
    return {
      ...presentQueryResult(result),
      date_range: presentDateRange(dateRange, today),
      ...(warning && { warnings: [warning] }),
    };
    },
  }, mask),

  defineTool({
    name: 'query_multiple_properties',
    description: 'Run the same report on several properties concurrently. Failed properties are reported alongside successful ones, with summed totals.',
    shape: QueryMultiplePropertiesShape,
    handler: async ({ properties, ...args }) => {
    const { spec, dateRange, today } = toQuerySpec(args);
    const { results, summary } = await orchestrator.queryMultiple(properties, spec);

    const warnings: ToolErrorPayload[] = [];
    for (const result of results) {
      if (result.status !== 'ok') continue;
      const warning = ambiguityWarning(result.propertyRef, result.match);
      if (warning) warnings.push(warning);
    }

    return {
      date_range: presentDateRange(dateRange, today),
      metrics: spec.metrics,
      dimensions: spec.dimensions,
      results: results.map(presentQueryResult),
      summary: presentSummary(summary),
      ...(warnings.length > 0 && { warnings }),
    };
    },
  }, mask),

  defineTool({
    name: 'get_property_metadata',
    description: 'List the dimensions and metrics available on a property, including custom definitions.',
    shape: PropertyMetadataShape,
    handler: async ({ property }) => presentCatalog(await orchestrator.getPropertyMetadata(property)),
  }, mask),

  defineTool({
    name: 'query_realtime',
    description: 'Realtime report for one property covering the last 30 minutes. Never cached.',
    shape: QueryRealtimeShape,
    handler: async ({ property, metrics, dimensions, limit }) =>
    presentRealtime(await orchestrator.queryRealtime(property, { metrics, dimensions, limit })),
  }, mask),

  defineTool({
    name: 'get_cache_status',
    description: 'Show cached entries with their age and time-to-live.',
    shape: CacheStatusShape,
    handler: async () => presentCacheStatus(cache.status(), cache.maxEntries),
  }, mask),

  defineTool({
    name: 'clear_cache',
    description: 'Clear cached data, optionally only keys containing a pattern. The next call fetches fresh data.',
    shape: ClearCacheShape,
    handler: async ({ pattern }) => {
    const cleared = pattern !== undefined ? cache.invalidateMatching(pattern) : cache.clear();
    logger.info('Cache cleared', { cleared, pattern });
    return {
      cleared_entries: cleared,
      pattern: pattern ?? null,
      message: `Cleared ${cleared} cache entries${pattern !== undefined ? ` matching '${pattern}'` : ''}`,
    };
    },
  }, mask),
  ];

  const byName = new Map(tools.map(tool => [tool.name, tool]));

  return {
  tools,
  call: async (name: string, args?: unknown) => {
    const tool = byName.get(name);
    if (!tool) {
    return {
      error_kind: ErrorCodes.INVALID_REQUEST,
      message: `Unknown tool '${name}'`,
      hint: `Available tools: ${tools.map(t => t.name).join(', ')}`,
    } satisfies ToolErrorPayload;
    }
    return tool.execute(args);
  },
  };
}
