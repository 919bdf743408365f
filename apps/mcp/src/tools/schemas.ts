import { z } from 'zod';

import {
  FILTER_OPERATORS,
  NUMERIC_FILTER_OPERATORS,
  type NumericFilterOperator,
} from '@domain/analytics/domain/entities/QueryResult';

/**
* Tool input schemas
*
* Raw zod shapes, so the MCP server can advertise them as JSON schema and the
* tool layer can validate the same arguments when called directly.
*/

const MAX_ROW_LIMIT = 100000;
const MAX_PROPERTIES_PER_BATCH = 50;

const propertyRef = z.string().trim().min(1, 'Property reference is required');
const fieldName = z.string().trim().min(1);

function isNumericOperator(operator: string): operator is NumericFilterOperator {
  return NUMERIC_FILTER_OPERATORS.some(op => op === operator);
}

const FilterSchema = z.object({
  field: fieldName,
  operator: z.enum(FILTER_OPERATORS),
  value: z.union([
  z.string(),
  z.number(),
  z.array(z.union([z.string(), z.number()])).min(1),
  ]),
}).superRefine((filter, ctx) => {
  if (filter.operator === 'IN_LIST') {
  if (!Array.isArray(filter.value)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['value'], message: 'IN_LIST needs an array of values' });
  }
  return;
  }
  if (Array.isArray(filter.value)) {
  ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['value'], message: `${filter.operator} takes a single value` });
  return;
  }
  if (isNumericOperator(filter.operator) && !Number.isFinite(Number(filter.value))) {
  ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['value'], message: `${filter.operator} needs a numeric value` });
  }
});

const OrderBySchema = z.object({
  field: fieldName,
  desc: z.boolean().default(true),
});

const reportQueryShape = {
  metrics: z.array(fieldName).min(1, 'At least one metric is required')
  .describe('Metric API names, e.g. ["activeUsers", "sessions"]'),
  start_date: z.string().trim().min(1)
  .describe('YYYY-MM-DD, MM/DD/YYYY, or an expression such as "7daysAgo", "last month", "ytd"'),
  end_date: z.string().trim().min(1)
  .describe('Same formats as start_date, e.g. "today"'),
  dimensions: z.array(fieldName).default([])
  .describe('Dimension API names, e.g. ["date", "country"]'),
  filters: z.array(FilterSchema).default([])
  .describe('AND-combined filters; a filter on a requested metric becomes a metric filter'),
  order_by: OrderBySchema.optional()
  .describe('Sort field (metric or dimension) and direction, descending by default'),
  limit: z.number().int().min(1).max(MAX_ROW_LIMIT).optional()
  .describe('Maximum rows per property; defaults to the configured row limit'),
};

export const ListPropertiesShape = {
  force_refresh: z.boolean().default(false)
  .describe('Bypass the cached property list and rediscover'),
};

export const SearchPropertiesShape = {
  query: z.string().trim().min(1, 'Search query is required')
  .describe('Part of a property name, an alias, or a property id'),
  max_results: z.number().int().min(1).max(50).default(5),
};

export const QueryAnalyticsShape = {
  property: propertyRef
  .describe('Property id ("123456789"), resource name, alias, or approximate display name'),
  ...reportQueryShape,
};

export const QueryMultiplePropertiesShape = {
  properties: z.array(propertyRef).min(1).max(MAX_PROPERTIES_PER_BATCH)
  .describe('Property references, each resolved like query_analytics.property'),
  ...reportQueryShape,
};

export const PropertyMetadataShape = {
  property: propertyRef,
};

export const QueryRealtimeShape = {
  property: propertyRef,
  metrics: z.array(fieldName).optional()
  .describe('Defaults to ["activeUsers"]'),
  dimensions: z.array(fieldName).default([]),
  limit: z.number().int().min(1).max(1000).default(100),
};

export const CacheStatusShape = {};

export const ClearCacheShape = {
  pattern: z.string().min(1).optional()
  .describe('Only clear keys containing this text, e.g. a property id or "properties"'),
};

export type FilterInput = z.infer<typeof FilterSchema>;
export type OrderByInput = z.infer<typeof OrderBySchema>;
