/**
 * Analytics Tool Tests
 *
 * Runs the tools over the real components, with in-process fakes in place of
 * the Google clients.
 */

import { describe, expect, it } from 'vitest';

import type { AppConfig } from '@config';
import type { AccessibleProperty } from '@domain/analytics/application/ports/AdminApiClient';

import { createAccessibleProperty, createSampleProperties } from '../../../../../test/factories/properties';
import {
  createMockAdminClient,
  createMockDataClient,
  createReportTable,
} from '../../../../../test/mocks/gaClients';
import { Container } from '../../container';

const testConfig: AppConfig = {
  credentialsPath: '/keys/test-service-account.json',
  cacheTtlSeconds: 300,
  propertyCacheTtlSeconds: 3600,
  fuzzyThreshold: 0.6,
  defaultRowLimit: 1000,
  propertyAliases: {},
  maskErrorDetails: false,
  queryConcurrency: 5,
  apiTimeoutMs: 1000,
  cacheMaxEntries: 1000,
};

// Friday, March 15 2024
const today = new Date(2024, 2, 15);

function setup(options: { properties?: AccessibleProperty[]; config?: Partial<AppConfig> } = {}) {
  const admin = createMockAdminClient(options.properties ?? createSampleProperties());
  const data = createMockDataClient({
    reports: {
      '111': createReportTable(['sessions'], [{ metrics: ['120'] }], { totals: ['120'] }),
      '20': createReportTable(['sessions'], [{ metrics: ['5'] }], { totals: ['5'] }),
    },
    realtime: createReportTable(['activeUsers'], [{ dimensions: ['US'], metrics: ['4'] }], {
      dimensions: ['country'],
      totals: ['4'],
    }),
    metadata: {
      dimensions: [
        { apiName: 'country', uiName: 'Country', description: 'Visitor country', category: 'Geography', custom: false },
        { apiName: 'customEvent:plan', uiName: 'Plan', description: 'Subscription plan', custom: true },
      ],
      metrics: [{ apiName: 'sessions', uiName: 'Sessions', description: 'Number of sessions', custom: false }],
    },
  });
  const container = new Container({
    config: { ...testConfig, ...options.config },
    clients: { admin, data },
    now: () => today,
  });
  return { admin, data, tools: container.tools };
}

describe('analytics tools', () => {
  it('registers every tool', () => {
    const { tools } = setup();
    expect(tools.tools.map(t => t.name)).toEqual([
      'list_properties',
      'search_properties',
      'query_analytics',
      'query_multiple_properties',
      'get_property_metadata',
      'query_realtime',
      'get_cache_status',
      'clear_cache',
    ]);
  });

  it('rejects an unknown tool', async () => {
    const { tools } = setup();
    await expect(tools.call('drop_tables')).resolves.toMatchObject({
      error_kind: 'INVALID_REQUEST',
      message: "Unknown tool 'drop_tables'",
    });
  });

  describe('list_properties', () => {
    it('lists discovered properties', async () => {
      const { tools } = setup();
      const output = await tools.call('list_properties', {});

      expect(output).toMatchObject({ count: 3 });
      expect(output).toHaveProperty('properties.0', {
        property_id: '333',
        display_name: 'Documentation Site',
        resource_name: 'properties/333',
        account_id: '2000',
        account_name: 'Docs Account',
        property_type: 'PROPERTY_TYPE_ORDINARY',
      });
    });

    it('rediscovers on force_refresh', async () => {
      const { tools, admin } = setup();
      await tools.call('list_properties', {});
      await tools.call('list_properties', { force_refresh: true });
      expect(admin.listAccessibleProperties).toHaveBeenCalledTimes(2);
    });

    it('reports discovery failure', async () => {
      const { tools } = setup({ properties: [] });
      await expect(tools.call('list_properties', {})).resolves.toMatchObject({
        error_kind: 'DISCOVERY_FAILED',
        message: 'No GA4 properties are accessible with the configured credentials',
      });
    });
  });

  describe('search_properties', () => {
    it('finds My Blog for "blog"', async () => {
      const { tools } = setup();
      const match = {
        property_id: '111',
        display_name: 'My Blog',
        confidence: 0.9,
        matched_on: 'fuzzy',
        account_name: 'Test Account',
      };

      await expect(tools.call('search_properties', { query: 'blog' })).resolves.toEqual({
        query: 'blog',
        matches: [match],
        count: 1,
        best_match: match,
      });
    });

    it('returns a null best match when nothing is close', async () => {
      const { tools } = setup();
      await expect(tools.call('search_properties', { query: 'zzz' })).resolves.toEqual({
        query: 'zzz',
        matches: [],
        count: 0,
        best_match: null,
      });
    });
  });

  describe('query_analytics', () => {
    it('runs the report with resolved dates and the default row limit', async () => {
      const { tools, data } = setup();
      const output = await tools.call('query_analytics', {
        property: 'blog',
        metrics: ['sessions'],
        start_date: '7daysAgo',
        end_date: 'today',
      });

      expect(output).toMatchObject({
        status: 'ok',
        property: 'blog',
        property_id: '111',
        property_name: 'My Blog',
        match: { matched_on: 'fuzzy', confidence: 0.9, ambiguous: false },
        rows: [{ sessions: 120 }],
        row_count: 1,
        totals: { sessions: 120 },
        totals_source: 'api',
        date_range: {
          start_date: '2024-03-08',
          end_date: '2024-03-15',
          description: 'Mar 08 - Mar 15, 2024 (8 days)',
        },
      });
      expect(output).not.toHaveProperty('warnings');
      expect(data.runReport).toHaveBeenCalledWith(
        expect.objectContaining({ propertyId: '111', limit: 1000 }),
        expect.any(AbortSignal)
      );
    });

    it('passes filters and ordering through', async () => {
      const { tools, data } = setup();
      await tools.call('query_analytics', {
        property: '111',
        metrics: ['sessions'],
        dimensions: ['country'],
        start_date: '2024-03-01',
        end_date: '2024-03-07',
        filters: [{ field: 'country', operator: 'IN_LIST', value: ['Germany', 'France'] }],
        order_by: { field: 'sessions' },
        limit: 10,
      });

      expect(data.runReport).toHaveBeenCalledWith(
        {
          propertyId: '111',
          metrics: ['sessions'],
          dimensions: ['country'],
          dateRange: { startDate: '2024-03-01', endDate: '2024-03-07' },
          limit: 10,
          filters: [{ field: 'country', operator: 'IN_LIST', value: ['Germany', 'France'] }],
          orderBy: { field: 'sessions', desc: true },
        },
        expect.any(AbortSignal)
      );
    });

    it('reports an unparseable date', async () => {
      const { tools } = setup();
      await expect(tools.call('query_analytics', {
        property: 'blog',
        metrics: ['sessions'],
        start_date: 'next tuesday',
        end_date: 'today',
      })).resolves.toMatchObject({
        error_kind: 'UNPARSEABLE_DATE',
        message: "Could not parse date: 'next tuesday'",
        details: { expression: 'next tuesday' },
      });
    });

    it('omits details when error masking is on', async () => {
      const { tools } = setup({ config: { maskErrorDetails: true } });
      const output = await tools.call('query_analytics', {
        property: 'blog',
        metrics: ['sessions'],
        start_date: 'next tuesday',
        end_date: 'today',
      });
      expect(output).toHaveProperty('error_kind', 'UNPARSEABLE_DATE');
      expect(output).not.toHaveProperty('details');
    });

    it('rejects invalid arguments', async () => {
      const { tools } = setup();
      await expect(tools.call('query_analytics', {
        property: 'blog',
        start_date: 'today',
        end_date: 'today',
      })).resolves.toMatchObject({
        error_kind: 'VALIDATION_ERROR',
        message: 'Invalid arguments: metrics: Required',
      });
    });

    it('rejects an IN_LIST filter without a list', async () => {
      const { tools } = setup();
      await expect(tools.call('query_analytics', {
        property: 'blog',
        metrics: ['sessions'],
        start_date: 'today',
        end_date: 'today',
        filters: [{ field: 'country', operator: 'IN_LIST', value: 'Germany' }],
      })).resolves.toMatchObject({
        error_kind: 'VALIDATION_ERROR',
        message: 'Invalid arguments: filters.0.value: IN_LIST needs an array of values',
      });
    });

    it('reports an unknown property', async () => {
      const { tools } = setup();
      await expect(tools.call('query_analytics', {
        property: 'nonexistent',
        metrics: ['sessions'],
        start_date: 'today',
        end_date: 'today',
      })).resolves.toEqual({
        error_kind: 'PROPERTY_NOT_FOUND',
        message: "Property 'nonexistent' not found.",
        hint: 'Try list_properties or search_properties to find the exact property name or ID.',
      });
    });

    it('warns when the reference is ambiguous', async () => {
      const { tools } = setup({
        properties: [
          createAccessibleProperty({ id: '20', displayName: 'Shop US' }),
          createAccessibleProperty({ id: '30', displayName: 'Shop EU' }),
        ],
      });
      const output = await tools.call('query_analytics', {
        property: 'shop',
        metrics: ['sessions'],
        start_date: 'today',
        end_date: 'today',
      });

      expect(output).toHaveProperty('property_id', '20');
      expect(output).toHaveProperty('warnings', [{
        error_kind: 'AMBIGUOUS_PROPERTY',
        message: "'shop' also matches Shop EU (30); using Shop US (20).",
        hint: 'Pass the property id to pick a specific property.',
      }]);
    });
  });

  describe('query_multiple_properties', () => {
    it('reports each property and sums the successful ones', async () => {
      const { tools } = setup();
      const output = await tools.call('query_multiple_properties', {
        properties: ['blog', 'nonexistent'],
        metrics: ['sessions'],
        start_date: 'yesterday',
        end_date: 'yesterday',
      });

      expect(output).toMatchObject({
        date_range: { start_date: '2024-03-14', end_date: '2024-03-14', description: 'Yesterday' },
        metrics: ['sessions'],
        dimensions: [],
        results: [
          { status: 'ok', property: 'blog', property_id: '111', totals: { sessions: 120 } },
          {
            status: 'error',
            property: 'nonexistent',
            rows: [],
            row_count: 0,
            error: { error_kind: 'PROPERTY_NOT_FOUND' },
          },
        ],
        summary: {
          properties_queried: 2,
          properties_successful: 1,
          properties_failed: 1,
          totals: { sessions: 120 },
          non_numeric_metrics: [],
        },
      });
    });

    it('fails when none of the properties exist', async () => {
      const { tools } = setup();
      await expect(tools.call('query_multiple_properties', {
        properties: ['zzz'],
        metrics: ['sessions'],
        start_date: 'today',
        end_date: 'today',
      })).resolves.toMatchObject({
        error_kind: 'PROPERTY_NOT_FOUND',
        message: "None of the requested properties were found: 'zzz'.",
      });
    });
  });

  describe('get_property_metadata', () => {
    it('lists standard and custom fields', async () => {
      const { tools } = setup();
      await expect(tools.call('get_property_metadata', { property: 'blog' })).resolves.toEqual({
        property_id: '111',
        property_name: 'My Blog',
        dimensions: [{ api_name: 'country', ui_name: 'Country', description: 'Visitor country', category: 'Geography' }],
        metrics: [{ api_name: 'sessions', ui_name: 'Sessions', description: 'Number of sessions' }],
        custom_dimensions: [{ api_name: 'customEvent:plan', ui_name: 'Plan', description: 'Subscription plan' }],
        custom_metrics: [],
        total_dimensions: 2,
        total_metrics: 1,
      });
    });
  });

  describe('query_realtime', () => {
    it('returns the last 30 minutes', async () => {
      const { tools } = setup();
      await expect(tools.call('query_realtime', { property: '111', dimensions: ['country'] })).resolves.toMatchObject({
        property_id: '111',
        property_name: 'My Blog',
        lookback_minutes: 30,
        dimensions: ['country'],
        metrics: ['activeUsers'],
        rows: [{ country: 'US', activeUsers: 4 }],
        row_count: 1,
        totals: { activeUsers: 4 },
      });
    });
  });

  describe('cache tools', () => {
    async function warmCache(tools: ReturnType<typeof setup>['tools']) {
      await tools.call('query_analytics', {
        property: '111',
        metrics: ['sessions'],
        start_date: 'today',
        end_date: 'today',
      });
    }

    it('shows cached entries', async () => {
      const { tools } = setup();
      await warmCache(tools);

      const status = await tools.call('get_cache_status', {});
      expect(status).toMatchObject({ entry_count: 2, valid_count: 2, expired_count: 0, max_entries: 1000 });
      expect(status).toHaveProperty('entries.0.key', 'properties:list');
    });

    it('empties the cache', async () => {
      const { tools } = setup();
      await warmCache(tools);

      await expect(tools.call('clear_cache', {})).resolves.toEqual({
        cleared_entries: 2,
        pattern: null,
        message: 'Cleared 2 cache entries',
      });
      await expect(tools.call('get_cache_status', {})).resolves.toMatchObject({ entry_count: 0 });
    });

    it('clears only matching keys', async () => {
      const { tools } = setup();
      await warmCache(tools);

      await expect(tools.call('clear_cache', { pattern: 'query:111' })).resolves.toEqual({
        cleared_entries: 1,
        pattern: 'query:111',
        message: "Cleared 1 cache entries matching 'query:111'",
      });
      await expect(tools.call('get_cache_status', {})).resolves.toMatchObject({ entry_count: 1 });
    });

    it('fetches fresh data after clearing', async () => {
      const { tools, data } = setup();
      await warmCache(tools);
      await tools.call('clear_cache', {});
      await warmCache(tools);
      expect(data.runReport).toHaveBeenCalledTimes(2);
    });
  });
});
