import { beforeEach, describe, expect, it } from 'vitest';

import { TtlCache } from '@cache';
import { DiscoveryFailedError, PropertyNotFoundError } from '@errors';

import { createAccessibleProperty, createSampleProperties } from '../../../../test/factories/properties';
import { createMockAdminClient } from '../../../../test/mocks/gaClients';
import { setupMockLogger } from '../../../../test/utils/logger-mock';
import type { AccessibleProperty } from '../ports/AdminApiClient';
import type { AnalyticsCacheValue } from '../analyticsCache';
import { PropertyRegistry } from '../PropertyRegistry';
import { PropertyResolver, type PropertyResolverOptions } from '../PropertyResolver';

function createResolver(
  properties: AccessibleProperty[] = createSampleProperties(),
  options: Partial<PropertyResolverOptions> = {}
) {
  const admin = createMockAdminClient(properties);
  const registry = new PropertyRegistry(admin, new TtlCache<AnalyticsCacheValue>(), {
    propertyCacheTtlSeconds: 3600,
    apiTimeoutMs: 1000,
  });
  return {
    admin,
    resolver: new PropertyResolver(registry, { fuzzyThreshold: 0.6, ...options }),
  };
}

describe('PropertyResolver', () => {
  describe('resolve', () => {
    it('returns nothing for an empty query without discovering', async () => {
      const { admin, resolver } = createResolver();
      await expect(resolver.resolve('')).resolves.toEqual([]);
      await expect(resolver.resolve('   ')).resolves.toEqual([]);
      expect(admin.listAccessibleProperties).not.toHaveBeenCalled();
    });

    it('matches an exact id with full confidence at any threshold', async () => {
      const { resolver } = createResolver();
      for (const threshold of [0, 0.5, 1]) {
        const [match, ...rest] = await resolver.resolve('222', threshold);
        expect(match?.property.displayName).toBe('Online Store');
        expect(match?.confidence).toBe(1);
        expect(match?.matchedOn).toBe('exact_id');
        expect(rest).toEqual([]);
      }
    });

    it('matches a resource name like an id', async () => {
      const { resolver } = createResolver();
      const [match] = await resolver.resolve('properties/333');
      expect(match?.property.id).toBe('333');
    });

    it('resolves "blog" to My Blog at 0.9', async () => {
      const { resolver } = createResolver();
      const [best] = await resolver.resolve('blog');
      expect(best?.property.id).toBe('111');
      expect(best?.matchedOn).toBe('fuzzy');
      expect(best?.confidence).toBeGreaterThanOrEqual(0.85);
      expect(best?.confidence).toBeLessThanOrEqual(1);
    });

    it('reports a name equal after normalization as exact_name', async () => {
      const { resolver } = createResolver();
      const [best] = await resolver.resolve('my-blog');
      expect(best?.matchedOn).toBe('exact_name');
      expect(best?.confidence).toBe(1);
    });

    it('matches names written in other scripts', async () => {
      const { resolver } = createResolver([
        createAccessibleProperty({ id: '111', displayName: 'Магазин' }),
        createAccessibleProperty({ id: '222', displayName: '東京ブログ' }),
      ]);

      const cyrillic = await resolver.resolve('Магазин');
      expect(cyrillic.map(m => [m.property.id, m.matchedOn, m.confidence])).toEqual([['111', 'exact_name', 1]]);

      const japanese = await resolver.resolve('東京ブログ');
      expect(japanese.map(m => [m.property.id, m.matchedOn, m.confidence])).toEqual([['222', 'exact_name', 1]]);

      const partial = await resolver.resolveRequired('магаз');
      expect(partial.property.id).toBe('111');
      expect(partial.matchedOn).toBe('fuzzy');
      expect(partial.confidence).toBeCloseTo(0.7 + 0.3 * 5 / 7, 10);
    });

    it('never returns more matches at a higher threshold', async () => {
      const { resolver } = createResolver();
      const thresholds = [0, 0.2, 0.4, 0.6, 0.8, 1];
      const counts: number[] = [];
      for (const threshold of thresholds) {
        counts.push((await resolver.resolve('store', threshold)).length);
      }
      for (let i = 1; i < counts.length; i++) {
        expect(counts[i]).toBeLessThanOrEqual(counts[i - 1] ?? 0);
      }
    });

    it('orders ties by shorter name, then id', async () => {
      const { resolver } = createResolver([
        createAccessibleProperty({ id: '30', displayName: 'Shop EU' }),
        createAccessibleProperty({ id: '20', displayName: 'Shop US' }),
        createAccessibleProperty({ id: '10', displayName: 'Shop Global' }),
      ]);
      const matches = await resolver.resolve('shop', 0.5);
      expect(matches.map(m => m.property.id)).toEqual(['20', '30', '10']);
    });

    it('uses configured aliases', async () => {
      const { resolver } = createResolver(createSampleProperties(), {
        aliases: { '222': ['shop', 'the store'], 'Documentation Site': ['docs'] },
      });

      const [byIdAlias] = await resolver.resolve('The Store');
      expect(byIdAlias?.property.id).toBe('222');
      expect(byIdAlias?.matchedOn).toBe('alias');

      const [byNameAlias] = await resolver.resolve('DOCS');
      expect(byNameAlias?.property.id).toBe('333');
      expect(byNameAlias?.confidence).toBe(1);
    });

    it('propagates discovery failure', async () => {
      const { resolver } = createResolver([]);
      await expect(resolver.resolve('blog')).rejects.toBeInstanceOf(DiscoveryFailedError);
    });
  });

  describe('resolveRequired', () => {
    const logs = setupMockLogger();

    it('returns the best match', async () => {
      const { resolver } = createResolver();
      const match = await resolver.resolveRequired('online store');
      expect(match.property.id).toBe('222');
      expect(match.ambiguous).toBe(false);
      expect(match.alternatives).toEqual([]);
    });

    it('flags a tie as ambiguous and logs a warning', async () => {
      const { resolver } = createResolver([
        createAccessibleProperty({ id: '20', displayName: 'Shop US' }),
        createAccessibleProperty({ id: '30', displayName: 'Shop EU' }),
      ]);
      const match = await resolver.resolveRequired('shop');
      expect(match.property.id).toBe('20');
      expect(match.ambiguous).toBe(true);
      expect(match.alternatives.map(alt => alt.property.id)).toEqual(['30']);
      expect(logs.hasLog('warn', /Ambiguous property reference/)).toBe(true);

      const warnings = logs.getWarnings();
      expect(warnings).toHaveLength(1);
      expect(warnings[0]?.metadata).toEqual({ query: 'shop', chosen: '20', alternatives: ['30'] });
      expect(logs.getByLevel('error')).toEqual([]);
    });

    it('throws with suggestions when nothing clears the threshold', async () => {
      const { resolver } = createResolver();
      const failure = resolver.resolveRequired('documents');
      await expect(failure).rejects.toBeInstanceOf(PropertyNotFoundError);
      await expect(failure).rejects.toThrow("Property 'documents' not found. Did you mean: Documentation Site?");
    });
  });

  describe('search', () => {
    it('caps the result count and uses the lenient threshold', async () => {
      const { resolver } = createResolver();
      const all = await resolver.search('ion site');
      expect(all.map(m => m.property.id)).toEqual(['333', '222']);

      const capped = await resolver.search('ion site', 1);
      expect(capped.map(m => m.property.id)).toEqual(['333']);
    });
  });
});
