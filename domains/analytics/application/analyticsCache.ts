import type { TtlCache } from '@cache';

import type { Property } from '../domain/entities/Property';
import type { ReportSnapshot } from '../domain/entities/QueryResult';
import type { PropertyMetadata } from './ports/DataApiClient';

/**
* Values the analytics components keep in the shared cache, tagged by kind
*/
export type AnalyticsCacheValue =
  | { kind: 'properties'; properties: Property[] }
  | { kind: 'report'; snapshot: ReportSnapshot }
  | { kind: 'metadata'; metadata: PropertyMetadata };

export type AnalyticsCacheKind = AnalyticsCacheValue['kind'];

export type AnalyticsCacheEntry<K extends AnalyticsCacheKind> = Extract<AnalyticsCacheValue, { kind: K }>;

export type AnalyticsCache = TtlCache<AnalyticsCacheValue>;

export const CacheKeys = {
  propertyList: 'properties:list',
  report: (propertyId: string, fingerprint: string): string => `query:${propertyId}:${fingerprint}`,
  metadata: (propertyId: string): string => `metadata:${propertyId}`,
} as const;

function isKind<K extends AnalyticsCacheKind>(value: AnalyticsCacheValue, kind: K): value is AnalyticsCacheEntry<K> {
  return value.kind === kind;
}

/**
* getOrLoad narrowed to one kind of value.
* An entry of another kind under the key is replaced by a fresh load.
*/
export async function loadCached<K extends AnalyticsCacheKind>(
  cache: AnalyticsCache,
  key: string,
  kind: K,
  ttlMs: number,
  loader: () => Promise<AnalyticsCacheEntry<K>>,
  options: { bypassRead?: boolean } = {}
): Promise<AnalyticsCacheEntry<K>> {
  const value = await cache.getOrLoad(key, ttlMs, loader, options);
  if (isKind(value, kind)) {
    return value;
  }

  const fresh = await loader();
  cache.set(key, fresh, ttlMs);
  return fresh;
}
