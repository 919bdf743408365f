import { DiscoveryFailedError, PropertyNotFoundError } from '@errors';
import { getLogger } from '@kernel/logger';

import { parsePropertyId, Property } from '../domain/entities/Property';
import { type AnalyticsCache, CacheKeys, loadCached } from './analyticsCache';
import { callExternal, describeError } from './externalCalls';
import type { AccessibleProperty, AdminApiClient } from './ports/AdminApiClient';

const logger = getLogger('analytics:property-registry');

// ============================================================================
// Type Definitions
// ============================================================================

export interface PropertyRegistryOptions {
  /** TTL of the discovered property list */
  propertyCacheTtlSeconds: number;
  /** Upper bound on one Admin API call */
  apiTimeoutMs: number;
}

/**
* Read side of the registry used by the resolver and orchestrator
*/
export interface PropertySource {
  listProperties(forceRefresh?: boolean): Promise<Property[]>;
}

// ============================================================================
// Property Registry
// ============================================================================

/**
* Discovers the GA4 properties the credentials can read and keeps the list
* in the shared cache.
*
* A failed or empty discovery is never cached, so a transient Admin API fault
* does not stick for a whole TTL window.
*/
export class PropertyRegistry implements PropertySource {
  constructor(
  private readonly admin: AdminApiClient,
  private readonly cache: AnalyticsCache,
  private readonly options: PropertyRegistryOptions
  ) {}

  /**
  * List accessible properties, sorted by display name then id
  *
  * @param forceRefresh - Skip the cached list; the fresh list is still cached
  * @throws DiscoveryFailedError
  */
  async listProperties(forceRefresh = false): Promise<Property[]> {
  const entry = await loadCached(
    this.cache,
    CacheKeys.propertyList,
    'properties',
    this.options.propertyCacheTtlSeconds * 1000,
    async () => ({ kind: 'properties' as const, properties: await this.discover() }),
    { bypassRead: forceRefresh }
  );
  return [...entry.properties];
  }

  /**
  * Look up a property by exact id ("123" or "properties/123")
  * @throws PropertyNotFoundError
  */
  async getProperty(id: string): Promise<Property> {
  const propertyId = parsePropertyId(id);
  const properties = await this.listProperties();
  const property = propertyId ? properties.find(p => p.id === propertyId) : undefined;
  if (!property) {
    throw new PropertyNotFoundError(id);
  }
  return property;
  }

  /**
  * Drop the cached list so the next read rediscovers
  */
  invalidate(): boolean {
  return this.cache.invalidate(CacheKeys.propertyList);
  }

  private async discover(): Promise<Property[]> {
  const startedAt = Date.now();
  let accessible: AccessibleProperty[];

  try {
    accessible = await callExternal(
    'Property discovery',
    this.options.apiTimeoutMs,
    signal => this.admin.listAccessibleProperties(signal)
    );
  } catch (error) {
    logger.error('Property discovery failed', error instanceof Error ? error : undefined, {
    reason: describeError(error),
    });
    throw new DiscoveryFailedError(`Property discovery failed: ${describeError(error)}`, error);
  }

  const properties = this.toProperties(accessible);
  if (properties.length === 0) {
    throw new DiscoveryFailedError('No GA4 properties are accessible with the configured credentials');
  }

  logger.info('Discovered GA4 properties', {
    count: properties.length,
    durationMs: Date.now() - startedAt,
  });
  return properties;
  }

  private toProperties(accessible: readonly AccessibleProperty[]): Property[] {
  const byId = new Map<string, Property>();

  for (const item of accessible) {
    try {
    const property = Property.create(item);
    if (!byId.has(property.id)) {
      byId.set(property.id, property);
    }
    } catch (error) {
    logger.warn('Skipping property with invalid id', { id: item.id, reason: describeError(error) });
    }
  }

  return [...byId.values()].sort(compareProperties);
  }
}

function compareProperties(a: Property, b: Property): number {
  const byName = a.displayName.localeCompare(b.displayName, 'en', { sensitivity: 'base' });
  if (byName !== 0) return byName;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}
