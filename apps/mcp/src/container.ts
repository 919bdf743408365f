import type { AppConfig } from '@config';
import { getLogger } from '@kernel/logger';
import { TtlCache } from '@cache';
import type { AnalyticsCache, AnalyticsCacheValue } from '@domain/analytics/application/analyticsCache';
import type { AdminApiClient } from '@domain/analytics/application/ports/AdminApiClient';
import type { DataApiClient } from '@domain/analytics/application/ports/DataApiClient';
import { PropertyRegistry } from '@domain/analytics/application/PropertyRegistry';
import { PropertyResolver } from '@domain/analytics/application/PropertyResolver';
import { QueryOrchestrator } from '@domain/analytics/application/QueryOrchestrator';
import { GaAdminAdapter } from '@domain/analytics/infra/ga/GaAdminAdapter';
import { GaDataAdapter } from '@domain/analytics/infra/ga/GaDataAdapter';

import { createAnalyticsTools, type AnalyticsToolSet } from './tools/analyticsTools';

const logger = getLogger('ContainerService');

/**
* Clients for the two Google Analytics APIs
*/
export interface GaClients {
  admin: AdminApiClient;
  data: DataApiClient;
  /** Release connections held by the clients */
  close?: () => Promise<void>;
}

export interface ContainerOptions {
  config: AppConfig;
  /** Defaults to the googleapis and @google-analytics/data adapters */
  clients?: GaClients;
  /** Clock for date expressions */
  now?: () => Date;
}

/**
* Build the Google clients from the configured service account key
*/
export function createGaClients(config: AppConfig): GaClients {
  const data = new GaDataAdapter({ keyFilename: config.credentialsPath, timeoutMs: config.apiTimeoutMs });
  return {
  admin: new GaAdminAdapter({ keyFilename: config.credentialsPath, timeoutMs: config.apiTimeoutMs }),
  data,
  close: () => data.close(),
  };
}

/**
* Dependency Injection Container
* Provides centralized wiring for the analytics components. Each component is
* created once, on first use, and shares the one cache.
*/
export class Container {
  private readonly config: AppConfig;
  private readonly now: (() => Date) | undefined;
  private clientsInstance: GaClients | undefined;
  private cacheInstance: AnalyticsCache | undefined;
  private registryInstance: PropertyRegistry | undefined;
  private resolverInstance: PropertyResolver | undefined;
  private orchestratorInstance: QueryOrchestrator | undefined;
  private toolsInstance: AnalyticsToolSet | undefined;

  constructor(options: ContainerOptions) {
  this.config = options.config;
  this.clientsInstance = options.clients;
  this.now = options.now;
  }

  get clients(): GaClients {
  if (!this.clientsInstance) {
    this.clientsInstance = createGaClients(this.config);
    logger.info('Google Analytics clients created');
  }
  return this.clientsInstance;
  }

  get cache(): AnalyticsCache {
  this.cacheInstance ??= new TtlCache<AnalyticsCacheValue>({ maxEntries: this.config.cacheMaxEntries });
  return this.cacheInstance;
  }

  get registry(): PropertyRegistry {
  this.registryInstance ??= new PropertyRegistry(this.clients.admin, this.cache, {
    propertyCacheTtlSeconds: this.config.propertyCacheTtlSeconds,
    apiTimeoutMs: this.config.apiTimeoutMs,
  });
  return this.registryInstance;
  }

  get resolver(): PropertyResolver {
  this.resolverInstance ??= new PropertyResolver(this.registry, {
    fuzzyThreshold: this.config.fuzzyThreshold,
    aliases: this.config.propertyAliases,
  });
  return this.resolverInstance;
  }

  get orchestrator(): QueryOrchestrator {
  this.orchestratorInstance ??= new QueryOrchestrator(
    this.registry,
    this.resolver,
    this.clients.data,
    this.cache,
    {
    cacheTtlSeconds: this.config.cacheTtlSeconds,
    propertyCacheTtlSeconds: this.config.propertyCacheTtlSeconds,
    queryConcurrency: this.config.queryConcurrency,
    apiTimeoutMs: this.config.apiTimeoutMs,
    }
  );
  return this.orchestratorInstance;
  }

  get tools(): AnalyticsToolSet {
  this.toolsInstance ??= createAnalyticsTools({
    registry: this.registry,
    resolver: this.resolver,
    orchestrator: this.orchestrator,
    cache: this.cache,
    config: this.config,
    ...(this.now && { now: this.now }),
  });
  return this.toolsInstance;
  }

  /**
  * Close the Google clients, if they were created
  */
  async dispose(): Promise<void> {
  await this.clientsInstance?.close?.();
  }
}
