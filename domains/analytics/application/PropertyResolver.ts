import type { PropertyAliases } from '@config';
import { PropertyNotFoundError } from '@errors';
import { getLogger } from '@kernel/logger';

import { parsePropertyId, type Property } from '../domain/entities/Property';
import type { MatchResult, ResolvedMatch } from '../domain/entities/QueryResult';
import { compact, normalize, similarity } from '../domain/similarity';
import type { PropertySource } from './PropertyRegistry';

const logger = getLogger('analytics:property-resolver');

/** Threshold for search_properties and "did you mean" suggestions */
export const SEARCH_THRESHOLD = 0.3;
export const DEFAULT_SEARCH_RESULTS = 5;
const SUGGESTION_COUNT = 3;

/** Scores closer than this count as a tie */
const TIE_EPSILON = 1e-9;

export interface PropertyResolverOptions {
  /** Default minimum confidence for resolve() */
  fuzzyThreshold: number;
  aliases?: PropertyAliases | undefined;
}

/**
* Maps free-text property references (id, alias or approximate display name)
* onto registry properties.
*
* Results are ordered by confidence, then shorter display name, then id.
*/
export class PropertyResolver {
  /** Normalized alias -> canonical reference */
  private readonly aliasIndex: Map<string, string>;
  private readonly fuzzyThreshold: number;

  constructor(
  private readonly properties: PropertySource,
  options: PropertyResolverOptions
  ) {
  this.fuzzyThreshold = options.fuzzyThreshold;
  this.aliasIndex = buildAliasIndex(options.aliases ?? {});
  }

  get threshold(): number {
  return this.fuzzyThreshold;
  }

  /**
  * All properties matching the query at or above the threshold, best first
  * @throws DiscoveryFailedError when the registry cannot discover properties
  */
  async resolve(query: string, threshold: number = this.fuzzyThreshold): Promise<MatchResult[]> {
  if (!normalize(query)) return [];
  const properties = await this.properties.listProperties();
  return this.resolveAgainst(properties, query, threshold);
  }

  /**
  * Best match for the query
  * @throws PropertyNotFoundError carrying up to three suggestions
  */
  async resolveRequired(query: string): Promise<ResolvedMatch> {
  const properties = await this.properties.listProperties();
  return this.resolveRequiredAgainst(properties, query);
  }

  /**
  * Lenient lookup for browsing: low threshold, capped result count
  */
  async search(query: string, maxResults: number = DEFAULT_SEARCH_RESULTS): Promise<MatchResult[]> {
  const matches = await this.resolve(query, SEARCH_THRESHOLD);
  return matches.slice(0, Math.max(0, maxResults));
  }

  /**
  * resolve() over an already discovered list
  */
  resolveAgainst(properties: readonly Property[], query: string, threshold: number = this.fuzzyThreshold): MatchResult[] {
  const normalizedQuery = normalize(query);
  if (!normalizedQuery) return [];

  const propertyId = parsePropertyId(query);
  if (propertyId) {
    const byId = properties.find(p => p.id === propertyId);
    if (byId) {
    return [{ property: byId, confidence: 1, matchedOn: 'exact_id' }];
    }
  }

  const aliased = this.findAliased(properties, normalizedQuery);
  if (aliased) {
    return [{ property: aliased, confidence: 1, matchedOn: 'alias' }];
  }

  const queryKey = compact(query);
  const matches: MatchResult[] = [];
  for (const property of properties) {
    const confidence = similarity(query, property.displayName);
    if (confidence > 0 && confidence >= threshold) {
    matches.push({
      property,
      confidence,
      matchedOn: compact(property.displayName) === queryKey ? 'exact_name' : 'fuzzy',
    });
    }
  }

  return matches.sort(compareMatches);
  }

  /**
  * resolveRequired() over an already discovered list
  * @throws PropertyNotFoundError
  */
  resolveRequiredAgainst(properties: readonly Property[], query: string): ResolvedMatch {
  const matches = this.resolveAgainst(properties, query);
  const [best, ...rest] = matches;

  if (!best) {
    const suggestions = this.resolveAgainst(properties, query, SEARCH_THRESHOLD)
    .slice(0, SUGGESTION_COUNT)
    .map(match => match.property.displayName);
    throw new PropertyNotFoundError(query, suggestions);
  }

  const alternatives = rest.filter(match => Math.abs(match.confidence - best.confidence) <= TIE_EPSILON);
  if (alternatives.length > 0) {
    logger.warn('Ambiguous property reference', {
    query,
    chosen: best.property.id,
    alternatives: alternatives.map(match => match.property.id),
    });
  }

  return { ...best, ambiguous: alternatives.length > 0, alternatives };
  }

  private findAliased(properties: readonly Property[], normalizedQuery: string): Property | undefined {
  const canonical = this.aliasIndex.get(normalizedQuery);
  if (canonical === undefined) return undefined;

  const canonicalId = parsePropertyId(canonical);
  const canonicalName = normalize(canonical);
  return properties.find(p =>
    (canonicalId !== undefined && p.id === canonicalId) || normalize(p.displayName) === canonicalName
  );
  }
}

function buildAliasIndex(aliases: PropertyAliases): Map<string, string> {
  const index = new Map<string, string>();
  for (const [canonical, names] of Object.entries(aliases)) {
  for (const name of names) {
    const key = normalize(name);
    if (key && !index.has(key)) {
    index.set(key, canonical);
    }
  }
  }
  return index;
}

function compareMatches(a: MatchResult, b: MatchResult): number {
  if (Math.abs(a.confidence - b.confidence) > TIE_EPSILON) {
  return b.confidence - a.confidence;
  }
  const byLength = a.property.displayName.length - b.property.displayName.length;
  if (byLength !== 0) return byLength;
  return a.property.id < b.property.id ? -1 : a.property.id > b.property.id ? 1 : 0;
}
