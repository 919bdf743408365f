/**
 * Cache exports
 */

export {
  TtlCache,
  DEFAULT_MAX_ENTRIES,
  type CacheEntry,
  type CacheEntryStatus,
  type CacheStatus,
  type GetOrLoadOptions,
  type TtlCacheOptions,
} from './ttlCache';
