export { InMemoryOrderCacheAdapter } from './in-memory-order-cache.adapter';
export { TtlCache, type TtlCacheEntry, type TtlCacheOptions } from './ttl-cache';
