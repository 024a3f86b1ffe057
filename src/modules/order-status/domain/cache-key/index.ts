export { buildOrderCacheKey, normalizeRequesterId } from './build';
