export { MemoryCache } from './memoryCache';
export { NoopCache } from './noopCache';
export { RedisCache, type RedisCacheOptions } from './redisCache';
