export {
  connectRedis,
  maskRedisUrl,
  reconnectDelay,
  type RedisClient,
  type RedisConnection,
  type RedisOptions,
} from './redis-client';
