export { createLogger } from './logger.js';
export type { Logger } from './logger.js';
export { connectRedis } from './redis.js';
export type { RedisClient } from './redis.js';
export { WallClock, ManualClock } from './clock.js';
export type { LogicalClock } from './clock.js';
export type { Container } from './container.js';
