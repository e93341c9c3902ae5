export { default as redisPlugin } from './redis-plugin.js';
