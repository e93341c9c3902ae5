export { EventSocketServer, SUBSCRIBE_PATH, PUBLISH_PATH } from './websocket-server.js';
export type { EventSocketServerOptions } from './websocket-server.js';
export { ConnectionLimiter } from './connection-limiter.js';
export { SocketConnection } from './socket-connection.js';
