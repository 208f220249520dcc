/**
 * @file index.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

export {
  ConnectionHandler,
  type ConnectionHandlerDeps,
} from './connection-handler.js';

export {
  WebSocketServerWrapper,
  type WebSocketServerConfig,
  type WebSocketServerDeps,
  type ConnectionAcceptor,
} from './websocket-server.js';

export {
  WsTransport,
  type WsTransportConfig,
  type TransportEvents,
  type ClientSocket,
} from './ws-transport.js';

export { ReactorPulse } from './reactor-pulse.js';
