/**
 * @fileoverview Guessing game host.
 *
 * Exposes engine sessions over WebSocket frames and a small HTTP API. Every
 * reply goes only to the client whose frame or request triggered it.
 */

export { type GameServer, type GameServerConfig, createGameServer } from './createGameServer.js';
export { type Connection, GameHost } from './GameHost.js';
export { createHttpServer } from './http/createHttpServer.js';
export { createSessionRouter } from './http/sessionsRouter.js';
export type {
  CreateSessionResponse,
  SessionListResponse,
  SessionRequestResponse,
  SessionStatusResponse,
  SessionSummary,
} from './http/types.js';
export {
  ClientFrame,
  parseClientFrame,
  parseServerFrame,
  ServerFrame,
  serializeServerFrame,
} from './protocol.js';
