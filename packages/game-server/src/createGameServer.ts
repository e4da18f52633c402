/**
 * @fileoverview Factory function to create the guessing game WebSocket server.
 *
 * Encapsulates:
 * - WebSocketServer setup
 * - Connection handling
 * - Graceful shutdown
 */

import { type Logger, logger as defaultLogger, type SessionRegistry } from '@number-guess/engine';
import { type WebSocket, WebSocketServer } from 'ws';
import { GameHost } from './GameHost.js';

/**
 * Configuration for creating a game server.
 */
export interface GameServerConfig {
  /** Port to listen on (0 picks a free port) */
  readonly port: number;

  /** Registry the host creates and drives sessions through */
  readonly registry: SessionRegistry;

  /** Optional logger */
  readonly logger?: Logger;
}

/**
 * Running game server instance.
 */
export interface GameServer {
  /** The connection host */
  readonly host: GameHost;

  /** Port the server is listening on */
  readonly port: number;

  /** Stop the server gracefully */
  stop(): Promise<void>;
}

/**
 * Create and start a game server.
 *
 * @example
 * ```typescript
 * const server = await createGameServer({ port: 3001, registry: new SessionRegistry() });
 *
 * // Later: graceful shutdown
 * await server.stop();
 * ```
 */
export async function createGameServer(config: GameServerConfig): Promise<GameServer> {
  const logger = config.logger ?? defaultLogger;
  const host = new GameHost(config.registry, logger);

  const wss = new WebSocketServer({ port: config.port });

  await new Promise<void>((resolve, reject) => {
    const onListening = (): void => {
      wss.off('error', onStartupError);
      resolve();
    };
    const onStartupError = (error: Error): void => {
      wss.off('listening', onListening);
      reject(error);
    };
    wss.once('listening', onListening);
    wss.once('error', onStartupError);
  });

  wss.on('error', (error: Error) => {
    logger.error('WebSocket server error', { error: error.message });
  });

  const address = wss.address();
  const port = typeof address === 'object' && address !== null ? address.port : config.port;

  logger.info(`WebSocket server listening on port ${port}`);

  wss.on('connection', (ws: WebSocket) => {
    host.handleConnection(ws);

    ws.on('message', (data) => {
      host.handleMessage(ws, data.toString());
    });

    ws.on('close', () => {
      host.handleDisconnection(ws);
    });

    ws.on('error', (error: Error) => {
      logger.error('WebSocket error', { error: error.message });
    });
  });

  const stop = async (): Promise<void> => {
    logger.info('Shutting down WebSocket server...');
    host.closeAll();

    return new Promise((resolve, reject) => {
      wss.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        logger.info('WebSocket server stopped');
        resolve();
      });
    });
  };

  return {
    host,
    port,
    stop,
  };
}
