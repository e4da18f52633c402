/**
 * @fileoverview Standalone guessing game server.
 *
 * Serves WebSocket frames and the HTTP session API from one shared registry.
 */

import {
  loadGameConfig,
  logger,
  RandomSecretNumberGenerator,
  SessionRegistry,
} from '@number-guess/engine';
import { createGameServer } from './createGameServer.js';
import { createHttpServer } from './http/createHttpServer.js';

async function main(): Promise<void> {
  const config = loadGameConfig();

  // biome-ignore lint/complexity/useLiteralKeys: Required for noPropertyAccessFromIndexSignature
  const wsPort = Number(process.env['PORT']) || config.server.wsPort;
  // biome-ignore lint/complexity/useLiteralKeys: Required for noPropertyAccessFromIndexSignature
  const httpPort = Number(process.env['HTTP_PORT']) || config.server.httpPort;

  const registry = new SessionRegistry({
    secretGenerator: new RandomSecretNumberGenerator(config.game.maxSecretNumber),
  });

  const gameServer = await createGameServer({ port: wsPort, registry });

  const app = createHttpServer(registry);
  const httpServer = app.listen(httpPort, () => {
    logger.info(`HTTP session API listening on port ${httpPort}`);
  });

  const shutdown = (signal: string): void => {
    logger.info(`${signal} received, shutting down...`);
    httpServer.close();
    gameServer
      .stop()
      .then(() => {
        const stopped = registry.stopAll();
        logger.info('Sessions released', { sessions: stopped });
        process.exit(0);
      })
      .catch((error: unknown) => {
        logger.error('Shutdown failed', { error: String(error) });
        process.exit(1);
      });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((error: unknown) => {
  logger.error('Server failed to start', { error: String(error) });
  process.exit(1);
});
