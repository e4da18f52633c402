/**
 * @fileoverview In-memory registry of live guessing game sessions.
 *
 * This is the boundary a host talks to: create a session, send it requests,
 * stop it. Sessions are never stopped by the engine itself.
 */

import { SessionNotFoundError } from '../errors.js';
import { type IdAllocator, processIdAllocator } from '../identity/IdAllocator.js';
import type { GameRequest, GameResponse } from '../protocol.js';
import {
  RandomSecretNumberGenerator,
  type SecretNumberGenerator,
} from '../secret/SecretNumberGenerator.js';
import { type Logger, logger as defaultLogger } from '../utils/logger.js';
import { GuessingGame } from './GuessingGame.js';

export interface SessionRegistryOptions {
  readonly idAllocator?: IdAllocator;
  readonly secretGenerator?: SecretNumberGenerator;
  readonly logger?: Logger;
}

export class SessionRegistry {
  private readonly sessions = new Map<number, GuessingGame>();
  private readonly idAllocator: IdAllocator;
  private readonly secretGenerator: SecretNumberGenerator;
  private readonly logger: Logger;

  constructor(options: SessionRegistryOptions = {}) {
    this.idAllocator = options.idAllocator ?? processIdAllocator;
    this.secretGenerator = options.secretGenerator ?? new RandomSecretNumberGenerator();
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Create and register a new session in the `new_game` phase.
   * @throws {SecretGenerationError} if the secret could not be drawn
   */
  create(): GuessingGame {
    const session = new GuessingGame({
      idAllocator: this.idAllocator,
      secretGenerator: this.secretGenerator,
      logger: this.logger,
    });
    this.sessions.set(session.id, session);
    this.logger.info('Session registered', { sessionId: session.id, sessions: this.sessions.size });
    return session;
  }

  /**
   * Forward a request to a session.
   * @throws {SessionNotFoundError} if no live session has this id
   */
  send(sessionId: number, request: GameRequest): GameResponse[] {
    return this.require(sessionId).send(request);
  }

  /**
   * Stop and forget a session.
   * @returns false if there was no such session
   */
  stop(sessionId: number): boolean {
    const session = this.sessions.get(sessionId);
    if (!session) return false;

    session.stop();
    this.sessions.delete(sessionId);
    this.logger.info('Session released', { sessionId, sessions: this.sessions.size });
    return true;
  }

  /**
   * Stop every session (host shutdown).
   * @returns Number of sessions stopped
   */
  stopAll(): number {
    const ids = [...this.sessions.keys()];
    for (const id of ids) {
      this.stop(id);
    }
    return ids.length;
  }

  get(sessionId: number): GuessingGame | undefined {
    return this.sessions.get(sessionId);
  }

  /**
   * Get a live session or throw.
   * @throws {SessionNotFoundError}
   */
  require(sessionId: number): GuessingGame {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new SessionNotFoundError(sessionId);
    }
    return session;
  }

  /** All live sessions, oldest first */
  list(): GuessingGame[] {
    return [...this.sessions.values()];
  }

  get size(): number {
    return this.sessions.size;
  }
}
