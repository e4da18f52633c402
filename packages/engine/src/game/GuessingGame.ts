/**
 * @fileoverview One guessing game session.
 *
 * Owns the current GameState and applies requests one at a time. Responses are
 * returned to the caller of `send` only; the session never notifies anyone else.
 */

import { ConcurrentRequestError, SecretGenerationError, SessionStoppedError } from '../errors.js';
import type { IdAllocator } from '../identity/IdAllocator.js';
import type { GamePhase, GameRequest, GameResponse } from '../protocol.js';
import type { SecretNumberGenerator } from '../secret/SecretNumberGenerator.js';
import { type Logger, logger as defaultLogger } from '../utils/logger.js';
import { GameState } from './GameState.js';
import { transition } from './transition.js';

/**
 * Collaborators a session is built from.
 */
export interface GuessingGameDependencies {
  readonly idAllocator: IdAllocator;
  readonly secretGenerator: SecretNumberGenerator;
  readonly logger?: Logger;
}

function drawSecret(generator: SecretNumberGenerator): number {
  let secret: number;
  try {
    secret = generator.generate();
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new SecretGenerationError(reason, { cause: error });
  }

  if (!Number.isInteger(secret) || secret < 1 || secret > generator.maxSecretNumber) {
    throw new SecretGenerationError(
      `expected an integer in [1, ${generator.maxSecretNumber}], got ${secret}`
    );
  }
  return secret;
}

export class GuessingGame {
  private state: GameState;
  private processing = false;
  private stopped = false;
  private readonly logger: Logger;

  /**
   * @throws {SecretGenerationError} if no valid secret could be drawn
   */
  constructor(dependencies: GuessingGameDependencies) {
    this.logger = dependencies.logger ?? defaultLogger;
    const id = dependencies.idAllocator.nextId();
    this.state = GameState.create(id, drawSecret(dependencies.secretGenerator));
    this.logger.debug('Session created', { sessionId: id });
  }

  get id(): number {
    return this.state.id;
  }

  get phase(): GamePhase {
    return this.state.phase;
  }

  /** Snapshot of the current state */
  get currentState(): GameState {
    return this.state;
  }

  get isStopped(): boolean {
    return this.stopped;
  }

  /**
   * Apply one request and return the responses for its sender.
   * @throws {SessionStoppedError} after `stop()`
   * @throws {ConcurrentRequestError} when called while another request is being applied
   */
  send(request: GameRequest): GameResponse[] {
    if (this.stopped) {
      throw new SessionStoppedError(this.state.id);
    }
    if (this.processing) {
      throw new ConcurrentRequestError(this.state.id);
    }

    this.processing = true;
    try {
      const before = this.state.phase;
      const result = transition(this.state, request);
      this.state = result.state;

      this.logger.debug('Request applied', {
        sessionId: this.state.id,
        request: request.type,
        from: before,
        to: this.state.phase,
        responses: result.responses.map((r) => r.type),
      });

      if (before !== 'over' && this.state.phase === 'over') {
        this.logger.info('Game won', {
          sessionId: this.state.id,
          winner: this.state.winningPlayerName,
          guessCount: this.state.guessCount,
        });
      }

      return [...result.responses];
    } finally {
      this.processing = false;
    }
  }

  /**
   * Release the session. Later requests are rejected.
   */
  stop(): void {
    if (this.stopped) return;
    this.stopped = true;
    this.logger.debug('Session stopped', { sessionId: this.state.id, phase: this.state.phase });
  }
}
