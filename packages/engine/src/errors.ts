/**
 * @fileoverview Error classes raised by the engine.
 *
 * Game situations (not ready, not your turn, game over) are ordinary responses
 * and never show up here. These errors cover construction failures and misuse
 * of the session boundary.
 */

/**
 * Thrown when the secret number source fails or yields an out-of-range value.
 * No session is created.
 */
export class SecretGenerationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(`Secret number generation failed: ${message}`, options);
    this.name = 'SecretGenerationError';
  }
}

/**
 * Thrown when a configuration value (YAML file or constructor option) is invalid.
 */
export class InvalidConfigurationError extends Error {
  constructor(message: string) {
    super(`Invalid game configuration: ${message}`);
    this.name = 'InvalidConfigurationError';
  }
}

/**
 * Thrown when a request is sent to a session that has been stopped.
 */
export class SessionStoppedError extends Error {
  constructor(sessionId: number) {
    super(`Session ${sessionId} has been stopped`);
    this.name = 'SessionStoppedError';
  }
}

/**
 * Thrown when a request reaches a session while it is still processing another one.
 */
export class ConcurrentRequestError extends Error {
  constructor(sessionId: number) {
    super(`Session ${sessionId} is already processing a request`);
    this.name = 'ConcurrentRequestError';
  }
}

/**
 * Thrown when a session id is not known to the registry.
 */
export class SessionNotFoundError extends Error {
  constructor(sessionId: number) {
    super(`Session not found: ${sessionId}`);
    this.name = 'SessionNotFoundError';
  }
}
