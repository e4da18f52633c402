/**
 * @fileoverview Turn-based two-player number guessing engine.
 *
 * Re-exports the session state machine, its protocol and the collaborators a
 * host needs to create sessions.
 */

export {
  clearConfigCache,
  DEFAULT_MAX_SECRET_NUMBER,
  type GameConfigYaml,
  loadGameConfig,
  parseGameConfig,
} from './config/gameConfig.js';
export {
  ConcurrentRequestError,
  InvalidConfigurationError,
  SecretGenerationError,
  SessionNotFoundError,
  SessionStoppedError,
} from './errors.js';
export { GameState, MAX_PLAYERS } from './game/GameState.js';
export { GuessingGame, type GuessingGameDependencies } from './game/GuessingGame.js';
export { SessionRegistry, type SessionRegistryOptions } from './game/SessionRegistry.js';
export { hintFor, type TransitionResult, transition } from './game/transition.js';
export { CounterIdAllocator, type IdAllocator, processIdAllocator } from './identity/IdAllocator.js';
export {
  GameRequest,
  GameResponse,
  type GamePhase,
  type GuessRequest,
  type Hint,
  HintSchema,
  type IntroduceRequest,
  isResponseType,
  parseRequest,
  parseResponse,
  serializeResponse,
} from './protocol.js';
export {
  RandomSecretNumberGenerator,
  type SecretNumberGenerator,
} from './secret/SecretNumberGenerator.js';
export {
  formatLog,
  type LogEntry,
  type Logger,
  type LogLevel,
  logger,
  silentLogger,
} from './utils/logger.js';
