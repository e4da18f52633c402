/**
 * @fileoverview Guessing game protocol message definitions.
 * Uses Zod for runtime validation of incoming requests.
 *
 * Every response carries the id of the session that produced it, so a caller
 * can multiplex many sessions over one channel.
 */

import { z } from 'zod';

// ============ Shared Schemas ============

/**
 * Direction in which the secret lies relative to an incorrect guess.
 */
export const HintSchema = z.enum(['higher', 'lower']);
export type Hint = z.infer<typeof HintSchema>;

/**
 * Session lifecycle phase.
 */
const GamePhaseSchema = z.enum(['new_game', 'waiting_for_second_player', 'playing', 'over']);
export type GamePhase = z.infer<typeof GamePhaseSchema>;

// ============ Requests ============

/**
 * Introduce a player to the game.
 */
export const IntroduceRequest = z.object({
  type: z.literal('introduce'),
  playerName: z.string(),
});

/**
 * Attempt to guess the secret number. Any integer is accepted.
 */
export const GuessRequest = z.object({
  type: z.literal('guess'),
  playerName: z.string(),
  value: z.number().int(),
});

/**
 * Union of all valid requests to a session.
 */
export const GameRequest = z.discriminatedUnion('type', [IntroduceRequest, GuessRequest]);

export type GameRequest = z.infer<typeof GameRequest>;
export type IntroduceRequest = z.infer<typeof IntroduceRequest>;
export type GuessRequest = z.infer<typeof GuessRequest>;

// ============ Responses ============

const gameId = z.number().int().positive();

/**
 * The session still needs players before anyone can guess.
 */
export const NotReadyResponse = z.object({
  type: z.literal('not_ready'),
  gameId,
  stillWaitingForPlayers: z.union([z.literal(1), z.literal(2)]),
});

/**
 * Both players are registered.
 */
export const ReadyResponse = z.object({
  type: z.literal('ready'),
  gameId,
});

/**
 * It is the named player's turn.
 */
export const YourTurnResponse = z.object({
  type: z.literal('your_turn'),
  gameId,
  playerName: z.string(),
});

/**
 * The guess came from the player who is not on turn.
 */
export const NotYourTurnResponse = z.object({
  type: z.literal('not_your_turn'),
  gameId,
  otherPlayerName: z.string(),
});

/**
 * Nobody can join once the game has started.
 */
export const GameInProgressResponse = z.object({
  type: z.literal('game_in_progress'),
  gameId,
});

const outcomeFields = {
  gameId,
  winningPlayerName: z.string(),
  winningValue: z.number().int(),
  guessCount: z.number().int().positive(),
};

/**
 * The sender guessed the secret.
 */
export const WonResponse = z.object({
  type: z.literal('won'),
  ...outcomeFields,
});

/**
 * The guess was wrong; the turn passes to `nextPlayerName`.
 */
export const NopeTryAgainResponse = z.object({
  type: z.literal('nope_try_again'),
  gameId,
  nextPlayerName: z.string(),
  incorrectValue: z.number().int(),
  hint: HintSchema,
});

/**
 * Reply to every request once the game has been won.
 */
export const GameOverResponse = z.object({
  type: z.literal('game_over'),
  ...outcomeFields,
});

/**
 * Declared for the losing player but not sent by any transition.
 */
export const LoseResponse = z.object({
  type: z.literal('lose'),
  ...outcomeFields,
});

/**
 * Union of all responses a session can emit.
 */
export const GameResponse = z.discriminatedUnion('type', [
  NotReadyResponse,
  ReadyResponse,
  YourTurnResponse,
  NotYourTurnResponse,
  GameInProgressResponse,
  WonResponse,
  NopeTryAgainResponse,
  GameOverResponse,
  LoseResponse,
]);

export type GameResponse = z.infer<typeof GameResponse>;

// ============ Utility Functions ============

/**
 * Parse and validate a request from unknown data.
 * @param data - Raw data to parse (typically from JSON.parse)
 * @returns Validated GameRequest or null if invalid
 */
export function parseRequest(data: unknown): GameRequest | null {
  const result = GameRequest.safeParse(data);
  return result.success ? result.data : null;
}

/**
 * Parse and validate a response from unknown data.
 */
export function parseResponse(data: unknown): GameResponse | null {
  const result = GameResponse.safeParse(data);
  return result.success ? result.data : null;
}

/**
 * Serialize a response to a JSON string.
 */
export function serializeResponse(response: GameResponse): string {
  return JSON.stringify(response);
}

/**
 * Type guard for checking if a response is a specific type.
 * @param response - Response to check
 * @param type - Expected response type
 */
export function isResponseType<T extends GameResponse['type']>(
  response: GameResponse,
  type: T
): response is Extract<GameResponse, { type: T }> {
  return response.type === type;
}
