/**
 * HTTP payloads of the session API.
 */

import type { GamePhase, GameResponse } from '@number-guess/engine';

export interface CreateSessionResponse {
  sessionId: number;
  phase: GamePhase;
}

export interface SessionSummary {
  sessionId: number;
  phase: GamePhase;
  playerCount: number;
}

export interface SessionListResponse {
  sessions: SessionSummary[];
}

export interface SessionStatusResponse extends SessionSummary {
  /** Accepted in-turn guesses so far */
  guessCount: number;
}

export interface SessionRequestResponse {
  sessionId: number;
  /** Responses for the caller, in order */
  responses: GameResponse[];
}
