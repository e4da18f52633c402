/**
 * @fileoverview Pure transition function of the guessing game state machine.
 *
 *   new_game ──introduce──▶ waiting_for_second_player ──introduce──▶ playing ──winning guess──▶ over
 *
 * Each phase has its own handler. Handlers never mutate their input; a request
 * that changes nothing returns the very same state instance.
 */

import type { GameRequest, GameResponse, GuessRequest, Hint } from '../protocol.js';
import type { GameState } from './GameState.js';

/**
 * Result of applying one request to a session.
 */
export interface TransitionResult {
  readonly state: GameState;
  /** Responses for the sender, in delivery order */
  readonly responses: readonly GameResponse[];
}

/**
 * Hint pointing from an incorrect guess towards the secret.
 */
export function hintFor(value: number, secretNumber: number): Hint {
  return value > secretNumber ? 'lower' : 'higher';
}

function handleNewGame(state: GameState, request: GameRequest): TransitionResult {
  if (request.type === 'introduce') {
    return {
      state: state.addPlayer(request.playerName),
      responses: [{ type: 'not_ready', gameId: state.id, stillWaitingForPlayers: 1 }],
    };
  }

  return {
    state,
    responses: [{ type: 'not_ready', gameId: state.id, stillWaitingForPlayers: 2 }],
  };
}

function handleWaitingForSecondPlayer(state: GameState, request: GameRequest): TransitionResult {
  if (request.type === 'introduce') {
    const next = state.addPlayer(request.playerName);
    return {
      state: next,
      responses: [
        { type: 'ready', gameId: state.id },
        { type: 'your_turn', gameId: state.id, playerName: request.playerName },
      ],
    };
  }

  return {
    state,
    responses: [{ type: 'not_ready', gameId: state.id, stillWaitingForPlayers: 1 }],
  };
}

function handleGuess(state: GameState, request: GuessRequest, currentPlayer: string): TransitionResult {
  if (request.playerName !== currentPlayer) {
    return {
      state,
      responses: [{ type: 'not_your_turn', gameId: state.id, otherPlayerName: currentPlayer }],
    };
  }

  if (request.value === state.secretNumber) {
    const next = state.recordWin();
    return {
      state: next,
      responses: [
        {
          type: 'won',
          gameId: state.id,
          winningPlayerName: currentPlayer,
          winningValue: request.value,
          guessCount: next.guessCount,
        },
      ],
    };
  }

  const next = state.recordMiss();
  return {
    state: next,
    responses: [
      {
        type: 'nope_try_again',
        gameId: state.id,
        nextPlayerName: next.getCurrentPlayerName() ?? currentPlayer,
        incorrectValue: request.value,
        hint: hintFor(request.value, state.secretNumber),
      },
    ],
  };
}

function handlePlaying(state: GameState, request: GameRequest): TransitionResult {
  const currentPlayer = state.getCurrentPlayerName();

  if (request.type === 'introduce' || currentPlayer === null) {
    return {
      state,
      responses: [{ type: 'game_in_progress', gameId: state.id }],
    };
  }

  return handleGuess(state, request, currentPlayer);
}

function handleOver(state: GameState): TransitionResult {
  return {
    state,
    responses: [
      {
        type: 'game_over',
        gameId: state.id,
        winningPlayerName: state.winningPlayerName ?? '',
        winningValue: state.secretNumber,
        guessCount: state.guessCount,
      },
    ],
  };
}

/**
 * Apply one request to a session state.
 * @returns The next state and the responses for the sender
 */
export function transition(state: GameState, request: GameRequest): TransitionResult {
  switch (state.phase) {
    case 'new_game':
      return handleNewGame(state, request);
    case 'waiting_for_second_player':
      return handleWaitingForSecondPlayer(state, request);
    case 'playing':
      return handlePlaying(state, request);
    case 'over':
      return handleOver(state);
  }
}
