import { describe, expect, it } from 'vitest';
import { GameState } from '../src/game/GameState.js';
import { hintFor, transition } from '../src/game/transition.js';
import type { GameRequest } from '../src/protocol.js';

const GAME_ID = 7;
const SECRET = 5;

function introduce(playerName: string): GameRequest {
  return { type: 'introduce', playerName };
}

function guess(playerName: string, value: number): GameRequest {
  return { type: 'guess', playerName, value };
}

/** Apply requests in order and return the final state */
function applyAll(state: GameState, requests: GameRequest[]): GameState {
  return requests.reduce((current, request) => transition(current, request).state, state);
}

function playingState(): GameState {
  return applyAll(GameState.create(GAME_ID, SECRET), [introduce('alice'), introduce('bob')]);
}

describe('transition', () => {
  describe('new_game', () => {
    it('should register the first player and wait for one more', () => {
      const result = transition(GameState.create(GAME_ID, SECRET), introduce('alice'));

      expect(result.responses).toEqual([
        { type: 'not_ready', gameId: GAME_ID, stillWaitingForPlayers: 1 },
      ]);
      expect(result.state.phase).toBe('waiting_for_second_player');
      expect(result.state.players).toEqual(['alice']);
    });

    it('should answer a guess with not_ready(2) and keep the state', () => {
      const state = GameState.create(GAME_ID, SECRET);
      const result = transition(state, guess('alice', 3));

      expect(result.responses).toEqual([
        { type: 'not_ready', gameId: GAME_ID, stillWaitingForPlayers: 2 },
      ]);
      expect(result.state).toBe(state);
    });
  });

  describe('waiting_for_second_player', () => {
    it('should send ready then your_turn for the second player', () => {
      const state = applyAll(GameState.create(GAME_ID, SECRET), [introduce('alice')]);
      const result = transition(state, introduce('bob'));

      expect(result.responses).toEqual([
        { type: 'ready', gameId: GAME_ID },
        { type: 'your_turn', gameId: GAME_ID, playerName: 'bob' },
      ]);
      expect(result.state.phase).toBe('playing');
      expect(result.state.getCurrentPlayerName()).toBe('bob');
    });

    it('should answer a guess with not_ready(1) without counting it', () => {
      const state = applyAll(GameState.create(GAME_ID, SECRET), [introduce('alice')]);
      const result = transition(state, guess('alice', 9));

      expect(result.responses).toEqual([
        { type: 'not_ready', gameId: GAME_ID, stillWaitingForPlayers: 1 },
      ]);
      expect(result.state).toBe(state);
      expect(result.state.guessCount).toBe(0);
    });
  });

  describe('playing', () => {
    it('should reject a late introduce with game_in_progress', () => {
      const state = playingState();
      const result = transition(state, introduce('carol'));

      expect(result.responses).toEqual([{ type: 'game_in_progress', gameId: GAME_ID }]);
      expect(result.state).toBe(state);
      expect(result.state.players).toEqual(['alice', 'bob']);
    });

    it('should answer an out-of-turn guess with not_your_turn and change nothing', () => {
      const state = playingState();
      const result = transition(state, guess('alice', SECRET));

      expect(result.responses).toEqual([
        { type: 'not_your_turn', gameId: GAME_ID, otherPlayerName: 'bob' },
      ]);
      expect(result.state).toBe(state);
      expect(result.state.guessCount).toBe(0);
      expect(result.state.currentPlayerIndex).toBe(1);
    });

    it('should treat an unknown player as out of turn', () => {
      const result = transition(playingState(), guess('mallory', 1));

      expect(result.responses).toEqual([
        { type: 'not_your_turn', gameId: GAME_ID, otherPlayerName: 'bob' },
      ]);
    });

    it('should hint lower for a guess above the secret and pass the turn', () => {
      const result = transition(playingState(), guess('bob', 9));

      expect(result.responses).toEqual([
        {
          type: 'nope_try_again',
          gameId: GAME_ID,
          nextPlayerName: 'alice',
          incorrectValue: 9,
          hint: 'lower',
        },
      ]);
      expect(result.state.getCurrentPlayerName()).toBe('alice');
      expect(result.state.guessCount).toBe(1);
    });

    it('should hint higher for a guess below the secret', () => {
      const result = transition(playingState(), guess('bob', 1));

      expect(result.responses[0]).toMatchObject({ type: 'nope_try_again', hint: 'higher' });
    });

    it('should accept guesses outside the secret range', () => {
      const result = transition(playingState(), guess('bob', -40));

      expect(result.responses[0]).toMatchObject({
        type: 'nope_try_again',
        incorrectValue: -40,
        hint: 'higher',
      });
    });

    it('should end the game when the player on turn guesses the secret', () => {
      const result = transition(playingState(), guess('bob', SECRET));

      expect(result.responses).toEqual([
        {
          type: 'won',
          gameId: GAME_ID,
          winningPlayerName: 'bob',
          winningValue: SECRET,
          guessCount: 1,
        },
      ]);
      expect(result.state.phase).toBe('over');
      expect(result.state.winningPlayerName).toBe('bob');
    });

    it('should not mutate the input state', () => {
      const state = playingState();
      transition(state, guess('bob', 2));

      expect(state.guessCount).toBe(0);
      expect(state.getCurrentPlayerName()).toBe('bob');
    });
  });

  describe('over', () => {
    it('should replay the same game_over for every kind of request', () => {
      const over = applyAll(playingState(), [guess('bob', 2), guess('alice', SECRET)]);
      const expected = {
        type: 'game_over',
        gameId: GAME_ID,
        winningPlayerName: 'alice',
        winningValue: SECRET,
        guessCount: 2,
      };

      for (const request of [introduce('carol'), guess('bob', 5), guess('alice', 1)]) {
        const result = transition(over, request);
        expect(result.responses).toEqual([expected]);
        expect(result.state).toBe(over);
      }
    });
  });

  describe('duplicate player names', () => {
    it('should accept the same name twice and resolve turns by position', () => {
      const state = applyAll(GameState.create(GAME_ID, SECRET), [
        introduce('twin'),
        introduce('twin'),
      ]);

      expect(state.players).toEqual(['twin', 'twin']);
      expect(state.currentPlayerIndex).toBe(1);

      const result = transition(state, guess('twin', 8));
      expect(result.responses).toEqual([
        {
          type: 'nope_try_again',
          gameId: GAME_ID,
          nextPlayerName: 'twin',
          incorrectValue: 8,
          hint: 'lower',
        },
      ]);
      expect(result.state.currentPlayerIndex).toBe(0);
    });
  });
});

describe('hintFor', () => {
  it('should point lower when the guess is above the secret', () => {
    expect(hintFor(7, 3)).toBe('lower');
  });

  it('should point higher when the guess is below the secret', () => {
    expect(hintFor(2, 3)).toBe('higher');
  });
});
