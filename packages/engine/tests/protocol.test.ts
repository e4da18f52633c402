import { describe, expect, it } from 'vitest';
import {
  type GameResponse,
  isResponseType,
  parseRequest,
  parseResponse,
  serializeResponse,
} from '../src/protocol.js';

describe('Guessing game protocol', () => {
  describe('parseRequest', () => {
    it('should accept an introduce request', () => {
      expect(parseRequest({ type: 'introduce', playerName: 'alice' })).toEqual({
        type: 'introduce',
        playerName: 'alice',
      });
    });

    it('should accept a guess with any integer value', () => {
      expect(parseRequest({ type: 'guess', playerName: 'bob', value: -3 })).toEqual({
        type: 'guess',
        playerName: 'bob',
        value: -3,
      });
    });

    it('should accept an empty player name', () => {
      expect(parseRequest({ type: 'introduce', playerName: '' })).not.toBeNull();
    });

    it('should reject a fractional guess', () => {
      expect(parseRequest({ type: 'guess', playerName: 'bob', value: 2.5 })).toBeNull();
    });

    it('should reject unknown request types', () => {
      expect(parseRequest({ type: 'cheat', playerName: 'bob' })).toBeNull();
    });

    it('should reject non-object input', () => {
      expect(parseRequest('introduce')).toBeNull();
      expect(parseRequest(null)).toBeNull();
    });

    it('should strip unknown fields', () => {
      expect(parseRequest({ type: 'introduce', playerName: 'alice', admin: true })).toEqual({
        type: 'introduce',
        playerName: 'alice',
      });
    });
  });

  describe('parseResponse', () => {
    it('should accept the declared lose response', () => {
      const lose = {
        type: 'lose',
        gameId: 3,
        winningPlayerName: 'alice',
        winningValue: 4,
        guessCount: 2,
      };

      expect(parseResponse(lose)).toEqual(lose);
    });

    it('should reject a not_ready response waiting for three players', () => {
      expect(parseResponse({ type: 'not_ready', gameId: 1, stillWaitingForPlayers: 3 })).toBeNull();
    });

    it('should reject a hint other than higher or lower', () => {
      expect(
        parseResponse({
          type: 'nope_try_again',
          gameId: 1,
          nextPlayerName: 'bob',
          incorrectValue: 4,
          hint: 'warmer',
        })
      ).toBeNull();
    });
  });

  describe('serializeResponse', () => {
    it('should serialize to JSON', () => {
      expect(serializeResponse({ type: 'ready', gameId: 12 })).toBe('{"type":"ready","gameId":12}');
    });
  });

  describe('isResponseType', () => {
    it('should narrow by type', () => {
      const response: GameResponse = {
        type: 'your_turn',
        gameId: 1,
        playerName: 'bob',
      };

      expect(isResponseType(response, 'your_turn')).toBe(true);
      expect(isResponseType(response, 'ready')).toBe(false);
      if (isResponseType(response, 'your_turn')) {
        expect(response.playerName).toBe('bob');
      }
    });
  });
});
