/**
 * @fileoverview Immutable session state - all mutations return a new GameState instance.
 *
 * GameState only records data; deciding which mutation applies to a request is
 * the job of the transition function in `transition.ts`.
 */

import type { GamePhase } from '../protocol.js';

/** Maximum number of players in one session */
export const MAX_PLAYERS = 2;

/**
 * Immutable state data of one guessing game session.
 */
export class GameState {
  private constructor(
    private readonly _id: number,
    private readonly _secretNumber: number,
    private readonly _phase: GamePhase,
    private readonly _players: readonly string[],
    private readonly _currentPlayerIndex: number | null,
    private readonly _guessCount: number,
    private readonly _winningPlayerName: string | null
  ) {}

  // ============ Static Constructors ============

  /**
   * Create the state of a brand-new session.
   * @param id - Session id issued by the allocator
   * @param secretNumber - Secret issued by the generator
   */
  static create(id: number, secretNumber: number): GameState {
    return new GameState(id, secretNumber, 'new_game', [], null, 0, null);
  }

  // ============ Getters ============

  get id(): number {
    return this._id;
  }

  get secretNumber(): number {
    return this._secretNumber;
  }

  get phase(): GamePhase {
    return this._phase;
  }

  /** Registered player names, in introduction order */
  get players(): readonly string[] {
    return this._players;
  }

  /** Position in `players` of whose turn is next, null until both players are in */
  get currentPlayerIndex(): number | null {
    return this._currentPlayerIndex;
  }

  /** Accepted in-turn guesses so far */
  get guessCount(): number {
    return this._guessCount;
  }

  get winningPlayerName(): string | null {
    return this._winningPlayerName;
  }

  getPlayerCount(): number {
    return this._players.length;
  }

  /** Name of the player on turn, or null before the game is playing */
  getCurrentPlayerName(): string | null {
    if (this._currentPlayerIndex === null) return null;
    return this._players[this._currentPlayerIndex] ?? null;
  }

  // ============ Player Management ============

  /**
   * Append a player. Once the second player is in, the game starts with the
   * newly added player on turn.
   * @returns New game state, or this state if the session is already full
   */
  addPlayer(playerName: string): GameState {
    if (this._players.length >= MAX_PLAYERS) {
      return this;
    }

    const players = [...this._players, playerName];

    if (players.length < MAX_PLAYERS) {
      return new GameState(
        this._id,
        this._secretNumber,
        'waiting_for_second_player',
        players,
        null,
        this._guessCount,
        null
      );
    }

    return new GameState(
      this._id,
      this._secretNumber,
      'playing',
      players,
      players.length - 1,
      this._guessCount,
      null
    );
  }

  // ============ Guessing ============

  /**
   * Record an incorrect in-turn guess and pass the turn on.
   */
  recordMiss(): GameState {
    if (this._phase !== 'playing' || this._currentPlayerIndex === null) {
      return this;
    }

    return new GameState(
      this._id,
      this._secretNumber,
      'playing',
      this._players,
      (this._currentPlayerIndex + 1) % this._players.length,
      this._guessCount + 1,
      null
    );
  }

  /**
   * Record the winning guess by the player on turn and end the game.
   */
  recordWin(): GameState {
    const winner = this.getCurrentPlayerName();
    if (this._phase !== 'playing' || winner === null) {
      return this;
    }

    return new GameState(
      this._id,
      this._secretNumber,
      'over',
      this._players,
      this._currentPlayerIndex,
      this._guessCount + 1,
      winner
    );
  }
}
