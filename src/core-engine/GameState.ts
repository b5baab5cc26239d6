/**
 * Game phase and state types for the War Card Engine.
 *
 * GamePhase represents the high-level lifecycle of a game.
 * GameState is a generic container that tracks players, their
 * per-player state, the phase, and how many rounds have been played.
 */

/**
 * High-level phases of a game.
 *
 * - `setup`   -- Loading and dealing.
 * - `playing` -- Rounds are being played.
 * - `ended`   -- A player ran out of cards or the round cap was hit.
 */
export type GamePhase = 'setup' | 'playing' | 'ended';

/**
 * Identifies a player by display name.
 */
export interface PlayerInfo {
  /** Display name for the player (e.g. "Player A"). */
  readonly name: string;
}

/**
 * Generic game state container.
 *
 * @typeParam T  Game-specific per-player state (e.g. a War deck).
 */
export interface GameState<T> {
  /** Information about each player, indexed by player index. */
  readonly players: readonly PlayerInfo[];
  /** Per-player game-specific state, parallel to `players`. */
  readonly playerStates: T[];
  /** Current high-level phase. */
  phase: GamePhase;
  /** Number of rounds completed so far (starts at 0). */
  roundNumber: number;
}

/**
 * Options for creating a new GameState.
 */
export interface GameStateOptions<T> {
  /** Player info (must have at least 2 entries). */
  players: PlayerInfo[];
  /** Initial per-player state factory. Called once per player. */
  createPlayerState: (playerIndex: number) => T;
}

/**
 * Create a new GameState in the `setup` phase.
 *
 * @throws If fewer than 2 players are provided.
 */
export function createGameState<T>(options: GameStateOptions<T>): GameState<T> {
  const { players, createPlayerState } = options;

  if (players.length < 2) {
    throw new Error(
      `A game requires at least 2 players, got ${players.length}`,
    );
  }

  const playerStates = players.map((_, i) => createPlayerState(i));

  return {
    players,
    playerStates,
    phase: 'setup',
    roundNumber: 0,
  };
}
