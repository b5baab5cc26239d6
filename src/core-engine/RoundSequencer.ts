/**
 * Round sequencer: moves a game through `setup -> playing -> ended`
 * and counts completed rounds.
 */

import type { GameState } from './GameState';

export function isGameOver<T>(state: GameState<T>): boolean {
  return state.phase === 'ended';
}

/**
 * Begin play on a freshly dealt game.
 *
 * @throws If the game has already started or ended.
 */
export function startGame<T>(state: GameState<T>): void {
  if (state.phase !== 'setup') {
    throw new Error(`Game already started (phase "${state.phase}")`);
  }
  state.phase = 'playing';
}

/**
 * Count one more completed round and return the new round number.
 *
 * @throws If the game has not started or is over.
 */
export function advanceRound<T>(state: GameState<T>): number {
  if (state.phase === 'setup') {
    throw new Error('Round played before the game started');
  }
  if (state.phase === 'ended') {
    throw new Error('Round played after game over');
  }
  state.roundNumber++;
  return state.roundNumber;
}

/**
 * Close a game that is in play.
 *
 * @throws If the game never started or has already ended.
 */
export function endGame<T>(state: GameState<T>): void {
  if (state.phase === 'setup') {
    throw new Error('Cannot end a game that never started');
  }
  if (state.phase === 'ended') {
    throw new Error('Game is already over');
  }
  state.phase = 'ended';
}
