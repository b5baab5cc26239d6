/**
 * Typed Event Emitter for the War Card Engine.
 *
 * Games emit these events at key points of each round. Reporters
 * (console narration, the CSV round log, tests) subscribe to them
 * instead of being called by the game loop directly.
 */

import type { Card } from '../card-system/Card';
import type { Deck } from '../card-system/Deck';

// ── Event Payloads ──────────────────────────────────────────

/**
 * Emitted before the top cards of a round are drawn.
 */
export interface RoundStartedPayload {
  /** 1-based number of the round about to be played. */
  readonly roundNumber: number;
  /** Card count of each player's deck, indexed by player index. */
  readonly deckSizes: readonly number[];
}

/**
 * Emitted once every player has drawn a card for the round.
 */
export interface CardsPlayedPayload {
  readonly roundNumber: number;
  /** Card played by each player, indexed by player index. */
  readonly cards: readonly Card[];
  /** Player display names, parallel to `cards`. */
  readonly playerNames: readonly string[];
}

/**
 * Emitted after the played cards have been returned to the decks.
 */
export interface RoundCompletedPayload {
  readonly roundNumber: number;
  /** Index of the player who won the round, or -1 for a tie. */
  readonly winnerIndex: number;
  /** Each player's deck as it stands after the round. */
  readonly decks: readonly Deck[];
}

/**
 * Emitted when the game has ended.
 */
export interface GameEndedPayload {
  /** Number of rounds played. */
  readonly finalRoundNumber: number;
  /** Index of the winning player, or -1 for a draw. */
  readonly winnerIndex: number;
  /** Human-readable reason (e.g. "Player B holds all cards"). */
  readonly reason: string;
}

// ── Event Map ───────────────────────────────────────────────

/**
 * Maps event names to their payload types.
 *
 * Subscribing to an event name not in this map produces a
 * compile-time TypeScript error.
 */
export interface GameEventMap {
  'round-started': RoundStartedPayload;
  'cards-played': CardsPlayedPayload;
  'round-completed': RoundCompletedPayload;
  'game-ended': GameEndedPayload;
}

/** Union of all valid game event names. */
export type GameEventName = keyof GameEventMap;

/** A callback for a specific event type. */
export type GameEventListener<K extends GameEventName> = (
  payload: GameEventMap[K],
) => void;

type ListenerTable = {
  [K in GameEventName]: Array<GameEventListener<K>>;
};

// ── Emitter ─────────────────────────────────────────────────

/**
 * A minimal, typed, synchronous event emitter for game events.
 *
 * Usage:
 * ```ts
 * const emitter = new GameEventEmitter();
 * emitter.on('round-completed', ({ roundNumber, winnerIndex }) => {
 *   console.log(`Round ${roundNumber} won by player ${winnerIndex}`);
 * });
 * ```
 */
export class GameEventEmitter {
  private readonly listeners: ListenerTable = {
    'round-started': [],
    'cards-played': [],
    'round-completed': [],
    'game-ended': [],
  };

  /**
   * Subscribe to an event. Returns an unsubscribe function.
   */
  on<K extends GameEventName>(
    event: K,
    listener: GameEventListener<K>,
  ): () => void {
    const list: Array<GameEventListener<K>> = this.listeners[event];
    list.push(listener);
    return () => this.off(event, listener);
  }

  /**
   * Remove a specific listener for an event.
   */
  off<K extends GameEventName>(
    event: K,
    listener: GameEventListener<K>,
  ): void {
    const list: Array<GameEventListener<K>> = this.listeners[event];
    const index = list.indexOf(listener);
    if (index !== -1) {
      list.splice(index, 1);
    }
  }

  /**
   * Emit an event with the given payload.
   * Listeners are called synchronously in registration order.
   */
  emit<K extends GameEventName>(event: K, payload: GameEventMap[K]): void {
    const list: Array<GameEventListener<K>> = this.listeners[event];
    // Listeners may unsubscribe while being called
    for (const fn of [...list]) {
      fn(payload);
    }
  }
}
