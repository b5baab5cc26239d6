/**
 * War game orchestration -- ties together the decks, round rules,
 * round sequencer and event emitter into a playable game.
 *
 * Provides:
 *   - dealDecks: split a parsed deck between the two players
 *   - setupWarGame: build a session in the playing phase
 *   - playRound: play a single round
 *   - runWarGame: play rounds until a deck empties or the cap is hit
 */

import type { Card } from '../../src/card-system/Card';
import { Deck } from '../../src/card-system/Deck';
import type { GameState } from '../../src/core-engine/GameState';
import { createGameState } from '../../src/core-engine/GameState';
import {
  advanceRound,
  endGame,
  isGameOver,
  startGame,
} from '../../src/core-engine/RoundSequencer';
import { GameEventEmitter } from '../../src/core-engine/GameEventEmitter';
import { logDebug } from '../../src/core-engine/Logger';
import type { WarConfig } from './WarConfig';
import { DEFAULT_MAX_ROUNDS } from './WarConfig';
import type { RoundOutcome } from './WarRules';
import { OUTCOME_PLAYER_INDEX, collectSpoils, resolveRound } from './WarRules';

export const PLAYER_NAMES = ['Player A', 'Player B'] as const;

// ── State ───────────────────────────────────────────────────

/** Per-player state in a War game. */
export interface WarPlayerState {
  deck: Deck;
}

/** The full game state type for War. */
export type WarGameState = GameState<WarPlayerState>;

/** A complete War game session. */
export interface WarSession {
  gameState: WarGameState;
  config: WarConfig;
  events: GameEventEmitter;
}

/** What happened in one round. */
export interface RoundResult {
  roundNumber: number;
  cardA: Card;
  cardB: Card;
  outcome: RoundOutcome;
}

/** Final result of a game. */
export interface GameSummary {
  /** Rounds played. */
  rounds: number;
  /** Index of the winner, or -1 for a draw. */
  winnerIndex: number;
  /** Name of the winner, or null for a draw. */
  winnerName: string | null;
  reason: string;
  /** Final card count per player. */
  deckSizes: number[];
}

// ── Setup ───────────────────────────────────────────────────

/**
 * Deal every card of `source` alternately to player A and player B,
 * starting with A. The source deck is left empty.
 */
export function dealDecks(source: Deck): [Deck, Deck] {
  const hands: [Deck, Deck] = [new Deck(), new Deck()];
  let seat = 0;
  while (!source.isEmpty()) {
    hands[seat].addToBottom(source.drawOrThrow());
    seat = 1 - seat;
  }
  return hands;
}

export interface WarSetupOptions {
  /** Round cap and other settings (default cap 1000). */
  config?: WarConfig;
  /** Event emitter to report on (a fresh one by default). */
  events?: GameEventEmitter;
}

/**
 * Set up a new War session: deal the source deck and transition to
 * the playing phase.
 */
export function setupWarGame(
  source: Deck,
  options: WarSetupOptions = {},
): WarSession {
  const {
    config = { maxRounds: DEFAULT_MAX_ROUNDS },
    events = new GameEventEmitter(),
  } = options;

  const decks = dealDecks(source);
  const gameState = createGameState<WarPlayerState>({
    players: PLAYER_NAMES.map((name) => ({ name })),
    createPlayerState: (i) => ({ deck: decks[i] }),
  });
  startGame(gameState);

  logDebug('War game set up', {
    deckA: decks[0].size(),
    deckB: decks[1].size(),
    maxRounds: config.maxRounds,
  });

  return { gameState, config, events };
}

// ── Play ────────────────────────────────────────────────────

function decksOf(session: WarSession): [Deck, Deck] {
  const [a, b] = session.gameState.playerStates;
  return [a.deck, b.deck];
}

/**
 * Whether no further round can be played: the game has ended, a
 * player has no cards, or the round cap has been reached.
 */
export function isFinished(session: WarSession): boolean {
  const [deckA, deckB] = decksOf(session);
  return (
    isGameOver(session.gameState) ||
    deckA.isEmpty() ||
    deckB.isEmpty() ||
    session.gameState.roundNumber >= session.config.maxRounds
  );
}

/**
 * Play one round: both players draw, the higher card wins both.
 *
 * @throws If the game is finished.
 */
export function playRound(session: WarSession): RoundResult {
  if (isFinished(session)) {
    throw new Error('Cannot play a round: the game is finished');
  }

  const { gameState, events } = session;
  const [deckA, deckB] = decksOf(session);
  const roundNumber = gameState.roundNumber + 1;

  events.emit('round-started', {
    roundNumber,
    deckSizes: [deckA.size(), deckB.size()],
  });

  const cardA = deckA.drawOrThrow();
  const cardB = deckB.drawOrThrow();
  events.emit('cards-played', {
    roundNumber,
    cards: [cardA, cardB],
    playerNames: gameState.players.map((p) => p.name),
  });

  const outcome = resolveRound(cardA, cardB);
  collectSpoils(outcome, cardA, cardB, deckA, deckB);
  advanceRound(gameState);

  events.emit('round-completed', {
    roundNumber,
    winnerIndex: OUTCOME_PLAYER_INDEX[outcome],
    decks: [deckA, deckB],
  });

  return { roundNumber, cardA, cardB, outcome };
}

/**
 * Decide the game from the current decks.
 */
export function decideWinner(session: WarSession): Omit<GameSummary, 'rounds'> {
  const [deckA, deckB] = decksOf(session);
  const deckSizes = [deckA.size(), deckB.size()];
  const names = session.gameState.players.map((p) => p.name);

  let winnerIndex: number;
  let reason: string;
  if (deckB.isEmpty()) {
    winnerIndex = 0;
    reason = `${names[0]} holds all cards`;
  } else if (deckA.isEmpty()) {
    winnerIndex = 1;
    reason = `${names[1]} holds all cards`;
  } else if (deckSizes[0] === deckSizes[1]) {
    winnerIndex = -1;
    reason = 'Round limit reached with equal card counts';
  } else {
    winnerIndex = deckSizes[0] > deckSizes[1] ? 0 : 1;
    reason = `Round limit reached; ${names[winnerIndex]} has more cards`;
  }

  return {
    winnerIndex,
    winnerName: winnerIndex === -1 ? null : names[winnerIndex],
    reason,
    deckSizes,
  };
}

/**
 * Play rounds until the game is finished, then end it.
 */
export function runWarGame(session: WarSession): GameSummary {
  while (!isFinished(session)) {
    playRound(session);
  }

  const { gameState, events } = session;
  const decision = decideWinner(session);
  endGame(gameState);

  events.emit('game-ended', {
    finalRoundNumber: gameState.roundNumber,
    winnerIndex: decision.winnerIndex,
    reason: decision.reason,
  });

  return { rounds: gameState.roundNumber, ...decision };
}
