/**
 * Round rules for War.
 *
 * Each round both players reveal their top card. The higher value
 * takes both cards; equal values are a tie and each card goes back
 * to the bottom of its owner's deck.
 */

import type { Card } from '../../src/card-system/Card';
import { cardsEqual, isLessThan } from '../../src/card-system/Card';
import type { Deck } from '../../src/card-system/Deck';

/** Who won a single round. */
export type RoundOutcome = 'playerA' | 'playerB' | 'tie';

/** Player index of each non-tie outcome. */
export const OUTCOME_PLAYER_INDEX: Record<RoundOutcome, number> = {
  playerA: 0,
  playerB: 1,
  tie: -1,
};

/**
 * Decide a round from the two played cards.
 */
export function resolveRound(cardA: Card, cardB: Card): RoundOutcome {
  if (cardsEqual(cardA, cardB)) return 'tie';
  return isLessThan(cardA, cardB) ? 'playerB' : 'playerA';
}

/**
 * Return the played cards to the decks according to the outcome.
 *
 * The winner puts its own card at the bottom first, then the loser's.
 */
export function collectSpoils(
  outcome: RoundOutcome,
  cardA: Card,
  cardB: Card,
  deckA: Deck,
  deckB: Deck,
): void {
  switch (outcome) {
    case 'playerA':
      deckA.addToBottom(cardA);
      deckA.addToBottom(cardB);
      break;
    case 'playerB':
      deckB.addToBottom(cardB);
      deckB.addToBottom(cardA);
      break;
    case 'tie':
      deckA.addToBottom(cardA);
      deckB.addToBottom(cardB);
      break;
  }
}
