/**
 * Deck abstraction for the War Card Engine.
 *
 * A Deck is a queue of cards: cards are drawn from the top and
 * returned to the bottom. Index 0 of `toArray()` is the top.
 *
 * Cards are owned by exactly one deck at a time. Moving a card is a
 * draw from one deck followed by `addToBottom` on another, so a card
 * never sits in two decks at once.
 */

import type { Card } from './Card';
import { renderCard } from './Card';
import { DeckErrorKinds, fail, ok } from './DeckError';
import type { DeckResult } from './DeckError';

/** Drawn slots are reclaimed once at least this many have piled up. */
const COMPACT_THRESHOLD = 32;

export class Deck {
  private cards: Card[];
  /** Index of the current top card within `cards`. */
  private head = 0;

  /**
   * Create a Deck, optionally pre-populated with cards.
   * The first element of the array is treated as the top of the deck.
   */
  constructor(cards: readonly Card[] = []) {
    this.cards = [...cards];
  }

  /** Append a card at the bottom of the deck. */
  addToBottom(card: Card): void {
    this.cards.push(card);
  }

  /**
   * Remove and return the top card.
   * @returns An `EmptyDeck` failure, without touching the deck, when it
   *          holds no cards.
   */
  drawFromTop(): DeckResult<Card> {
    if (this.isEmpty()) {
      return fail(DeckErrorKinds.EMPTY_DECK, 'Cannot draw from an empty deck');
    }
    const card = this.cards[this.head];
    this.head++;
    this.compact();
    return ok(card);
  }

  /**
   * Remove and return the top card, throwing if the deck is empty.
   *
   * Use this when an empty deck indicates a logic error (the caller
   * has already checked `size()`).
   */
  drawOrThrow(): Card {
    const result = this.drawFromTop();
    if (!result.ok) {
      throw result.error;
    }
    return result.value;
  }

  /**
   * Look at the top card without removing it.
   * @returns The top card, or `undefined` if the deck is empty.
   */
  peekTop(): Card | undefined {
    return this.isEmpty() ? undefined : this.cards[this.head];
  }

  /** The number of cards in the deck. */
  size(): number {
    return this.cards.length - this.head;
  }

  /** Whether the deck contains no cards. */
  isEmpty(): boolean {
    return this.size() === 0;
  }

  /**
   * Render every card top to bottom, joined by `separator`.
   * An empty deck renders as the empty string.
   */
  render(separator: string = ' '): string {
    return this.toArray().map(renderCard).join(separator);
  }

  /**
   * Return a shallow copy of all cards in the deck (top to bottom).
   * Useful for inspection and serialization.
   */
  toArray(): Card[] {
    return this.cards.slice(this.head);
  }

  private compact(): void {
    if (this.head >= COMPACT_THRESHOLD && this.head * 2 >= this.cards.length) {
      this.cards = this.cards.slice(this.head);
      this.head = 0;
    }
  }
}
