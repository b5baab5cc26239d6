/**
 * Card types and factory functions for the War Card Engine.
 *
 * A Card is one of a closed set of variants (standard, face, joker)
 * discriminated by `kind`. Every variant exposes a numeric value used
 * for ordering and a textual rendering used for display and logging.
 */

/** Ranks held by standard (pip) cards. Ace is low. */
export type StandardRank = 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9 | 10;

/** Ranks held by face cards: Jack, Queen, King. */
export type FaceRank = 11 | 12 | 13;

/** Any rank a suited card can carry. */
export type Rank = StandardRank | FaceRank;

/** Lowest and highest suited ranks accepted by the parser. */
export const MIN_RANK = 1;
export const MAX_RANK = 13;

/** First rank rendered as a named face card. */
export const FIRST_FACE_RANK = 11;

/** Value of every Joker; higher than any suited rank. */
export const JOKER_VALUE = 14;

/** The literal token that marks a Joker in deck sources. */
export const JOKER_TOKEN = 'Joker';

/** A numbered card (Ace through 10). */
export interface StandardCard {
  readonly kind: 'standard';
  readonly suit: string;
  readonly rank: StandardRank;
}

/** A Jack, Queen or King. Same shape as a standard card. */
export interface FaceCard {
  readonly kind: 'face';
  readonly suit: string;
  readonly rank: FaceRank;
}

/** A Joker, identified by a label (e.g. a colour) instead of suit and rank. */
export interface JokerCard {
  readonly kind: 'joker';
  readonly label: string;
}

/** A playing card. Immutable once created. */
export type Card = StandardCard | FaceCard | JokerCard;

/** Discriminant values of the card variants. */
export type CardKind = Card['kind'];

const FACE_NAMES: Record<FaceRank, string> = {
  11: 'Jack',
  12: 'Queen',
  13: 'King',
};

// ── Factories ───────────────────────────────────────────────

/**
 * Create a standard card. The rank is not re-validated here; callers
 * that accept untrusted input must range-check first.
 */
export function createStandardCard(
  suit: string,
  rank: StandardRank,
): StandardCard {
  const card: StandardCard = { kind: 'standard', suit, rank };
  return Object.freeze(card);
}

/** Create a face card (rank 11-13). */
export function createFaceCard(suit: string, rank: FaceRank): FaceCard {
  const card: FaceCard = { kind: 'face', suit, rank };
  return Object.freeze(card);
}

/** Create a Joker with the given label. */
export function createJokerCard(label: string): JokerCard {
  const card: JokerCard = { kind: 'joker', label };
  return Object.freeze(card);
}

/** Whether an integer lies in the suited rank range [1, 13]. */
export function isRank(n: number): n is Rank {
  return Number.isInteger(n) && n >= MIN_RANK && n <= MAX_RANK;
}

/** Whether a rank belongs to a face card. */
export function isFaceRank(rank: Rank): rank is FaceRank {
  return rank >= FIRST_FACE_RANK;
}

/**
 * Create the suited card matching a rank: a FaceCard for 11-13,
 * a StandardCard otherwise.
 */
export function createSuitedCard(
  suit: string,
  rank: Rank,
): StandardCard | FaceCard {
  return isFaceRank(rank)
    ? createFaceCard(suit, rank)
    : createStandardCard(suit, rank);
}

// ── Value and rendering ─────────────────────────────────────

/** The comparison key of a card. */
export function cardValue(card: Card): number {
  switch (card.kind) {
    case 'standard':
    case 'face':
      return card.rank;
    case 'joker':
      return JOKER_VALUE;
  }
}

/** Display name of a face rank. */
export function faceName(rank: FaceRank): string {
  return FACE_NAMES[rank];
}

/**
 * Render a card as text: `Hearts:7`, `Clubs:Queen`, `Joker:Red`.
 */
export function renderCard(card: Card): string {
  switch (card.kind) {
    case 'standard':
      return `${card.suit}:${card.rank}`;
    case 'face':
      return `${card.suit}:${faceName(card.rank)}`;
    case 'joker':
      return `${JOKER_TOKEN}:${card.label}`;
  }
}

// ── Ordering ────────────────────────────────────────────────

/** `a < b` by value. Suit never breaks ties. */
export function isLessThan(a: Card, b: Card): boolean {
  return cardValue(a) < cardValue(b);
}

/** Equal for game purposes when values match, whatever the suit. */
export function cardsEqual(a: Card, b: Card): boolean {
  return cardValue(a) === cardValue(b);
}

/**
 * Three-way comparison consistent with `isLessThan` and `cardsEqual`.
 * Usable as an `Array.prototype.sort` comparator.
 */
export function compareCards(a: Card, b: Card): -1 | 0 | 1 {
  if (isLessThan(a, b)) return -1;
  if (isLessThan(b, a)) return 1;
  return 0;
}
