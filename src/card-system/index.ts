/**
 * Card System Module
 *
 * Card variants and their ordering, the Deck queue, and the
 * strict deck parser.
 */
export const CARD_SYSTEM_VERSION = '0.1.0';

// Card types, factories, ordering
export type {
  Card,
  CardKind,
  StandardCard,
  FaceCard,
  JokerCard,
  Rank,
  StandardRank,
  FaceRank,
} from './Card';
export {
  MIN_RANK,
  MAX_RANK,
  JOKER_VALUE,
  JOKER_TOKEN,
  createStandardCard,
  createFaceCard,
  createJokerCard,
  createSuitedCard,
  isRank,
  isFaceRank,
  cardValue,
  faceName,
  renderCard,
  isLessThan,
  cardsEqual,
  compareCards,
} from './Card';

// Deck container
export { Deck } from './Deck';

// Errors and results
export type { DeckErrorKind, DeckResult } from './DeckError';
export { DeckErrorKinds, DeckError, isDeckError, unwrap } from './DeckError';

// Parser
export {
  parseCardLine,
  parseDeck,
  parseDeckText,
  readDeckFile,
  splitLines,
} from './DeckParser';
