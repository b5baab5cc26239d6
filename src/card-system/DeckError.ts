/**
 * Error taxonomy for deck loading and deck operations.
 */

export const DeckErrorKinds = {
  UNREADABLE_SOURCE: 'UnreadableSource', // Source could not be opened or read
  MALFORMED_INPUT: 'MalformedInput',     // A line failed format or range checks
  EMPTY_SOURCE: 'EmptySource',           // Source held no card lines
  EMPTY_DECK: 'EmptyDeck',               // Draw attempted on an empty deck
} as const;

export type DeckErrorKind = typeof DeckErrorKinds[keyof typeof DeckErrorKinds];

/**
 * Error raised (or returned inside a {@link DeckResult}) by the deck
 * container and the deck parser.
 */
export class DeckError extends Error {
  readonly kind: DeckErrorKind;

  constructor(kind: DeckErrorKind, message: string) {
    super(message);
    this.name = 'DeckError';
    this.kind = kind;
  }
}

/** Outcome of a fallible deck operation. */
export type DeckResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: DeckError };

export function ok<T>(value: T): DeckResult<T> {
  return { ok: true, value };
}

export function fail<T>(kind: DeckErrorKind, message: string): DeckResult<T> {
  return { ok: false, error: new DeckError(kind, message) };
}

/**
 * Return the value of a successful result, or throw its error.
 */
export function unwrap<T>(result: DeckResult<T>): T {
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}

/** Whether an unknown thrown value is a DeckError. */
export function isDeckError(err: unknown): err is DeckError {
  return err instanceof DeckError;
}
