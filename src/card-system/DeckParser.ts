/**
 * Deck parser: turns line-oriented `<Suit>,<Rank>` / `Joker,<Label>`
 * text into a populated Deck.
 *
 * Parsing is all-or-nothing. The first bad line rejects the whole
 * source with `MalformedInput`; a source without any card line is
 * rejected with `EmptySource`.
 */

import * as fs from 'node:fs';
import type { Card } from './Card';
import { JOKER_TOKEN, createJokerCard, createSuitedCard, isRank } from './Card';
import { Deck } from './Deck';
import { DeckErrorKinds, fail, ok } from './DeckError';
import type { DeckResult } from './DeckError';
import { logDebug } from '../core-engine/Logger';

const FIELD_SEPARATOR = ',';

/** Unsigned base-10 digits only: no sign, no whitespace, no suffix. */
const RANK_PATTERN = /^[0-9]+$/;

const MALFORMED_MESSAGE = 'Malformed deck input';

/**
 * Decode one non-empty line into a card.
 * @returns The card, or `undefined` when the line is malformed.
 */
export function parseCardLine(line: string): Card | undefined {
  const comma = line.indexOf(FIELD_SEPARATOR);
  if (comma === -1) return undefined;

  const suit = line.slice(0, comma);
  const value = line.slice(comma + 1);
  if (suit === '' || value === '') return undefined;

  if (suit === JOKER_TOKEN) {
    return createJokerCard(value);
  }

  if (!RANK_PATTERN.test(value)) return undefined;
  const rank = Number.parseInt(value, 10);
  if (!isRank(rank)) return undefined;

  return createSuitedCard(suit, rank);
}

/**
 * Parse a sequence of lines into a Deck, in source order (first line
 * on top). Zero-length lines are skipped; whitespace-only lines are
 * not, and fail as malformed.
 */
export function parseDeck(lines: Iterable<string>): DeckResult<Deck> {
  const deck = new Deck();
  let lineNumber = 0;

  try {
    for (const line of lines) {
      lineNumber++;
      if (line.length === 0) continue;

      const card = parseCardLine(line);
      if (card === undefined) {
        logDebug('Rejected deck line', { lineNumber, line });
        return fail(DeckErrorKinds.MALFORMED_INPUT, MALFORMED_MESSAGE);
      }
      deck.addToBottom(card);
    }
  } catch (err) {
    // A throwing line source is reported as bad input, like any other line failure
    logDebug('Deck source failed while reading', {
      lineNumber,
      cause: err instanceof Error ? err.message : String(err),
    });
    return fail(DeckErrorKinds.MALFORMED_INPUT, MALFORMED_MESSAGE);
  }

  if (deck.isEmpty()) {
    return fail(DeckErrorKinds.EMPTY_SOURCE, 'Empty or invalid deck source');
  }
  return ok(deck);
}

/**
 * Split raw text into lines on `\n`, dropping one trailing `\r` from
 * every line (the last one included). A line holding only `\r` becomes
 * empty and is skipped like any other empty line.
 */
export function splitLines(text: string): string[] {
  return text
    .split('\n')
    .map((line) => (line.endsWith('\r') ? line.slice(0, -1) : line));
}

/** Parse a whole text source into a Deck. */
export function parseDeckText(text: string): DeckResult<Deck> {
  return parseDeck(splitLines(text));
}

/**
 * Read and parse a deck file.
 *
 * The file is read in one synchronous call, so no handle outlives this
 * function on any path. Failure to read is `UnreadableSource`.
 */
export function readDeckFile(filePath: string): DeckResult<Deck> {
  let text: string;
  try {
    text = fs.readFileSync(filePath, 'utf-8');
  } catch (err) {
    logDebug('Deck file could not be read', {
      filePath,
      cause: err instanceof Error ? err.message : String(err),
    });
    return fail(
      DeckErrorKinds.UNREADABLE_SOURCE,
      `Failed to open input deck: ${filePath}`,
    );
  }
  return parseDeckText(text);
}
