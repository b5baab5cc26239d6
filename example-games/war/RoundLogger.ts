/**
 * CSV round log for War.
 *
 * One header line, then one line per round:
 *   Round,PlayerA_Count,PlayerB_Count,PlayerA_Cards,PlayerB_Cards
 *   3,4,2,"Hearts:7 Clubs:Queen ...","Spades:2 Joker:Red"
 *
 * Deck renderings are quoted; embedded double quotes are doubled.
 */

import * as fs from 'node:fs';
import type { Deck } from '../../src/card-system/Deck';
import type { GameEventEmitter } from '../../src/core-engine/GameEventEmitter';
import { logDebug } from '../../src/core-engine/Logger';

export const ROUND_LOG_HEADER =
  'Round,PlayerA_Count,PlayerB_Count,PlayerA_Cards,PlayerB_Cards';

/** Raised when the round log cannot be opened or written. */
export class RoundLogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RoundLogError';
  }
}

/** Quote a CSV field, doubling any embedded quote. */
export function quoteField(value: string): string {
  return `"${value.replace(/"/g, '""')}"`;
}

/**
 * Format one round as a CSV line (without the line terminator).
 */
export function formatRoundRecord(
  roundNumber: number,
  deckA: Deck,
  deckB: Deck,
): string {
  return [
    String(roundNumber),
    String(deckA.size()),
    String(deckB.size()),
    quoteField(deckA.render()),
    quoteField(deckB.render()),
  ].join(',');
}

/**
 * Writes the round log to a file. The file is truncated and the header
 * written on construction; call `close()` when the game is over.
 */
export class RoundLogger {
  private fd: number | null;
  private rowCount = 0;

  /**
   * @throws RoundLogError if the file cannot be opened.
   */
  constructor(readonly filePath: string) {
    try {
      this.fd = fs.openSync(filePath, 'w');
    } catch (err) {
      throw new RoundLogError(
        `Failed to open output CSV: ${filePath} (${err instanceof Error ? err.message : String(err)})`,
      );
    }
    this.writeLine(ROUND_LOG_HEADER);
  }

  /** Append the record of one round. */
  writeRound(roundNumber: number, deckA: Deck, deckB: Deck): void {
    this.writeLine(formatRoundRecord(roundNumber, deckA, deckB));
    this.rowCount++;
  }

  /**
   * Log every `round-completed` event of a two-player game.
   * Returns an unsubscribe function.
   */
  attach(events: GameEventEmitter): () => void {
    return events.on('round-completed', ({ roundNumber, decks }) => {
      const [deckA, deckB] = decks;
      this.writeRound(roundNumber, deckA, deckB);
    });
  }

  /** Number of round lines written so far. */
  get rowsWritten(): number {
    return this.rowCount;
  }

  /** Close the file. Further writes fail. Safe to call twice. */
  close(): void {
    if (this.fd === null) return;
    fs.closeSync(this.fd);
    this.fd = null;
    logDebug('Round log closed', { filePath: this.filePath, rows: this.rowCount });
  }

  private writeLine(line: string): void {
    if (this.fd === null) {
      throw new RoundLogError(`Round log already closed: ${this.filePath}`);
    }
    try {
      fs.writeSync(this.fd, `${line}\n`);
    } catch (err) {
      throw new RoundLogError(
        `Failed to write output CSV: ${this.filePath} (${err instanceof Error ? err.message : String(err)})`,
      );
    }
  }
}
