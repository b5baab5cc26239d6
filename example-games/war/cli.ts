/**
 * Command-line front end for War.
 *
 * Usage:
 *   war_game <input.csv> <output.csv> [--max-rounds <n>]
 *
 * Loads the input deck, deals it between two players, plays until one
 * player holds every card (or the round cap is reached), narrates each
 * round on stdout and writes the CSV round log.
 *
 * Exit codes: 0 on a completed game, 1 on a usage, input or output error.
 */

import { renderCard } from '../../src/card-system/Card';
import { readDeckFile } from '../../src/card-system/DeckParser';
import type { GameEventEmitter } from '../../src/core-engine/GameEventEmitter';
import { logDebug } from '../../src/core-engine/Logger';
import { resolveWarConfig } from './WarConfig';
import { RoundLogger } from './RoundLogger';
import { PLAYER_NAMES, runWarGame, setupWarGame } from './WarGame';
import type { GameSummary } from './WarGame';

export const PROGRAM_NAME = 'war_game';

export const USAGE = `Usage: ${PROGRAM_NAME} <input.csv> <output.csv> [--max-rounds <n>]`;

interface CliArgs {
  inputPath: string;
  outputPath: string;
  maxRounds?: string;
}

/**
 * Parse argv (without the node and script entries).
 * @returns The arguments, or `null` if they do not match the usage.
 */
export function parseCliArgs(args: readonly string[]): CliArgs | null {
  const positional: string[] = [];
  let maxRounds: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--max-rounds') {
      if (i + 1 >= args.length) return null;
      maxRounds = args[++i];
    } else if (arg.startsWith('--max-rounds=')) {
      maxRounds = arg.slice('--max-rounds='.length);
    } else if (arg.startsWith('-')) {
      return null;
    } else {
      positional.push(arg);
    }
  }

  if (positional.length !== 2) return null;
  const [inputPath, outputPath] = positional;
  return { inputPath, outputPath, maxRounds };
}

/** Print round-by-round narration for a game. */
export function attachConsoleReporter(events: GameEventEmitter): void {
  events.on('round-started', ({ roundNumber }) => {
    console.log(`Round ${roundNumber}`);
  });
  events.on('cards-played', ({ cards, playerNames }) => {
    cards.forEach((card, i) => {
      console.log(`  ${playerNames[i]} plays ${renderCard(card)}`);
    });
  });
  events.on('round-completed', ({ winnerIndex, decks }) => {
    const [deckA, deckB] = decks;
    const result =
      winnerIndex === -1
        ? 'Tie: each card returns to its owner'
        : `${PLAYER_NAMES[winnerIndex]} wins the round`;
    console.log(`  ${result} (Player A: ${deckA.size()}, Player B: ${deckB.size()})`);
  });
}

function announceResult(summary: GameSummary): void {
  console.log(`Game Over after ${summary.rounds} rounds`);
  if (summary.winnerName === null) {
    console.log(`It's a tie! (${summary.reason})`);
  } else {
    console.log(`${summary.winnerName} wins the game! (${summary.reason})`);
  }
}

/**
 * Run the program.
 * @returns The process exit code.
 */
export function runCli(args: readonly string[]): number {
  const parsed = parseCliArgs(args);
  if (parsed === null) {
    console.error(USAGE);
    return 1;
  }

  let logger: RoundLogger | null = null;
  try {
    const config = resolveWarConfig(parsed.maxRounds);

    const loaded = readDeckFile(parsed.inputPath);
    if (!loaded.ok) {
      console.error(`Error: ${loaded.error.message}`);
      return 1;
    }

    const session = setupWarGame(loaded.value, { config });
    const [a, b] = session.gameState.playerStates;
    logger = new RoundLogger(parsed.outputPath);
    logger.attach(session.events);
    attachConsoleReporter(session.events);

    console.log(
      `Starting War: Player A has ${a.deck.size()} cards, Player B has ${b.deck.size()} cards`,
    );
    const summary = runWarGame(session);
    announceResult(summary);
    return 0;
  } catch (err) {
    if (err instanceof Error) {
      logDebug('War run failed', { name: err.name });
      console.error(`Error: ${err.message}`);
      return 1;
    }
    throw err;
  } finally {
    logger?.close();
  }
}
