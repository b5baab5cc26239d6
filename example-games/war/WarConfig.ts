/**
 * Configuration for a War run.
 *
 * The round cap is resolved from, in order: an explicit value (the
 * CLI's `--max-rounds`), the `WAR_MAX_ROUNDS` environment variable,
 * and the default.
 */

export const DEFAULT_MAX_ROUNDS = 1000;

export interface WarConfig {
  /** Rounds played before the game is stopped and decided on card count. */
  readonly maxRounds: number;
}

/**
 * Parse a round cap. Only positive base-10 integers are accepted.
 *
 * @throws If the value is not a positive integer.
 */
export function parseMaxRounds(raw: string, source: string): number {
  const value = /^[0-9]+$/.test(raw) ? Number.parseInt(raw, 10) : Number.NaN;
  if (!Number.isSafeInteger(value) || value < 1) {
    throw new Error(
      `Invalid ${source}: "${raw}" (expected a positive integer)`,
    );
  }
  return value;
}

/**
 * Build the effective configuration.
 *
 * @param maxRoundsArg  Raw `--max-rounds` value, if given.
 * @throws If a supplied value is invalid.
 */
export function resolveWarConfig(
  maxRoundsArg?: string,
  env: NodeJS.ProcessEnv = process.env,
): WarConfig {
  if (maxRoundsArg !== undefined) {
    return { maxRounds: parseMaxRounds(maxRoundsArg, '--max-rounds') };
  }
  const fromEnv = env.WAR_MAX_ROUNDS;
  if (fromEnv !== undefined && fromEnv !== '') {
    return { maxRounds: parseMaxRounds(fromEnv, 'WAR_MAX_ROUNDS') };
  }
  return { maxRounds: DEFAULT_MAX_ROUNDS };
}
