import { describe, it, expect, vi, beforeAll, afterAll, beforeEach, afterEach } from 'vitest';
import type { MockInstance } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { USAGE, parseCliArgs, runCli } from '../../example-games/war/cli';
import { ROUND_LOG_HEADER } from '../../example-games/war/RoundLogger';

describe('war CLI', () => {
  let dir: string;
  let log: MockInstance<typeof console.log>;
  let error: MockInstance<typeof console.error>;

  /** Write an input deck into the temp directory and return its path. */
  function inputFile(name: string, text: string): string {
    const file = path.join(dir, name);
    fs.writeFileSync(file, text);
    return file;
  }

  const stdout = (): string[] => log.mock.calls.map((call) => String(call[0]));
  const stderr = (): string[] => error.mock.calls.map((call) => String(call[0]));

  beforeAll(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'war-cli-'));
  });

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  beforeEach(() => {
    log = vi.spyOn(console, 'log').mockImplementation(() => {});
    error = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('parseCliArgs', () => {
    it('should take two positional paths', () => {
      expect(parseCliArgs(['in.csv', 'out.csv'])).toEqual({
        inputPath: 'in.csv',
        outputPath: 'out.csv',
        maxRounds: undefined,
      });
    });

    it('should read --max-rounds in both forms', () => {
      expect(parseCliArgs(['--max-rounds', '5', 'in.csv', 'out.csv'])?.maxRounds).toBe('5');
      expect(parseCliArgs(['in.csv', 'out.csv', '--max-rounds=9'])?.maxRounds).toBe('9');
    });

    it.each<[string[]]>([
      [[]],
      [['in.csv']],
      [['in.csv', 'out.csv', 'extra.csv']],
      [['in.csv', 'out.csv', '--max-rounds']],
      [['in.csv', 'out.csv', '--verbose']],
    ])('should reject %j', (args) => {
      expect(parseCliArgs(args)).toBeNull();
    });
  });

  describe('runCli', () => {
    it('should print usage and fail on wrong arguments', () => {
      expect(runCli(['only-one.csv'])).toBe(1);
      expect(stderr()).toEqual([USAGE]);
      expect(USAGE).toBe('Usage: war_game <input.csv> <output.csv> [--max-rounds <n>]');
    });

    it('should fail on a missing input file', () => {
      const missing = path.join(dir, 'nope.csv');
      expect(runCli([missing, path.join(dir, 'out-missing.csv')])).toBe(1);
      expect(stderr()).toEqual([`Error: Failed to open input deck: ${missing}`]);
    });

    it('should fail on an empty input file', () => {
      const input = inputFile('empty.csv', '');
      expect(runCli([input, path.join(dir, 'out-empty.csv')])).toBe(1);
      expect(stderr()).toEqual(['Error: Empty or invalid deck source']);
    });

    it('should fail on a malformed input file', () => {
      const input = inputFile('malformed.csv', 'Hearts,2\nHearts,14\n');
      expect(runCli([input, path.join(dir, 'out-malformed.csv')])).toBe(1);
      expect(stderr()).toEqual(['Error: Malformed deck input']);
    });

    it('should fail on an invalid round cap', () => {
      const input = inputFile('cap.csv', 'Hearts,2\nSpades,3\n');
      expect(runCli([input, path.join(dir, 'out-cap.csv'), '--max-rounds', 'abc'])).toBe(1);
      expect(stderr()).toEqual([
        'Error: Invalid --max-rounds: "abc" (expected a positive integer)',
      ]);
    });

    it('should fail when the output file cannot be created', () => {
      const input = inputFile('ok.csv', 'Hearts,2\nSpades,3\n');
      const output = path.join(dir, 'no-such-dir', 'out.csv');
      expect(runCli([input, output])).toBe(1);
      expect(stderr()).toHaveLength(1);
      expect(stderr()[0].startsWith(`Error: Failed to open output CSV: ${output}`)).toBe(true);
    });

    it('should play a game, narrate it and write the round log', () => {
      const input = inputFile('ace.csv', 'Hearts,1\nSpades,2\n');
      const output = path.join(dir, 'ace-out.csv');

      expect(runCli([input, output, '--max-rounds', '50'])).toBe(0);

      expect(stdout()).toEqual([
        'Starting War: Player A has 1 cards, Player B has 1 cards',
        'Round 1',
        '  Player A plays Hearts:1',
        '  Player B plays Spades:2',
        '  Player B wins the round (Player A: 0, Player B: 2)',
        'Game Over after 1 rounds',
        'Player B wins the game! (Player B holds all cards)',
      ]);
      expect(stderr()).toEqual([]);
      expect(fs.readFileSync(output, 'utf-8')).toBe(
        `${ROUND_LOG_HEADER}\n1,0,2,"","Spades:2 Hearts:1"\n`,
      );
    });

    it('should announce a tie at the round cap', () => {
      const input = inputFile('tie.csv', 'Hearts,5\nSpades,5\n');
      const output = path.join(dir, 'tie-out.csv');

      expect(runCli([input, output, '--max-rounds=2'])).toBe(0);

      const lines = stdout();
      expect(lines).toContain('  Tie: each card returns to its owner (Player A: 1, Player B: 1)');
      expect(lines[lines.length - 1]).toBe(
        "It's a tie! (Round limit reached with equal card counts)",
      );
      expect(fs.readFileSync(output, 'utf-8').trimEnd().split('\n')).toHaveLength(3);
    });
  });
});
