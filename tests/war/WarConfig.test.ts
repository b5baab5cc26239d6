import { describe, it, expect } from 'vitest';
import {
  DEFAULT_MAX_ROUNDS,
  parseMaxRounds,
  resolveWarConfig,
} from '../../example-games/war/WarConfig';

describe('WarConfig', () => {
  describe('parseMaxRounds', () => {
    it('should accept positive integers', () => {
      expect(parseMaxRounds('1', 'cap')).toBe(1);
      expect(parseMaxRounds('250', 'cap')).toBe(250);
    });

    it.each(['0', '-5', 'abc', '2.5', '', ' 10'])('should reject %j', (raw) => {
      expect(() => parseMaxRounds(raw, 'cap')).toThrow(
        `Invalid cap: "${raw}" (expected a positive integer)`,
      );
    });
  });

  describe('resolveWarConfig', () => {
    it('should use the default cap', () => {
      expect(resolveWarConfig(undefined, {})).toEqual({ maxRounds: DEFAULT_MAX_ROUNDS });
      expect(DEFAULT_MAX_ROUNDS).toBe(1000);
    });

    it('should read WAR_MAX_ROUNDS', () => {
      expect(resolveWarConfig(undefined, { WAR_MAX_ROUNDS: '40' })).toEqual({ maxRounds: 40 });
    });

    it('should ignore an empty WAR_MAX_ROUNDS', () => {
      expect(resolveWarConfig(undefined, { WAR_MAX_ROUNDS: '' })).toEqual({
        maxRounds: DEFAULT_MAX_ROUNDS,
      });
    });

    it('should prefer the explicit value over the environment', () => {
      expect(resolveWarConfig('7', { WAR_MAX_ROUNDS: '40' })).toEqual({ maxRounds: 7 });
    });

    it('should name the source of an invalid value', () => {
      expect(() => resolveWarConfig(undefined, { WAR_MAX_ROUNDS: 'x' })).toThrow(
        'Invalid WAR_MAX_ROUNDS',
      );
      expect(() => resolveWarConfig('0', {})).toThrow('Invalid --max-rounds');
    });
  });
});
