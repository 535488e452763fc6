import { describe, it, expect } from 'vitest';
import { isValidDuration, parseDuration } from '../../src/cache/duration-utils.js';

describe('Duration Utils', () => {
  it('should parse seconds', () => {
    expect(parseDuration('30s')).toBe(30000);
  });

  it('should parse minutes', () => {
    expect(parseDuration('10m')).toBe(600000);
  });

  it('should parse hours', () => {
    expect(parseDuration('2h')).toBe(7200000);
  });

  it('should parse days', () => {
    expect(parseDuration('1d')).toBe(86400000);
  });

  it('should parse weeks', () => {
    expect(parseDuration('1w')).toBe(604800000);
  });

  it('should pass numbers through', () => {
    expect(parseDuration(60000)).toBe(60000);
    expect(parseDuration(0)).toBe(0);
  });

  it('should throw on invalid input', () => {
    expect(() => parseDuration('1.5s')).toThrow('Invalid duration format: "1.5s"');
    expect(() => parseDuration(-1)).toThrow('Invalid duration: -1');
    expect(() => parseDuration(Number.POSITIVE_INFINITY)).toThrow('Invalid duration');
  });

  it('should validate durations', () => {
    expect(isValidDuration('5m')).toBe(true);
    expect(isValidDuration(100)).toBe(true);
    expect(isValidDuration('5 minutes')).toBe(false);
    expect(isValidDuration(-5)).toBe(false);
    expect(isValidDuration(undefined)).toBe(false);
  });
});
