import { describe, it, expect } from 'vitest';
import { MAX_TIMER_MS, parseDuration, toMilliseconds } from './duration.js';
import { ValidationError } from '../errors.js';

describe('parseDuration', () => {
  it('parses each unit', () => {
    expect(parseDuration('250ms')).toBe(250);
    expect(parseDuration('45s')).toBe(45_000);
    expect(parseDuration('15m')).toBe(15 * 60 * 1000);
    expect(parseDuration('2h')).toBe(2 * 60 * 60 * 1000);
    expect(parseDuration('1d')).toBe(24 * 60 * 60 * 1000);
  });

  it('parses a plain number as milliseconds', () => {
    expect(parseDuration('500')).toBe(500);
  });

  it('rejects garbage, negatives and zero', () => {
    expect(() => parseDuration('garbage')).toThrow(ValidationError);
    expect(() => parseDuration('-5s')).toThrow(ValidationError);
    expect(() => parseDuration('0s')).toThrow(ValidationError);
  });

  it('rejects durations a timer cannot wait for', () => {
    expect(() => parseDuration('30d')).toThrow('Duration "30d" exceeds the longest supported timer');
    expect(() => parseDuration('1000h')).toThrow(ValidationError);
    expect(parseDuration('24d')).toBe(24 * 86_400_000);
    expect(parseDuration(String(MAX_TIMER_MS))).toBe(MAX_TIMER_MS);
  });
});

describe('toMilliseconds', () => {
  it('passes positive numbers through', () => {
    expect(toMilliseconds(1500)).toBe(1500);
  });

  it('rejects non-positive numbers', () => {
    expect(() => toMilliseconds(0)).toThrow(ValidationError);
    expect(() => toMilliseconds(Number.NaN)).toThrow(ValidationError);
    expect(() => toMilliseconds(MAX_TIMER_MS + 1)).toThrow(ValidationError);
  });

  it('parses strings', () => {
    expect(toMilliseconds('90s')).toBe(90_000);
  });
});
