import { describe, it, expect } from 'vitest';
import { formatDuration, formatPair, formatValue } from './value.js';

describe('formatValue', () => {
  it('shows values under a thousand as integers', () => {
    expect(formatValue(0)).toBe('0');
    expect(formatValue(999)).toBe('999');
    expect(formatValue(12.6)).toBe('13');
  });

  it('abbreviates along the K/M/G/T ladder', () => {
    expect(formatValue(1500)).toBe('2K');
    expect(formatValue(12_345_678)).toBe('12M');
    expect(formatValue(1e9)).toBe('1G');
    expect(formatValue(3.2e12)).toBe('3T');
  });

  it('moves to the next suffix when rounding reaches a thousand', () => {
    expect(formatValue(999_999)).toBe('1M');
    expect(formatValue(999_500_000_000)).toBe('1T');
  });

  it('keeps T as the largest suffix', () => {
    expect(formatValue(5e15)).toBe('5000T');
  });
});

describe('formatPair', () => {
  it('joins both sides', () => {
    expect(formatPair(3, 2000)).toBe('3 / 2K');
  });

  it('marks a missing side with a dash', () => {
    expect(formatPair(3, undefined)).toBe('3 / -');
    expect(formatPair(undefined, undefined)).toBeUndefined();
  });
});

describe('formatDuration', () => {
  it('formats seconds as a clock', () => {
    expect(formatDuration(3725)).toBe('1:02:05');
    expect(formatDuration(0)).toBe('0:00:00');
  });

  it('prefixes whole days', () => {
    expect(formatDuration(90_061)).toBe('1 day, 1:01:01');
    expect(formatDuration(2 * 86_400)).toBe('2 days, 0:00:00');
  });

  it('keeps the sign of a negative lag', () => {
    expect(formatDuration(-5)).toBe('-0:00:05');
  });

  it('leaves unknown durations blank', () => {
    expect(formatDuration(undefined)).toBeUndefined();
  });
});
