import { describe, it, expect } from 'vitest';
import { parseTime, formatTime, isMinuteOfDay } from '../../src/parsers/time-parser.js';

describe('parseTime', () => {
  it('parses HH:mm and H:mm', () => {
    expect(parseTime('08:00')).toBe(480);
    expect(parseTime('8:05')).toBe(485);
    expect(parseTime('23:59')).toBe(1439);
    expect(parseTime(' 00:00 ')).toBe(0);
  });

  it('returns null for anything else', () => {
    expect(parseTime(null)).toBeNull();
    expect(parseTime('')).toBeNull();
    expect(parseTime('24:00')).toBeNull();
    expect(parseTime('12:60')).toBeNull();
    expect(parseTime('8am')).toBeNull();
  });
});

describe('formatTime', () => {
  it('pads hours and minutes', () => {
    expect(formatTime(480)).toBe('08:00');
    expect(formatTime(545)).toBe('09:05');
    expect(formatTime(0)).toBe('00:00');
  });
});

describe('isMinuteOfDay', () => {
  it('accepts whole minutes within a day', () => {
    expect(isMinuteOfDay(0)).toBe(true);
    expect(isMinuteOfDay(1439)).toBe(true);
    expect(isMinuteOfDay(1440)).toBe(false);
    expect(isMinuteOfDay(-1)).toBe(false);
    expect(isMinuteOfDay(7.5)).toBe(false);
  });
});
