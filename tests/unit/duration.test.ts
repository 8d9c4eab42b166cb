/**
 * Unit Tests: Duration Parsing
 */

import { describe, it, expect } from 'vitest';
import { parseDuration } from '../../src/utils/duration.js';
import { InvalidParameterError } from '../../src/errors.js';

describe('parseDuration', () => {
  it('reads single units', () => {
    expect(parseDuration('2m')).toBe(120000);
    expect(parseDuration('45s')).toBe(45000);
    expect(parseDuration('1h')).toBe(3600000);
    expect(parseDuration('250ms')).toBe(250);
  });

  it('adds up compound durations', () => {
    expect(parseDuration('1h2m10s')).toBe(3730000);
  });

  it('accepts fractions and a bare zero', () => {
    expect(parseDuration('1.5m')).toBe(90000);
    expect(parseDuration('0')).toBe(0);
  });

  it('rejects numbers without a unit and unknown units', () => {
    expect(() => parseDuration('10')).toThrow(InvalidParameterError);
    expect(() => parseDuration('3d')).toThrow('invalid argument: 3d');
    expect(() => parseDuration('')).toThrow(InvalidParameterError);
  });
});
