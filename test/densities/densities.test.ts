import { describe, it, expect } from 'vitest';
import {
  betaDensity,
  gammaDensity,
  normalDensity,
  uniformDensity,
} from '../../src/densities/densities';
import { ConfigurationError } from '../../src/errors';

describe('densities', () => {
  it('beta', () => {
    const density = betaDensity(2, 2);

    expect(density(0.5)).toBeCloseTo(1.5, 6);
    expect(density(0.25)).toBeCloseTo(6 * 0.25 * 0.75, 6);
    expect(density(-0.1)).toBe(0);
    expect(density(1.1)).toBe(0);
  });

  it('gamma', () => {
    const density = gammaDensity(1, 2);

    expect(density(2)).toBeCloseTo(0.5 * Math.exp(-1), 6);
    expect(density(-1)).toBe(0);
  });

  it('normal', () => {
    const density = normalDensity(1, 2);

    expect(density(1)).toBeCloseTo(1 / (2 * Math.sqrt(2 * Math.PI)), 10);
    expect(density(3)).toBeCloseTo(Math.exp(-0.5) / (2 * Math.sqrt(2 * Math.PI)), 10);
  });

  it('uniform', () => {
    const density = uniformDensity(0, 4);

    expect(density(1)).toBe(0.25);
    expect(density(5)).toBe(0);
  });

  it.each([
    () => betaDensity(0, 1),
    () => gammaDensity(1, -2),
    () => normalDensity(0, 0),
    () => normalDensity(Infinity, 1),
    () => uniformDensity(1, 1),
  ])('rejects invalid parameters (%#)', (create) => {
    expect(create).toThrow(ConfigurationError);
  });
});
