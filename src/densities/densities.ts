import jStat from 'jstat';
import type { DensityFn } from '../metropolis/types';
import { ConfigurationError } from '../errors';

function requirePositive(field: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigurationError(field, `must be a positive number, got ${value}`);
  }
}

export function betaDensity(alpha: number, beta: number): DensityFn {
  requirePositive('alpha', alpha);
  requirePositive('beta', beta);
  return (theta) =>
    theta < 0 || theta > 1 ? 0 : jStat.beta.pdf(theta, alpha, beta);
}

export function gammaDensity(shape: number, scale: number): DensityFn {
  requirePositive('shape', shape);
  requirePositive('scale', scale);
  return (theta) => (theta < 0 ? 0 : jStat.gamma.pdf(theta, shape, scale));
}

export function normalDensity(mean: number, sd: number): DensityFn {
  if (!Number.isFinite(mean)) {
    throw new ConfigurationError('mean', `must be finite, got ${mean}`);
  }
  requirePositive('sd', sd);
  return (theta) => jStat.normal.pdf(theta, mean, sd);
}

export function uniformDensity(min: number, max: number): DensityFn {
  if (!Number.isFinite(min) || !Number.isFinite(max) || min >= max) {
    throw new ConfigurationError(
      'support',
      `expected finite min < max, got [${min}, ${max}]`
    );
  }
  return (theta) => jStat.uniform.pdf(theta, min, max);
}
