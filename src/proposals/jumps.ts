import type { RandomSource } from '../random/types';
import type { Jump, ProposalFn } from '../metropolis/types';
import { ConfigurationError } from '../errors';

function requirePositive(field: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigurationError(field, `must be a positive number, got ${value}`);
  }
}

/** Normal(0, sigma) jumps. */
export function normalJump(sigma: number): Jump {
  requirePositive('sigma', sigma);
  return (rng) => rng.normal() * sigma;
}

/** Uniform(-halfWidth, halfWidth) jumps. */
export function uniformJump(halfWidth: number): Jump {
  requirePositive('halfWidth', halfWidth);
  return (rng) => (2 * rng.uniform() - 1) * halfWidth;
}

/**
 * Student-t jumps with an integer number of degrees of freedom, drawn as
 * Z / sqrt(V / df) with V the sum of `df` squared normals.
 */
export function studentTJump(df: number, scale = 1): Jump {
  if (!Number.isInteger(df) || df < 1) {
    throw new ConfigurationError('df', `must be an integer >= 1, got ${df}`);
  }
  requirePositive('scale', scale);
  return (rng) => {
    const z = rng.normal();
    let chiSquare = 0;
    for (let i = 0; i < df; i++) {
      const n = rng.normal();
      chiSquare += n * n;
    }
    return (scale * z) / Math.sqrt(chiSquare / df);
  };
}

/**
 * Always jumps by `delta`. Only symmetric for `delta = 0`; meant for
 * deterministic chains and boundary checks.
 */
export function fixedJump(delta: number): Jump {
  if (!Number.isFinite(delta)) {
    throw new ConfigurationError('delta', `must be finite, got ${delta}`);
  }
  return () => delta;
}

export function bindJump(jump: Jump, rng: RandomSource): ProposalFn {
  return () => jump(rng);
}
