import { random, type Array } from '@jax-js/jax';
import type { RandomSource } from './types';
import { ConfigurationError } from '../errors';

const MAX_SEED = 2 ** 31 - 1;

export const DRAW_BLOCK_SIZE = 4096;

export function entropySeed(): number {
  return Math.floor(Math.random() * MAX_SEED);
}

export function validateSeed(seed: number): void {
  if (!Number.isInteger(seed) || seed < 0 || seed > MAX_SEED) {
    throw new ConfigurationError(
      'seed',
      `must be an integer in [0, ${MAX_SEED}], got ${seed}`
    );
  }
}

type Sampler = (key: Array, shape: number[]) => Array;

/**
 * A random stream over a jax-js PRNG key. Draws are served from blocks of
 * `blockSize` values; each refill splits the carried key once, so two streams
 * built from the same seed and block size produce the same draws and streams
 * never share state.
 */
export function createKeyStream(
  seed: number,
  blockSize: number = DRAW_BLOCK_SIZE
): RandomSource {
  validateSeed(seed);
  if (!Number.isInteger(blockSize) || blockSize < 1) {
    throw new ConfigurationError(
      'blockSize',
      `must be an integer >= 1, got ${blockSize}`
    );
  }

  let key: Array | null = random.key(seed);

  const nextKey = (): Array => {
    if (key === null) {
      throw new Error('random stream used after dispose');
    }
    const [carry, subkey] = random.split(key, 2) as unknown as [Array, Array];
    key = carry;
    return subkey;
  };

  const buffered = (sample: Sampler): (() => number) => {
    let block: number[] = [];
    let next = 0;
    return () => {
      if (key === null) {
        throw new Error('random stream used after dispose');
      }
      if (next >= block.length) {
        block = sample(nextKey(), [blockSize]).js() as number[];
        next = 0;
      }
      const value = block[next++];
      if (value === undefined) {
        throw new Error(`random block of ${blockSize} came back empty`);
      }
      return value;
    };
  };

  return {
    uniform: buffered((subkey, shape) => random.uniform(subkey, shape)),
    normal: buffered((subkey, shape) => random.normal(subkey, shape)),
    dispose: () => {
      key?.dispose();
      key = null;
    },
  };
}
