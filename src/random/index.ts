export type { RandomSource } from './types';
export { createKeyStream, entropySeed, validateSeed, DRAW_BLOCK_SIZE } from './key-stream';
