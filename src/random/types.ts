export interface RandomSource {
  /**
   * Uniform draw on [0, 1). The key stream draws float32 values, so draws
   * sit on a 2^-24 grid and 0 comes up with probability about 6e-8:
   * acceptance probabilities below that are accepted slightly too often.
   */
  uniform: () => number;
  /** Standard normal draw. */
  normal: () => number;
  dispose: () => void;
}
