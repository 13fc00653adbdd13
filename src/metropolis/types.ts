import type { RandomSource } from '../random/types';

/** Unnormalized target density. Must be finite and non-negative. */
export type DensityFn = (theta: number) => number;

/**
 * Draws one jump Δθ. The distribution must be symmetric around zero for the
 * Metropolis acceptance ratio to hold; this is not checked.
 */
export type ProposalFn = () => number;

/** A jump distribution not yet bound to a random stream. */
export type Jump = (rng: RandomSource) => number;

export interface MetropolisState {
  position: number;
  /** Density at `position`, filled in the first time a transition needs it. */
  density: number | undefined;
}

export interface MetropolisInfo {
  proposedPosition: number;
  acceptanceProb: number;
  isAccepted: boolean;
  inBounds: boolean;
}

export interface MetropolisKernelConfig {
  densityFn: DensityFn;
  proposalFn: ProposalFn;
  lowerBound: number;
  upperBound: number;
}

export interface MetropolisConfig extends MetropolisKernelConfig {
  chainLength: number;
  initial: number;
  burnin: number;
}
