import type { RandomSource } from '../random/types';
import { EvaluationError } from '../errors';
import type {
  DensityFn,
  MetropolisInfo,
  MetropolisKernelConfig,
  MetropolisState,
  ProposalFn,
} from './types';

export type MetropolisKernel = (
  rng: RandomSource,
  state: MetropolisState
) => [MetropolisState, MetropolisInfo];

export function initMetropolisState(initial: number): MetropolisState {
  return { position: initial, density: undefined };
}

export function evaluateDensity(densityFn: DensityFn, theta: number): number {
  let value: unknown;
  try {
    value = densityFn(theta);
  } catch (cause) {
    throw new EvaluationError(`density threw at theta=${theta}`, {
      source: 'density',
      argument: theta,
      cause,
    });
  }
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new EvaluationError(
      `density returned ${String(value)} at theta=${theta}, expected a finite number`,
      { source: 'density', argument: theta }
    );
  }
  if (value < 0) {
    throw new EvaluationError(
      `density returned negative value ${value} at theta=${theta}`,
      { source: 'density', argument: theta }
    );
  }
  return value;
}

export function drawProposal(proposalFn: ProposalFn): number {
  let value: unknown;
  try {
    value = proposalFn();
  } catch (cause) {
    throw new EvaluationError('proposal threw', { source: 'proposal', cause });
  }
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new EvaluationError(
      `proposal returned ${String(value)}, expected a finite number`,
      { source: 'proposal' }
    );
  }
  return value;
}

export function createMetropolisKernel(
  config: MetropolisKernelConfig
): MetropolisKernel {
  const { densityFn, proposalFn, lowerBound, upperBound } = config;

  return function metropolisStep(
    rng: RandomSource,
    state: MetropolisState
  ): [MetropolisState, MetropolisInfo] {
    const proposedPosition = state.position + drawProposal(proposalFn);
    const inBounds =
      proposedPosition >= lowerBound && proposedPosition <= upperBound;

    let currentDensity = state.density;
    let proposedDensity: number | undefined;
    let acceptanceProb = 0;

    // Out-of-bounds proposals never reach the density.
    if (inBounds) {
      if (currentDensity === undefined) {
        currentDensity = evaluateDensity(densityFn, state.position);
      }
      if (currentDensity === 0) {
        acceptanceProb = 1;
      } else {
        proposedDensity = evaluateDensity(densityFn, proposedPosition);
        acceptanceProb = Math.min(1, proposedDensity / currentDensity);
      }
    }

    // Drawn on every branch so the stream stays aligned across runs. A draw
    // of exactly 0 must not carry the chain out of bounds.
    const u = rng.uniform();
    const isAccepted = inBounds && u <= acceptanceProb;

    const newState: MetropolisState = isAccepted
      ? { position: proposedPosition, density: proposedDensity }
      : { position: state.position, density: currentDensity };

    const info: MetropolisInfo = {
      proposedPosition,
      acceptanceProb,
      isAccepted,
      inBounds,
    };

    return [newState, info];
  };
}
