import type { RandomSource } from '../random/types';
import { EvaluationError } from '../errors';
import { validateMetropolisConfig } from './config';
import { createMetropolisKernel, initMetropolisState } from './kernel';
import type { MetropolisConfig } from './types';

export interface MetropolisTrace {
  samples: number[];
  accepted: number;
  proposals: number;
  acceptanceRate: number;
}

interface ChainStep {
  position: number;
  isAccepted: boolean | undefined;
}

function* generateChain(
  config: MetropolisConfig,
  rng: RandomSource
): Generator<ChainStep, void, undefined> {
  const step = createMetropolisKernel(config);
  let state = initMetropolisState(config.initial);
  let generated = 1;
  yield { position: state.position, isAccepted: undefined };

  while (generated < config.chainLength) {
    let isAccepted: boolean;
    try {
      [state, { isAccepted }] = step(rng, state);
    } catch (error) {
      throw error instanceof EvaluationError ? error.atSample(generated) : error;
    }
    generated++;
    yield { position: state.position, isAccepted };
  }
}

function* dropBurnin(
  chain: Iterable<ChainStep>,
  burnin: number
): Generator<number, void, undefined> {
  let index = 0;
  for (const { position } of chain) {
    if (index++ >= burnin) {
      yield position;
    }
  }
}

/**
 * Lazily yields the chain after burn-in. The configuration is validated on
 * call; the burn-in elements are still generated, in order, before the first
 * value is yielded.
 */
export function iterateMetropolis(
  config: MetropolisConfig,
  rng: RandomSource
): Generator<number, void, undefined> {
  validateMetropolisConfig(config);
  return dropBurnin(generateChain(config, rng), config.burnin);
}

export function traceMetropolis(
  config: MetropolisConfig,
  rng: RandomSource
): MetropolisTrace {
  validateMetropolisConfig(config);
  const chain: number[] = [];
  let accepted = 0;
  for (const { position, isAccepted } of generateChain(config, rng)) {
    chain.push(position);
    if (isAccepted === true) {
      accepted++;
    }
  }

  const proposals = config.chainLength - 1;
  return {
    samples: chain.slice(config.burnin),
    accepted,
    proposals,
    acceptanceRate: proposals === 0 ? 0 : accepted / proposals,
  };
}

export function runMetropolis(
  config: MetropolisConfig,
  rng: RandomSource
): number[] {
  return traceMetropolis(config, rng).samples;
}
