import { ConfigurationError } from '../errors';
import type { MetropolisConfig } from './types';

export const DEFAULT_CHAIN_LENGTH = 5000;
export const DEFAULT_INITIAL = 0.5;
export const DEFAULT_JUMP_SIGMA = 0.2;
export const DEFAULT_BURNIN = 0;

export function validateBounds(lowerBound: number, upperBound: number): void {
  if (Number.isNaN(lowerBound)) {
    throw new ConfigurationError('lowerBound', 'must be a number, got NaN');
  }
  if (Number.isNaN(upperBound)) {
    throw new ConfigurationError('upperBound', 'must be a number, got NaN');
  }
  if (lowerBound > upperBound) {
    throw new ConfigurationError(
      'bounds',
      `lowerBound ${lowerBound} exceeds upperBound ${upperBound}`
    );
  }
}

export type ChainSettings = Pick<
  MetropolisConfig,
  'chainLength' | 'initial' | 'burnin' | 'lowerBound' | 'upperBound'
>;

export function validateChainSettings(settings: ChainSettings): void {
  const { chainLength, initial, burnin } = settings;

  if (!Number.isInteger(chainLength) || chainLength < 1) {
    throw new ConfigurationError(
      'chainLength',
      `must be an integer >= 1, got ${chainLength}`
    );
  }
  if (!Number.isInteger(burnin) || burnin < 0 || burnin > chainLength) {
    throw new ConfigurationError(
      'burnin',
      `must be an integer in [0, ${chainLength}], got ${burnin}`
    );
  }
  if (!Number.isFinite(initial)) {
    throw new ConfigurationError('initial', `must be finite, got ${initial}`);
  }
  validateBounds(settings.lowerBound, settings.upperBound);
}

export function validateMetropolisConfig(config: MetropolisConfig): void {
  if (typeof config.densityFn !== 'function') {
    throw new ConfigurationError('densityFn', 'must be a function');
  }
  if (typeof config.proposalFn !== 'function') {
    throw new ConfigurationError('proposalFn', 'must be a function');
  }
  validateChainSettings(config);
}
