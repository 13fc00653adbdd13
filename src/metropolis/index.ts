export type {
  DensityFn,
  ProposalFn,
  Jump,
  MetropolisState,
  MetropolisInfo,
  MetropolisKernelConfig,
  MetropolisConfig,
} from './types';
export type { MetropolisKernel } from './kernel';
export type { MetropolisTrace } from './sampler';
export type { MetropolisSampler, MetropolisSettings } from './builder';
export { Metropolis, MetropolisBuilder } from './builder';
export {
  createMetropolisKernel,
  initMetropolisState,
  evaluateDensity,
  drawProposal,
} from './kernel';
export { runMetropolis, iterateMetropolis, traceMetropolis } from './sampler';
export {
  validateMetropolisConfig,
  validateChainSettings,
  DEFAULT_CHAIN_LENGTH,
  DEFAULT_INITIAL,
  DEFAULT_JUMP_SIGMA,
  DEFAULT_BURNIN,
} from './config';
