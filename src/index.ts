export * from './metropolis';
export * from './proposals';
export * from './densities';
export * from './random';
export type { SamplerPhase, EvaluationSource, EvaluationErrorOptions } from './errors';
export {
  SamplerError,
  ConfigurationError,
  EvaluationError,
  describeFailure,
} from './errors';
