export type SamplerPhase = 'configuration' | 'evaluation';

export abstract class SamplerError extends Error {
  abstract readonly phase: SamplerPhase;
}

/**
 * Invalid sampler settings. Always raised before the first transition.
 */
export class ConfigurationError extends SamplerError {
  readonly phase = 'configuration' as const;

  constructor(
    readonly field: string,
    message: string
  ) {
    super(`${field}: ${message}`);
    this.name = 'ConfigurationError';
  }
}

export type EvaluationSource = 'density' | 'proposal';

export interface EvaluationErrorOptions {
  source: EvaluationSource;
  argument?: number;
  samplesGenerated?: number;
  cause?: unknown;
}

/**
 * A user-supplied density or proposal failed mid-chain. `samplesGenerated`
 * counts emitted elements, burn-in included.
 */
export class EvaluationError extends SamplerError {
  readonly phase = 'evaluation' as const;
  readonly source: EvaluationSource;
  readonly argument: number | undefined;
  readonly samplesGenerated: number | undefined;

  constructor(message: string, options: EvaluationErrorOptions) {
    super(message, { cause: options.cause });
    this.name = 'EvaluationError';
    this.source = options.source;
    this.argument = options.argument;
    this.samplesGenerated = options.samplesGenerated;
  }

  atSample(samplesGenerated: number): EvaluationError {
    return new EvaluationError(this.message, {
      source: this.source,
      argument: this.argument,
      samplesGenerated,
      cause: this.cause,
    });
  }
}

export function describeFailure(error: unknown): string {
  if (error instanceof ConfigurationError) {
    return `configuration validation failed: ${error.message}`;
  }
  if (error instanceof EvaluationError) {
    const progress =
      error.samplesGenerated === undefined
        ? ''
        : ` after ${error.samplesGenerated} samples`;
    return `${error.source} evaluation failed${progress}: ${error.message}`;
  }
  return error instanceof Error ? error.message : String(error);
}
