import type { RandomSource } from '../random/types';
import { createKeyStream, entropySeed, validateSeed } from '../random/key-stream';
import { bindJump, normalJump } from '../proposals/jumps';
import { DensityRegistry, type DensityRef } from '../densities/registry';
import { ConfigurationError } from '../errors';
import type {
  DensityFn,
  Jump,
  MetropolisConfig,
  MetropolisInfo,
  MetropolisState,
} from './types';
import {
  DEFAULT_BURNIN,
  DEFAULT_CHAIN_LENGTH,
  DEFAULT_INITIAL,
  DEFAULT_JUMP_SIGMA,
  validateChainSettings,
} from './config';
import { createMetropolisKernel, initMetropolisState } from './kernel';
import {
  iterateMetropolis,
  traceMetropolis,
  type MetropolisTrace,
} from './sampler';

export interface MetropolisSettings {
  readonly densityFn: DensityFn;
  readonly jump: Jump;
  readonly chainLength: number;
  readonly initial: number;
  readonly lowerBound: number;
  readonly upperBound: number;
  readonly burnin: number;
  /** `null` seeds every run from entropy. */
  readonly seed: number | null;
}

export interface MetropolisSampler {
  settings: MetropolisSettings;
  createRandomSource: () => RandomSource;
  init: () => MetropolisState;
  step: (rng: RandomSource, state: MetropolisState) => [MetropolisState, MetropolisInfo];
  run: () => number[];
  trace: () => MetropolisTrace;
  samples: () => Generator<number, void, undefined>;
}

interface PartialConfig {
  chainLength?: number;
  initial?: number;
  jump?: Jump;
  lowerBound?: number;
  upperBound?: number;
  burnin?: number;
  seed?: number | null;
  registry?: DensityRegistry;
}

export class MetropolisBuilder {
  private constructor(
    private readonly density: DensityRef,
    private readonly config: PartialConfig
  ) {}

  static create(density: DensityRef): MetropolisBuilder {
    return new MetropolisBuilder(density, {});
  }

  chainLength(value: number): MetropolisBuilder {
    return new MetropolisBuilder(this.density, { ...this.config, chainLength: value });
  }

  initial(value: number): MetropolisBuilder {
    return new MetropolisBuilder(this.density, { ...this.config, initial: value });
  }

  jump(value: Jump): MetropolisBuilder {
    return new MetropolisBuilder(this.density, { ...this.config, jump: value });
  }

  bounds(lowerBound: number, upperBound: number): MetropolisBuilder {
    return new MetropolisBuilder(this.density, {
      ...this.config,
      lowerBound,
      upperBound,
    });
  }

  burnin(value: number): MetropolisBuilder {
    return new MetropolisBuilder(this.density, { ...this.config, burnin: value });
  }

  seed(value: number | null): MetropolisBuilder {
    return new MetropolisBuilder(this.density, { ...this.config, seed: value });
  }

  resolveWith(registry: DensityRegistry): MetropolisBuilder {
    return new MetropolisBuilder(this.density, { ...this.config, registry });
  }

  build(): MetropolisSampler {
    const settings = this.validateAndFillDefaults();

    const createRandomSource = (): RandomSource =>
      createKeyStream(settings.seed ?? entropySeed());

    const configFor = (rng: RandomSource): MetropolisConfig => ({
      densityFn: settings.densityFn,
      proposalFn: bindJump(settings.jump, rng),
      chainLength: settings.chainLength,
      initial: settings.initial,
      lowerBound: settings.lowerBound,
      upperBound: settings.upperBound,
      burnin: settings.burnin,
    });

    const init = (): MetropolisState => initMetropolisState(settings.initial);

    const step = (
      rng: RandomSource,
      state: MetropolisState
    ): [MetropolisState, MetropolisInfo] =>
      createMetropolisKernel(configFor(rng))(rng, state);

    const trace = (): MetropolisTrace => {
      const rng = createRandomSource();
      try {
        return traceMetropolis(configFor(rng), rng);
      } finally {
        rng.dispose();
      }
    };

    const run = (): number[] => trace().samples;

    function* samples(): Generator<number, void, undefined> {
      const rng = createRandomSource();
      try {
        yield* iterateMetropolis(configFor(rng), rng);
      } finally {
        rng.dispose();
      }
    }

    return { settings, createRandomSource, init, step, run, trace, samples };
  }

  private validateAndFillDefaults(): MetropolisSettings {
    const registry = this.config.registry ?? new DensityRegistry();
    const densityFn = registry.resolve(this.density);
    if (typeof densityFn !== 'function') {
      throw new ConfigurationError('density', 'must be a function or a registered name');
    }
    const jump = this.config.jump ?? normalJump(DEFAULT_JUMP_SIGMA);
    if (typeof jump !== 'function') {
      throw new ConfigurationError('jump', 'must be a function');
    }

    const settings: MetropolisSettings = {
      densityFn,
      jump,
      chainLength: this.config.chainLength ?? DEFAULT_CHAIN_LENGTH,
      initial: this.config.initial ?? DEFAULT_INITIAL,
      lowerBound: this.config.lowerBound ?? -Infinity,
      upperBound: this.config.upperBound ?? Infinity,
      burnin: this.config.burnin ?? DEFAULT_BURNIN,
      seed: this.config.seed ?? null,
    };

    validateChainSettings(settings);
    if (settings.seed !== null) {
      validateSeed(settings.seed);
    }

    return Object.freeze(settings);
  }
}

export const Metropolis = (density: DensityRef): MetropolisBuilder => {
  return MetropolisBuilder.create(density);
};
