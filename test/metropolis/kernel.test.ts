import { describe, it, expect, vi } from 'vitest';
import {
  createMetropolisKernel,
  initMetropolisState,
} from '../../src/metropolis/kernel';
import type { MetropolisKernelConfig } from '../../src/metropolis/types';
import { EvaluationError } from '../../src/errors';
import { scriptedSource } from '../scripted-source';

const gaussian = (theta: number): number => Math.exp(-0.5 * theta * theta);

describe('Metropolis Kernel', () => {
  it('accepts identical proposal when the jump is zero', () => {
    const step = createMetropolisKernel({
      densityFn: gaussian,
      proposalFn: () => 0,
      lowerBound: -Infinity,
      upperBound: Infinity,
    });

    const [newState, info] = step(scriptedSource([0.99]), initMetropolisState(0.5));

    expect(info.acceptanceProb).toBe(1);
    expect(info.isAccepted).toBe(true);
    expect(newState.position).toBe(0.5);
  });

  it('rejects out-of-bounds proposals without evaluating the density', () => {
    const densityFn = vi.fn(gaussian);
    const step = createMetropolisKernel({
      densityFn,
      proposalFn: () => 5,
      lowerBound: 0,
      upperBound: 1,
    });

    const [newState, info] = step(scriptedSource([0]), initMetropolisState(0.5));

    expect(info.inBounds).toBe(false);
    expect(info.acceptanceProb).toBe(0);
    expect(info.isAccepted).toBe(false);
    expect(info.proposedPosition).toBe(5.5);
    expect(newState.position).toBe(0.5);
    expect(densityFn).not.toHaveBeenCalled();
  });

  it('treats the bounds as inclusive', () => {
    const step = createMetropolisKernel({
      densityFn: () => 1,
      proposalFn: () => 0.5,
      lowerBound: 0,
      upperBound: 1,
    });

    const [newState, info] = step(scriptedSource([0.5]), initMetropolisState(0.5));

    expect(info.inBounds).toBe(true);
    expect(newState.position).toBe(1);
  });

  it('accepts any in-bounds move from a zero-density state', () => {
    const densityFn = vi.fn((theta: number) => (theta < 1 ? 0 : 1));
    const step = createMetropolisKernel({
      densityFn,
      proposalFn: () => 1,
      lowerBound: -Infinity,
      upperBound: Infinity,
    });

    const [newState, info] = step(scriptedSource([0.999]), initMetropolisState(0));

    expect(info.acceptanceProb).toBe(1);
    expect(info.isAccepted).toBe(true);
    expect(newState.position).toBe(1);
    expect(densityFn).toHaveBeenCalledTimes(1);
    expect(densityFn).toHaveBeenCalledWith(0);
  });

  it('uses min(1, ratio) with a non-strict acceptance test', () => {
    const config: MetropolisKernelConfig = {
      densityFn: (theta) => (theta === 0 ? 2 : 1),
      proposalFn: () => 1,
      lowerBound: -Infinity,
      upperBound: Infinity,
    };
    const step = createMetropolisKernel(config);

    const [accepted, acceptedInfo] = step(scriptedSource([0.5]), initMetropolisState(0));
    expect(acceptedInfo.acceptanceProb).toBe(0.5);
    expect(acceptedInfo.isAccepted).toBe(true);
    expect(accepted).toEqual({ position: 1, density: 1 });

    const [rejected, rejectedInfo] = step(scriptedSource([0.6]), initMetropolisState(0));
    expect(rejectedInfo.isAccepted).toBe(false);
    expect(rejected).toEqual({ position: 0, density: 2 });
  });

  it('caches the current density across rejections', () => {
    const densityFn = vi.fn((theta: number) => (theta === 0 ? 1 : 0));
    const step = createMetropolisKernel({
      densityFn,
      proposalFn: () => 1,
      lowerBound: -Infinity,
      upperBound: Infinity,
    });

    let state = initMetropolisState(0);
    const rng = scriptedSource([0.1, 0.2, 0.3]);
    for (let i = 0; i < 3; i++) {
      [state] = step(rng, state);
    }

    expect(state.position).toBe(0);
    // once for the current state, once per proposal
    expect(densityFn).toHaveBeenCalledTimes(4);
    expect(densityFn.mock.calls.filter(([theta]) => theta === 0)).toHaveLength(1);
  });

  it('rejects a negative density as an evaluation error', () => {
    const step = createMetropolisKernel({
      densityFn: (theta) => (theta > 0 ? -1 : 1),
      proposalFn: () => 1,
      lowerBound: -Infinity,
      upperBound: Infinity,
    });

    const attempt = (): unknown => step(scriptedSource([0]), initMetropolisState(0));

    expect(attempt).toThrow(EvaluationError);
    expect(attempt).toThrow('density returned negative value -1 at theta=1');
  });

  it('wraps a throwing density with its argument and cause', () => {
    const cause = new RangeError('log of zero');
    const step = createMetropolisKernel({
      densityFn: () => {
        throw cause;
      },
      proposalFn: () => 1,
      lowerBound: -Infinity,
      upperBound: Infinity,
    });

    let caught: unknown;
    try {
      step(scriptedSource([0]), initMetropolisState(2));
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(EvaluationError);
    if (caught instanceof EvaluationError) {
      expect(caught.source).toBe('density');
      expect(caught.argument).toBe(2);
      expect(caught.cause).toBe(cause);
      expect(caught.phase).toBe('evaluation');
    }
  });

  it('rejects a non-finite density', () => {
    const step = createMetropolisKernel({
      densityFn: () => Number.NaN,
      proposalFn: () => 1,
      lowerBound: -Infinity,
      upperBound: Infinity,
    });

    expect(() => step(scriptedSource([0]), initMetropolisState(0))).toThrow(
      'density returned NaN at theta=0, expected a finite number'
    );
  });

  it('wraps a throwing proposal with its cause', () => {
    const cause = new Error('sampler exhausted');
    const step = createMetropolisKernel({
      densityFn: gaussian,
      proposalFn: () => {
        throw cause;
      },
      lowerBound: -Infinity,
      upperBound: Infinity,
    });

    let caught: unknown;
    try {
      step(scriptedSource([0]), initMetropolisState(0));
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(EvaluationError);
    if (caught instanceof EvaluationError) {
      expect(caught.source).toBe('proposal');
      expect(caught.cause).toBe(cause);
      expect(caught.message).toBe('proposal threw');
    }
  });

  it('rejects a proposal that is not a finite number', () => {
    const step = createMetropolisKernel({
      densityFn: gaussian,
      proposalFn: () => Infinity,
      lowerBound: -Infinity,
      upperBound: Infinity,
    });

    expect(() => step(scriptedSource([0]), initMetropolisState(0))).toThrow(
      'proposal returned Infinity, expected a finite number'
    );
  });
});
