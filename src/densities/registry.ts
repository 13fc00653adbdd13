import type { DensityFn } from '../metropolis/types';
import { ConfigurationError } from '../errors';

export type DensityRef = DensityFn | string;

/**
 * Named density functions, so configuration can refer to a density by name
 * instead of carrying the function itself.
 */
export class DensityRegistry {
  private readonly entries = new Map<string, DensityFn>();

  constructor(entries: Record<string, DensityFn> = {}) {
    for (const [name, densityFn] of Object.entries(entries)) {
      this.register(name, densityFn);
    }
  }

  register(name: string, densityFn: DensityFn): this {
    if (name.length === 0) {
      throw new ConfigurationError('density', 'name must not be empty');
    }
    if (typeof densityFn !== 'function') {
      throw new ConfigurationError('density', `"${name}" is not a function`);
    }
    this.entries.set(name, densityFn);
    return this;
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  names(): string[] {
    return [...this.entries.keys()];
  }

  resolve(ref: DensityRef): DensityFn {
    if (typeof ref !== 'string') {
      return ref;
    }
    const densityFn = this.entries.get(ref);
    if (densityFn === undefined) {
      throw new ConfigurationError('density', `no density registered as "${ref}"`);
    }
    return densityFn;
  }
}
