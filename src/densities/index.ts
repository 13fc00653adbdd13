export type { DensityRef } from './registry';
export { DensityRegistry } from './registry';
export {
  betaDensity,
  gammaDensity,
  normalDensity,
  uniformDensity,
} from './densities';
