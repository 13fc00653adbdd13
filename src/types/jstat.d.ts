// jstat ships no type declarations.
declare module 'jstat' {
  interface ContinuousDistribution<Params extends unknown[]> {
    pdf(x: number, ...params: Params): number;
  }

  export interface JStat {
    beta: ContinuousDistribution<[alpha: number, beta: number]>;
    gamma: ContinuousDistribution<[shape: number, scale: number]>;
    normal: ContinuousDistribution<[mean: number, std: number]>;
    uniform: ContinuousDistribution<[a: number, b: number]>;
  }

  const jStat: JStat;
  export default jStat;
}
