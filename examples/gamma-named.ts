/**
 * Example: a Gamma(1, 2) target registered under a name, sampled with
 * heavy-tailed Student-t jumps on [0, Infinity) and no fixed seed.
 *
 * Run with: npx tsx examples/gamma-named.ts
 */

import {
  DensityRegistry,
  Metropolis,
  describeFailure,
  gammaDensity,
  studentTJump,
} from '../src';

const registry = new DensityRegistry({ p: gammaDensity(1, 2) });

try {
  const sampler = Metropolis('p')
    .resolveWith(registry)
    .chainLength(5000)
    .burnin(500)
    .jump(studentTJump(5))
    .bounds(0, Infinity)
    .seed(null)
    .build();

  let count = 0;
  let sum = 0;
  for (const sample of sampler.samples()) {
    count++;
    sum += sample;
  }

  console.log(`Gamma(1, 2) mean: ${(sum / count).toFixed(3)} (expected: 2.000)`);
} catch (error) {
  console.log(describeFailure(error));
  process.exitCode = 1;
}
