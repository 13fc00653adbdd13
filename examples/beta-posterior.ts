/**
 * Example: posterior of a coin's bias after 14 heads in 20 flips with a
 * flat prior, i.e. Beta(15, 7).
 *
 * Run with: npx tsx examples/beta-posterior.ts
 */

import { Metropolis, betaDensity, normalJump, describeFailure } from '../src';

console.log('=== Metropolis Sampling from Beta(15, 7) ===\n');

try {
  const sampler = Metropolis(betaDensity(15, 7))
    .chainLength(5000)
    .burnin(1000)
    .initial(0.5)
    .jump(normalJump(0.2))
    .bounds(0, 1)
    .seed(42)
    .build();

  const { samples, acceptanceRate } = sampler.trace();
  const mean = samples.reduce((a, b) => a + b, 0) / samples.length;
  const variance = samples.reduce((a, b) => a + (b - mean) ** 2, 0) / samples.length;

  console.log('Results:');
  console.log(`  Samples kept:    ${samples.length}`);
  console.log(`  Acceptance rate: ${(acceptanceRate * 100).toFixed(1)}%`);
  console.log(`  Sample mean:     ${mean.toFixed(4)} (expected: ${(15 / 22).toFixed(4)})`);
  console.log(`  Sample std:      ${Math.sqrt(variance).toFixed(4)}`);

  console.log('\nFirst 10 samples:');
  console.log(`  [${samples.slice(0, 10).map((s) => s.toFixed(3)).join(', ')}]`);
} catch (error) {
  console.log(describeFailure(error));
  process.exitCode = 1;
}
