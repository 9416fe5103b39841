import type { BenchmarkSuite } from '@runstat/core';

/**
 * Print what was loaded from a file to stderr.
 * Intended to be used behind the --debug flag.
 */
export function printSuiteDebug(suite: BenchmarkSuite, label: string): void {
  const names = suite.getBenchmarkNames();
  process.stderr.write(
    `[runstat] ${label}: ${suite.filename ?? '<memory>'} (${names.length} benchmarks)\n`
  );
  for (const benchmark of suite.getBenchmarks()) {
    const nsample = benchmark.getNsamplePerRun();
    process.stderr.write(
      `[runstat]   ${benchmark.getName()}: runs=${benchmark.getNrun()} ` +
        `samples/run=${nsample.value}${nsample.kind === 'average' ? ' (average)' : ''} ` +
        `unit=${benchmark.getUnit()}\n`
    );
  }
  process.stderr.write(
    `[runstat] ${label}.metadata: ${JSON.stringify(
      Object.fromEntries(
        Object.entries(suite.getMetadata()).map(([name, entry]) => [name, entry.value])
      )
    )}\n`
  );
}
