import {
  BenchmarkNotFoundError,
  BenchmarkSuite,
  type MetadataPrimitive,
} from '@runstat/core';

export interface ConversionPlan {
  includeBenchmarks?: readonly string[];
  excludeBenchmarks?: readonly string[];
  extractMetadata?: string;
  removeAllMetadata?: boolean;
  updateMetadata?: Record<string, MetadataPrimitive>;
}

/**
 * Filter and rewrite the benchmarks of `suite` in place.
 * Order: include, exclude, extract, remove, update.
 */
export function applyConversion(
  suite: BenchmarkSuite,
  plan: ConversionPlan
): BenchmarkSuite {
  let benchmarks = suite.getBenchmarks();

  if (plan.includeBenchmarks && plan.includeBenchmarks.length > 0) {
    const wanted = new Set(plan.includeBenchmarks);
    for (const name of wanted) {
      if (!suite.hasBenchmark(name)) throw new BenchmarkNotFoundError(name);
    }
    benchmarks = benchmarks.filter((benchmark) => wanted.has(benchmark.getName()));
  }
  if (plan.excludeBenchmarks && plan.excludeBenchmarks.length > 0) {
    const unwanted = new Set(plan.excludeBenchmarks);
    benchmarks = benchmarks.filter(
      (benchmark) => !unwanted.has(benchmark.getName())
    );
  }

  for (const benchmark of benchmarks) {
    if (plan.extractMetadata !== undefined) {
      benchmark.extractMetadata(plan.extractMetadata);
    }
    if (plan.removeAllMetadata === true) {
      benchmark.removeAllMetadata();
    }
    if (plan.updateMetadata) {
      benchmark.updateMetadata(plan.updateMetadata);
    }
  }

  return new BenchmarkSuite(benchmarks, suite.filename);
}

/**
 * Load `paths` into one suite; benchmarks sharing a name are merged run by run.
 */
export async function loadSuites(paths: readonly string[]): Promise<BenchmarkSuite> {
  const [first, ...rest] = paths;
  if (first === undefined) {
    throw new Error('At least one input file is required');
  }
  const suite = await BenchmarkSuite.load(first);
  for (const path of rest) {
    const other = await BenchmarkSuite.load(path);
    for (const benchmark of other.getBenchmarks()) suite.addBenchmark(benchmark);
  }
  return suite;
}
