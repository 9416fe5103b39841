import { ErrorCode } from '../errors/codes.js';
import {
  ArgumentTypeError,
  BenchmarkNotFoundError,
  ValidationError,
} from '../types/errors.js';
import {
  commonMetadata,
  metadataToRecord,
  type MetadataValue,
} from '../metadata/metadata.js';
import {
  buildSuiteDocument,
  expandSuiteDocument,
  parseSuiteDocument,
} from '../persistence/document.js';
import {
  readDocument,
  writeDocument,
  type WriteDocumentOptions,
} from '../persistence/io.js';
import {
  Benchmark,
  benchmarkFromDocument,
  toDocumentError,
  widenDateRange,
  type DateRange,
} from './benchmark.js';

/**
 * Benchmarks keyed by name, persisted as one file.
 */
export class BenchmarkSuite {
  readonly #benchmarks = new Map<string, Benchmark>();
  /** Path the suite was loaded from or last dumped to */
  filename: string | undefined;

  constructor(benchmarks: readonly Benchmark[] = [], filename?: string) {
    for (const benchmark of benchmarks) {
      BenchmarkSuite.#checkBenchmarkType(benchmark);
      const name = benchmark.getName();
      if (this.#benchmarks.has(name)) {
        throw new ValidationError(`Duplicate benchmark name: ${name}`, {
          errorCode: ErrorCode.DUPLICATE_BENCHMARK,
          context: { benchmark: name },
        });
      }
      this.#benchmarks.set(name, benchmark);
    }
    this.filename = filename;
  }

  static #checkBenchmarkType(benchmark: unknown): asserts benchmark is Benchmark {
    if (!(benchmark instanceof Benchmark)) {
      throw new ArgumentTypeError('Expected a Benchmark', {
        context: { value: benchmark },
      });
    }
  }

  static async load(path: string): Promise<BenchmarkSuite> {
    const document = parseSuiteDocument(await readDocument(path), path);
    const benchmarks = expandSuiteDocument(document).map((records) =>
      benchmarkFromDocument(records, path)
    );
    // Files produced by concatenating dumps may repeat a name
    const suite = new BenchmarkSuite([], path);
    try {
      for (const benchmark of benchmarks) suite.addBenchmark(benchmark);
    } catch (error) {
      throw toDocumentError(error, path);
    }
    return suite;
  }

  async dump(path: string, options: WriteDocumentOptions = {}): Promise<void> {
    const document = buildSuiteDocument(
      this.getBenchmarks().map((benchmark) => benchmark.toRecords())
    );
    await writeDocument(path, document, options);
    this.filename = path;
  }

  get size(): number {
    return this.#benchmarks.size;
  }

  /** Merge into the benchmark of the same name, or insert it */
  addBenchmark(benchmark: Benchmark): void {
    BenchmarkSuite.#checkBenchmarkType(benchmark);
    const existing = this.#benchmarks.get(benchmark.getName());
    if (existing) {
      existing.addRuns(benchmark);
      return;
    }
    this.#benchmarks.set(benchmark.getName(), benchmark);
  }

  addRuns(benchmark: Benchmark): void {
    this.addBenchmark(benchmark);
  }

  getBenchmark(name: string): Benchmark {
    const benchmark = this.#benchmarks.get(name);
    if (!benchmark) {
      throw new BenchmarkNotFoundError(name);
    }
    return benchmark;
  }

  hasBenchmark(name: string): boolean {
    return this.#benchmarks.has(name);
  }

  getBenchmarkNames(): string[] {
    return [...this.#benchmarks.keys()].sort();
  }

  /** Sorted by name */
  getBenchmarks(): Benchmark[] {
    return this.getBenchmarkNames().map((name) => this.getBenchmark(name));
  }

  /** Metadata identical in every run of every benchmark */
  getMetadata(): Record<string, MetadataValue> {
    return metadataToRecord(
      commonMetadata(this.getBenchmarks().map((benchmark) => benchmark.metadataMap()))
    );
  }

  getTotalDuration(): number {
    return this.getBenchmarks().reduce(
      (total, benchmark) => total + benchmark.getTotalDuration(),
      0
    );
  }

  getDates(): DateRange | undefined {
    return this.getBenchmarks().reduce<DateRange | undefined>(
      (range, benchmark) => widenDateRange(range, benchmark.getDates()),
      undefined
    );
  }
}
