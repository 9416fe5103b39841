import { ErrorCode } from '../errors/codes.js';
import {
  ArgumentTypeError,
  IncompatibilityError,
  PersistenceError,
  StateError,
  ValidationError,
} from '../types/errors.js';
import {
  CHECKED_METADATA_KEYS,
  PROTECTED_METADATA_KEYS,
  commonMetadata,
  metadataToInput,
  metadataToRecord,
  parseMetadata,
  type MetadataInput,
  type MetadataPrimitive,
  type MetadataValue,
} from '../metadata/metadata.js';
import {
  formatSamples,
  isBenchmarkUnit,
  type BenchmarkUnit,
} from '../format/units.js';
import * as stats from '../stats/stats.js';
import {
  buildSuiteDocument,
  expandSuiteDocument,
  parseSuiteDocument,
  type RunRecord,
} from '../persistence/document.js';
import {
  readDocument,
  writeDocument,
  type WriteDocumentOptions,
} from '../persistence/io.js';
import { Run } from './run.js';

/**
 * Per-run count that is either identical for every run or an average.
 * Callers use `kind` to detect non-uniform benchmarks.
 */
export type RunCount =
  | { kind: 'exact'; value: number }
  | { kind: 'average'; value: number };

/** Keys that update_metadata() may not change */
const IMMUTABLE_METADATA_KEYS = ['name', 'inner_loops'] as const;

function describeValue(value: MetadataValue | undefined): string {
  return value === undefined ? '<missing>' : JSON.stringify(value.value);
}

function countPerRun(counts: readonly number[]): RunCount {
  const [first = 0] = counts;
  if (counts.every((count) => count === first)) {
    return { kind: 'exact', value: first };
  }
  return { kind: 'average', value: stats.mean(counts) };
}

export type DateRange = [Date, Date];

/** Smallest range covering both */
export function widenDateRange(
  range: DateRange | undefined,
  other: DateRange | undefined
): DateRange | undefined {
  if (!range) return other;
  if (!other) return range;
  return [
    other[0].getTime() < range[0].getTime() ? other[0] : range[0],
    other[1].getTime() > range[1].getTime() ? other[1] : range[1],
  ];
}

function extractedUnit(entries: readonly MetadataValue[]): BenchmarkUnit {
  const [first] = entries;
  if (first?.unit === 'byte') return 'byte';
  if (first?.unit === 'duration') return 'second';
  return entries.every((entry) => Number.isInteger(entry.value))
    ? 'integer'
    : 'number';
}

/** @internal Model rule failures in a loaded file are document errors */
export function benchmarkFromDocument(
  records: readonly RunRecord[],
  path: string
): Benchmark {
  try {
    return Benchmark.fromRecords(records);
  } catch (error) {
    throw toDocumentError(error, path);
  }
}

/** @internal */
export function toDocumentError(error: unknown, path: string): PersistenceError {
  if (error instanceof PersistenceError) return error;
  const reason = error instanceof Error ? error.message : String(error);
  return new PersistenceError(`Invalid document ${path}: ${reason}`, {
    errorCode: ErrorCode.DOCUMENT_INVALID,
    path,
    cause: error instanceof Error ? error : undefined,
  });
}

/**
 * A named, ordered group of compatible runs.
 */
export class Benchmark {
  #runs: Run[] = [];

  constructor(runs: readonly Run[]) {
    if (!Array.isArray(runs) || runs.length === 0) {
      throw new ValidationError('Benchmark needs at least one run', {
        errorCode: ErrorCode.INVALID_BENCHMARK,
      });
    }

    const names = new Set<string>();
    runs.forEach((run, index) => {
      Benchmark.#checkRunType(run);
      const name = run.getName();
      if (name === undefined) {
        throw new ValidationError(`Run #${index + 1} has no name metadata`, {
          errorCode: ErrorCode.INVALID_BENCHMARK,
        });
      }
      names.add(name);
    });
    if (names.size > 1) {
      throw new ValidationError(
        `Runs belong to different benchmarks: ${[...names].join(', ')}`,
        { errorCode: ErrorCode.INVALID_BENCHMARK }
      );
    }

    for (const run of runs) this.addRun(run);
  }

  static #checkRunType(run: unknown): asserts run is Run {
    if (!(run instanceof Run)) {
      throw new ArgumentTypeError(
        `Expected a Run, got ${Array.isArray(run) ? 'an array' : typeof run}`,
        { context: { value: run } }
      );
    }
  }

  /** @internal Build from persisted run records */
  static fromRecords(records: readonly RunRecord[]): Benchmark {
    return new Benchmark(records.map((record) => Run.fromRecord(record)));
  }

  /**
   * Load a file holding exactly one benchmark.
   */
  static async load(path: string): Promise<Benchmark> {
    const document = parseSuiteDocument(await readDocument(path), path);
    const benchmarks = expandSuiteDocument(document);
    const [records] = benchmarks;
    if (benchmarks.length !== 1 || !records) {
      throw new PersistenceError(
        `${path} contains ${benchmarks.length} benchmarks, expected exactly one`,
        { errorCode: ErrorCode.DOCUMENT_INVALID, path }
      );
    }
    return benchmarkFromDocument(records, path);
  }

  async dump(path: string, options: WriteDocumentOptions = {}): Promise<void> {
    await writeDocument(path, buildSuiteDocument([this.toRecords()]), options);
  }

  #checkCompatible(run: Run): void {
    const first = this.#runs[0];
    if (!first) return;

    for (const key of CHECKED_METADATA_KEYS) {
      const expected = first.getMetadataValue(key);
      const actual = run.getMetadataValue(key);
      const same =
        expected === undefined
          ? actual === undefined
          : actual !== undefined && expected.equals(actual);
      if (!same) {
        throw new IncompatibilityError(
          `Incompatible run, metadata ${key} is different: ` +
            `benchmark=${describeValue(expected)}, run=${describeValue(actual)}`,
          {
            context: {
              benchmark: this.getName(),
              key,
              value: actual?.value,
              expected: expected?.value,
            },
          }
        );
      }
    }
  }

  addRun(run: Run): void {
    Benchmark.#checkRunType(run);
    this.#checkCompatible(run);
    this.#runs.push(run);
  }

  /**
   * Append every run of `other`. Nothing is appended unless all runs fit.
   */
  addRuns(other: Benchmark): void {
    if (!(other instanceof Benchmark)) {
      throw new ArgumentTypeError('Expected a Benchmark', {
        context: { value: other },
      });
    }
    if (other.getName() !== this.getName()) {
      throw new IncompatibilityError(
        `Cannot merge benchmark ${JSON.stringify(other.getName())} ` +
          `into ${JSON.stringify(this.getName())}`,
        {
          errorCode: ErrorCode.INCOMPATIBLE_BENCHMARK,
          context: { benchmark: this.getName(), value: other.getName() },
        }
      );
    }
    const incoming = other.getRuns();
    for (const run of incoming) this.#checkCompatible(run);
    this.#runs.push(...incoming);
  }

  getName(): string {
    const name = this.#runs[0]?.getName();
    if (name === undefined) {
      throw new StateError('Benchmark has no name', {
        errorCode: ErrorCode.INVALID_BENCHMARK,
      });
    }
    return name;
  }

  getUnit(): BenchmarkUnit {
    const unit = this.#runs[0]?.getMetadataValue('unit')?.value;
    return isBenchmarkUnit(unit) ? unit : 'second';
  }

  getRuns(): Run[] {
    return [...this.#runs];
  }

  getNrun(): number {
    return this.#runs.length;
  }

  getSamples(): number[] {
    return this.#runs.flatMap((run) => run.samples);
  }

  getNsample(): number {
    return this.#runs.reduce((total, run) => total + run.samples.length, 0);
  }

  getRawSamples(): number[] {
    return this.#runs.flatMap((run) => run.getRawSamples());
  }

  getNsamplePerRun(): RunCount {
    return countPerRun(this.#runs.map((run) => run.samples.length));
  }

  getNwarmup(): RunCount {
    return countPerRun(this.#runs.map((run) => run.warmups.length));
  }

  /** Every run is warmup-only */
  isCalibration(): boolean {
    return this.#runs.every((run) => run.isCalibration());
  }

  /** Loop count settled on by the last calibration run */
  getCalibrationLoops(): number {
    const last = this.#runs[this.#runs.length - 1];
    const loops = last?.getMetadataValue('loops')?.value;
    if (typeof loops === 'number') return loops;
    const lastWarmup = last?.warmups[last.warmups.length - 1];
    return lastWarmup ? lastWarmup[0] : 1;
  }

  #requireSamples(operation: string, minimum = 1): number[] {
    const samples = this.getSamples();
    if (samples.length < minimum) {
      const reason = this.isCalibration()
        ? 'a calibration benchmark has no samples'
        : `need at least ${minimum} samples`;
      throw new StateError(`Cannot compute ${operation}: ${reason}`, {
        errorCode: ErrorCode.NO_SAMPLES,
        context: { benchmark: this.getName() },
      });
    }
    return samples;
  }

  min(): number {
    return stats.min(this.#requireSamples('minimum'));
  }

  max(): number {
    return stats.max(this.#requireSamples('maximum'));
  }

  median(): number {
    return stats.median(this.#requireSamples('median'));
  }

  mean(): number {
    return stats.mean(this.#requireSamples('mean'));
  }

  stdev(): number {
    return stats.stdev(this.#requireSamples('standard deviation', 2));
  }

  getTotalDuration(): number {
    return this.#runs.reduce((total, run) => total + run.getDuration(), 0);
  }

  /** `[earliest start, latest end]` across dated runs */
  getDates(): DateRange | undefined {
    return this.#runs.reduce<DateRange | undefined>(
      (range, run) => widenDateRange(range, run.getDateRange()),
      undefined
    );
  }

  /** Metadata identical in every run */
  getMetadata(): Record<string, MetadataValue> {
    return metadataToRecord(this.metadataMap());
  }

  /** @internal */
  metadataMap(): Map<string, MetadataValue> {
    return commonMetadata(this.#runs.map((run) => run.metadataMap()));
  }

  /**
   * Replace every run's samples with its numeric metadata value `name`.
   * Warmups and loop counts are dropped; the unit follows the metadata unit,
   * `integer` for whole counts and `number` otherwise.
   */
  extractMetadata(name: string): void {
    const entries = this.#runs.map((run, index) => {
      const entry = run.getMetadataValue(name);
      if (!entry) {
        throw new ValidationError(`Run #${index + 1} has no ${name} metadata`, {
          errorCode: ErrorCode.INVALID_METADATA,
          context: { benchmark: this.getName(), key: name },
        });
      }
      if (typeof entry.value !== 'number') {
        throw new ValidationError(
          `Metadata ${name} is not numeric: ${JSON.stringify(entry.value)}`,
          {
            errorCode: ErrorCode.INVALID_METADATA,
            context: { benchmark: this.getName(), key: name, value: entry.value },
          }
        );
      }
      return { run, value: entry.value, entry };
    });

    const unit = extractedUnit(entries.map(({ entry }) => entry));
    this.#runs = entries.map(({ run, value }) => {
      const metadata: Record<string, MetadataPrimitive> = metadataToInput(
        run.metadataMap()
      );
      delete metadata.loops;
      delete metadata.inner_loops;
      metadata.unit = unit;
      return run.replace({ samples: [value], warmups: [], metadata });
    });
  }

  /** Strip every metadata key except name and unit */
  removeAllMetadata(): void {
    this.#runs = this.#runs.map((run) => {
      const kept: Record<string, MetadataPrimitive> = {};
      for (const key of PROTECTED_METADATA_KEYS) {
        const entry = run.getMetadataValue(key);
        if (entry) kept[key] = entry.value;
      }
      return run.replace({ metadata: kept });
    });
  }

  /**
   * Apply `patch` to the metadata of every run.
   * name and inner_loops cannot be changed.
   */
  updateMetadata(patch: MetadataInput): void {
    const parsed = parseMetadata(patch);
    const current = this.metadataMap();
    for (const key of IMMUTABLE_METADATA_KEYS) {
      const next = parsed.get(key);
      if (!next) continue;
      const existing = current.get(key);
      // A missing inner_loops means 1 in every run
      const unchanged =
        existing !== undefined
          ? existing.equals(next)
          : key === 'inner_loops' &&
            next.value === 1 &&
            this.#runs.every((run) => run.getInnerLoops() === 1);
      if (!unchanged) {
        throw new StateError(`Cannot modify ${key} metadata`, {
          errorCode: ErrorCode.IMMUTABLE_METADATA,
          context: {
            benchmark: this.getName(),
            key,
            value: next.value,
            expected: existing?.value,
          },
        });
      }
    }

    const updates = metadataToInput(parsed);
    this.#runs = this.#runs.map((run) =>
      run.replace({
        metadata: { ...metadataToInput(run.metadataMap()), ...updates },
      })
    );
  }

  format(): string {
    if (this.isCalibration()) {
      return `<calibration: ${this.getCalibrationLoops()} loops>`;
    }
    const values = [this.median()];
    if (this.getNsample() > 1) values.push(this.stdev());
    const [center, spread] = formatSamples(this.getUnit(), values);
    return spread === undefined ? `${center}` : `${center} +- ${spread}`;
  }

  toString(): string {
    if (this.isCalibration()) {
      return `Calibration: ${this.getCalibrationLoops()} loops`;
    }
    const text = this.format();
    return this.getNsample() > 1
      ? `Median +- std dev: ${text}`
      : `Median: ${text}`;
  }

  toRecords(): RunRecord[] {
    return this.#runs.map((run) => run.toRecord());
  }
}
