import { ErrorCode } from '../errors/codes.js';
import { ArgumentTypeError, ValidationError } from '../types/errors.js';
import {
  metadataToInput,
  metadataToRecord,
  parseMetadata,
  type MetadataInput,
  type MetadataValue,
} from '../metadata/metadata.js';
import {
  NodeMetadataCollector,
  type MetadataCollector,
} from '../metadata/collector.js';
import { parseIsoTimestamp } from '../metadata/date.js';
import type { NumberKind, RunRecord } from '../persistence/document.js';

export type { NumberKind } from '../persistence/document.js';

/** `[loops, rawSample]`: a calibration measurement and the loop count it used */
export type Warmup = readonly [loops: number, rawSample: number];

export interface RunOptions {
  warmups?: readonly Warmup[];
  metadata?: MetadataInput;
  /** Ask the collector for host metadata; explicit `metadata` entries win */
  collectMetadata?: boolean;
  /** Defaults to NodeMetadataCollector when `collectMetadata` is set */
  collector?: MetadataCollector;
  /**
   * Inferred from the values when omitted. JavaScript numbers carry no
   * float flag, so whole values such as `1.0` infer `integer`; timings pass
   * `'float'` to keep them floats.
   */
  numberKind?: NumberKind;
}

export interface RunChanges {
  samples?: readonly number[];
  warmups?: readonly Warmup[];
  metadata?: MetadataInput;
}

function checkSamples(samples: readonly number[]): readonly number[] {
  if (!Array.isArray(samples)) {
    throw new ArgumentTypeError('Run samples must be an array of numbers', {
      context: { value: samples },
    });
  }
  samples.forEach((value: unknown, index) => {
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw new ValidationError(
        `Invalid sample #${index + 1}: expected a finite number`,
        { context: { value } }
      );
    }
  });
  return Object.freeze([...samples]);
}

function checkWarmups(warmups: readonly Warmup[]): readonly Warmup[] {
  if (!Array.isArray(warmups)) {
    throw new ArgumentTypeError('Run warmups must be an array of [loops, value] pairs', {
      context: { value: warmups },
    });
  }
  return Object.freeze(
    warmups.map((warmup: unknown, index): Warmup => {
      if (!Array.isArray(warmup) || warmup.length !== 2) {
        throw new ValidationError(
          `Invalid warmup #${index + 1}: expected a [loops, value] pair`,
          { context: { value: warmup } }
        );
      }
      const [loops, raw]: unknown[] = warmup;
      if (typeof loops !== 'number' || !Number.isInteger(loops) || loops < 1) {
        throw new ValidationError(
          `Invalid warmup #${index + 1}: loops must be a positive integer`,
          { context: { value: loops } }
        );
      }
      if (typeof raw !== 'number' || !Number.isFinite(raw)) {
        throw new ValidationError(
          `Invalid warmup #${index + 1}: expected a finite number`,
          { context: { value: raw } }
        );
      }
      return Object.freeze([loops, raw] as const);
    })
  );
}

function inferNumberKind(
  samples: readonly number[],
  warmups: readonly Warmup[]
): NumberKind {
  const integral =
    samples.every((value) => Number.isInteger(value)) &&
    warmups.every(([, raw]) => Number.isInteger(raw));
  return integral ? 'integer' : 'float';
}

/**
 * One measurement event: timed samples, calibration warmups and metadata.
 *
 * Samples are normalized per inner iteration: a raw measurement divided by
 * `loops * inner_loops`. A Run is immutable; rewrites produce a new Run.
 */
export class Run {
  readonly #samples: readonly number[];
  readonly #warmups: readonly Warmup[];
  readonly #metadata: ReadonlyMap<string, MetadataValue>;
  readonly #numberKind: NumberKind;

  constructor(samples: readonly number[], options: RunOptions = {}) {
    const checkedSamples = checkSamples(samples);
    const checkedWarmups = checkWarmups(options.warmups ?? []);
    if (checkedSamples.length + checkedWarmups.length < 1) {
      throw new ValidationError(
        'Run needs at least one sample or one warmup sample'
      );
    }

    const collected =
      options.collectMetadata === true
        ? (options.collector ?? new NodeMetadataCollector()).collect()
        : {};
    const metadata = parseMetadata({ ...collected, ...options.metadata });

    const inferred = inferNumberKind(checkedSamples, checkedWarmups);
    if (options.numberKind === 'integer' && inferred === 'float') {
      throw new ValidationError(
        'Run declared as integer-valued contains non-integer values',
        { context: { expected: 'integer' } }
      );
    }

    this.#samples = checkedSamples;
    this.#warmups = checkedWarmups;
    this.#metadata = metadata;
    this.#numberKind = options.numberKind ?? inferred;
  }

  static fromRecord(record: RunRecord): Run {
    return new Run(record.samples, {
      warmups: record.warmups ?? [],
      metadata: record.metadata ?? {},
      numberKind: record.number_kind,
    });
  }

  get samples(): readonly number[] {
    return this.#samples;
  }

  get warmups(): readonly Warmup[] {
    return this.#warmups;
  }

  get numberKind(): NumberKind {
    return this.#numberKind;
  }

  getMetadata(): Record<string, MetadataValue> {
    return metadataToRecord(this.#metadata);
  }

  getMetadataValue(name: string): MetadataValue | undefined {
    return this.#metadata.get(name);
  }

  /** @internal Validated metadata without copying */
  metadataMap(): ReadonlyMap<string, MetadataValue> {
    return this.#metadata;
  }

  getName(): string | undefined {
    const value = this.#metadata.get('name')?.value;
    return typeof value === 'string' ? value : undefined;
  }

  #getCount(name: 'loops' | 'inner_loops'): number {
    const value = this.#metadata.get(name)?.value;
    return typeof value === 'number' ? value : 1;
  }

  getLoops(): number {
    return this.#getCount('loops');
  }

  getInnerLoops(): number {
    return this.#getCount('inner_loops');
  }

  getTotalLoops(): number {
    return this.getLoops() * this.getInnerLoops();
  }

  /**
   * Samples multiplied by the total loop count. With `includeWarmups`, the
   * warmups' raw values come first, as recorded.
   */
  getRawSamples(includeWarmups = false): number[] {
    const totalLoops = this.getTotalLoops();
    const raw = this.#samples.map((sample) => sample * totalLoops);
    if (!includeWarmups) return raw;
    return [...this.#warmups.map(([, value]) => value), ...raw];
  }

  getDate(): Date | undefined {
    const value = this.#metadata.get('date')?.value;
    if (value === undefined) return undefined;
    const date = typeof value === 'string' ? parseIsoTimestamp(value) : undefined;
    if (!date) {
      throw new ValidationError(`Invalid date metadata: ${String(value)}`, {
        errorCode: ErrorCode.INVALID_METADATA,
        context: { key: 'date', value },
      });
    }
    return date;
  }

  /**
   * `duration` metadata in seconds; otherwise the measured time of all raw
   * samples and warmups.
   */
  getDuration(): number {
    const value = this.#metadata.get('duration')?.value;
    if (typeof value === 'number') return value;
    return this.getRawSamples(true).reduce((total, raw) => total + raw, 0);
  }

  /** `[start, end]` where end = date + duration; undefined without a date */
  getDateRange(): [Date, Date] | undefined {
    const start = this.getDate();
    if (!start) return undefined;
    const end = new Date(start.getTime() + this.getDuration() * 1000);
    return [start, end];
  }

  /** Warmup-only run, recorded while the loop count was being calibrated */
  isCalibration(): boolean {
    return this.#samples.length === 0;
  }

  /**
   * @internal Copy of this run with some parts replaced.
   * The copy goes through full validation.
   */
  replace(changes: RunChanges): Run {
    const valuesChanged =
      changes.samples !== undefined || changes.warmups !== undefined;
    return new Run(changes.samples ?? this.#samples, {
      warmups: changes.warmups ?? this.#warmups,
      metadata: changes.metadata ?? metadataToInput(this.#metadata),
      numberKind: valuesChanged ? undefined : this.#numberKind,
    });
  }

  toRecord(): RunRecord {
    return {
      samples: [...this.#samples],
      warmups: this.#warmups.map(([loops, raw]): [number, number] => [loops, raw]),
      metadata: metadataToInput(this.#metadata),
      number_kind: this.#numberKind,
    };
  }
}
