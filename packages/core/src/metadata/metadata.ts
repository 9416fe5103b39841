import { ErrorCode } from '../errors/codes.js';
import { ValidationError } from '../types/errors.js';
import {
  BENCHMARK_UNITS,
  formatFilesize,
  formatTimedelta,
  isBenchmarkUnit,
} from '../format/units.js';
import { parseIsoTimestamp } from './date.js';

/** Semantic unit attached to every metadata value */
export type MetadataUnit =
  | 'count'
  | 'duration'
  | 'byte'
  | 'date'
  | 'number'
  | 'text';

export type MetadataPrimitive = string | number;

/** Plain metadata as callers and persisted documents provide it */
export type MetadataInput = Readonly<Record<string, MetadataPrimitive>>;

/**
 * Keys whose value must be identical in every run of a benchmark.
 * A run that disagrees with the first run (or lacks a key it has) is rejected.
 */
export const CHECKED_METADATA_KEYS: readonly string[] = [
  'name',
  'inner_loops',
  'unit',
  'hostname',
  'platform',
  'cpu_count',
  'cpu_model_name',
  'runtime_name',
  'runtime_version',
  'runtime_executable',
];

/** Keys that survive `removeAllMetadata()` */
export const PROTECTED_METADATA_KEYS: readonly string[] = ['name', 'unit'];

/**
 * A validated metadata entry.
 */
export class MetadataValue {
  constructor(
    readonly name: string,
    readonly value: MetadataPrimitive,
    readonly unit: MetadataUnit
  ) {}

  equals(other: MetadataValue): boolean {
    return (
      this.name === other.name &&
      this.value === other.value &&
      this.unit === other.unit
    );
  }

  isNumeric(): this is MetadataValue & { readonly value: number } {
    return typeof this.value === 'number';
  }

  format(): string {
    if (typeof this.value === 'number') {
      if (this.unit === 'duration') return formatTimedelta(this.value);
      if (this.unit === 'byte') return formatFilesize(this.value);
    }
    return String(this.value);
  }

  toString(): string {
    return this.format();
  }
}

type MetadataParser = (name: string, value: MetadataPrimitive) => MetadataPrimitive;

interface MetadataKeySpec {
  unit: MetadataUnit;
  parse: MetadataParser;
}

function invalid(name: string, value: unknown, reason: string): never {
  throw new ValidationError(
    `Invalid metadata ${name}=${JSON.stringify(value)}: ${reason}`,
    {
      errorCode: ErrorCode.INVALID_METADATA,
      context: { key: name, value },
    }
  );
}

const parseString: MetadataParser = (name, value) => {
  if (typeof value !== 'string') {
    return invalid(name, value, 'expected a string');
  }
  const trimmed = value.trim();
  if (!trimmed) {
    return invalid(name, value, 'value must not be empty');
  }
  return trimmed;
};

const parsePositiveInteger: MetadataParser = (name, value) => {
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    return invalid(name, value, 'expected an integer');
  }
  if (value < 1) {
    return invalid(name, value, 'must be >= 1');
  }
  return value;
};

const parseNonNegativeNumber: MetadataParser = (name, value) => {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    return invalid(name, value, 'expected a number');
  }
  if (value < 0) {
    return invalid(name, value, 'must be >= 0');
  }
  return value;
};

const parseNonNegativeInteger: MetadataParser = (name, value) => {
  const parsed = parseNonNegativeNumber(name, value);
  if (!Number.isInteger(parsed)) {
    return invalid(name, value, 'expected an integer');
  }
  return parsed;
};

const parseDate: MetadataParser = (name, value) => {
  const text = parseString(name, value);
  if (typeof text !== 'string' || !parseIsoTimestamp(text)) {
    return invalid(name, value, 'expected an ISO-8601 timestamp');
  }
  return text;
};

const parseBenchmarkUnit: MetadataParser = (name, value) => {
  if (!isBenchmarkUnit(value)) {
    return invalid(name, value, `expected one of ${BENCHMARK_UNITS.join(', ')}`);
  }
  return value;
};

const KEY_SPECS: Readonly<Record<string, MetadataKeySpec>> = {
  name: { unit: 'text', parse: parseString },
  unit: { unit: 'text', parse: parseBenchmarkUnit },
  loops: { unit: 'count', parse: parsePositiveInteger },
  inner_loops: { unit: 'count', parse: parsePositiveInteger },
  cpu_count: { unit: 'count', parse: parsePositiveInteger },
  duration: { unit: 'duration', parse: parseNonNegativeNumber },
  uptime: { unit: 'duration', parse: parseNonNegativeNumber },
  date: { unit: 'date', parse: parseDate },
  mem_max_rss: { unit: 'byte', parse: parseNonNegativeInteger },
  mem_peak_pagefile_usage: { unit: 'byte', parse: parseNonNegativeInteger },
  load_avg_1min: { unit: 'number', parse: parseNonNegativeNumber },
  hostname: { unit: 'text', parse: parseString },
  platform: { unit: 'text', parse: parseString },
  cpu_model_name: { unit: 'text', parse: parseString },
  runtime_name: { unit: 'text', parse: parseString },
  runtime_version: { unit: 'text', parse: parseString },
  runtime_executable: { unit: 'text', parse: parseString },
};

function parseFreeForm(name: string, value: MetadataPrimitive): MetadataValue {
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      return invalid(name, value, 'expected a finite number');
    }
    return new MetadataValue(name, value, 'number');
  }
  if (typeof value === 'string') {
    return new MetadataValue(name, parseString(name, value), 'text');
  }
  return invalid(name, value, 'expected a string or a number');
}

/**
 * Validate one metadata entry and attach its unit.
 * Throws ValidationError on a type mismatch or an out-of-range value.
 */
export function parseMetadataValue(
  name: string,
  value: MetadataPrimitive
): MetadataValue {
  if (typeof name !== 'string' || !name.trim()) {
    return invalid(String(name), value, 'metadata name must not be empty');
  }
  const spec = Object.prototype.hasOwnProperty.call(KEY_SPECS, name)
    ? KEY_SPECS[name]
    : undefined;
  if (!spec) {
    return parseFreeForm(name, value);
  }
  return new MetadataValue(name, spec.parse(name, value), spec.unit);
}

export function parseMetadata(
  input: MetadataInput
): Map<string, MetadataValue> {
  const parsed = new Map<string, MetadataValue>();
  for (const [name, value] of Object.entries(input)) {
    parsed.set(name, parseMetadataValue(name, value));
  }
  return parsed;
}

export function metadataToInput(
  metadata: ReadonlyMap<string, MetadataValue>
): Record<string, MetadataPrimitive> {
  const out: Record<string, MetadataPrimitive> = {};
  for (const [name, entry] of metadata) {
    out[name] = entry.value;
  }
  return out;
}

/**
 * Keep the entries present in every map with an identical value.
 * Iteration order follows the first map.
 */
export function commonMetadata(
  sets: ReadonlyArray<ReadonlyMap<string, MetadataValue>>
): Map<string, MetadataValue> {
  const [first, ...rest] = sets;
  const common = new Map<string, MetadataValue>();
  if (!first) return common;

  for (const [name, entry] of first) {
    const shared = rest.every((other) => {
      const candidate = other.get(name);
      return candidate !== undefined && candidate.equals(entry);
    });
    if (shared) common.set(name, entry);
  }
  return common;
}

export function metadataToRecord(
  metadata: ReadonlyMap<string, MetadataValue>
): Record<string, MetadataValue> {
  return Object.fromEntries(metadata);
}
