import { Ajv2020 } from 'ajv/dist/2020.js';
import type { SchemaObject } from 'ajv';

import { ErrorCode } from '../errors/codes.js';
import { PersistenceError } from '../types/errors.js';
import type { MetadataPrimitive } from '../metadata/metadata.js';

export const DOCUMENT_VERSION = '1.0';

export type NumberKind = 'integer' | 'float';

export type MetadataRecord = Record<string, MetadataPrimitive>;

export interface RunRecord {
  samples: number[];
  warmups?: Array<[number, number]>;
  metadata?: MetadataRecord;
  number_kind?: NumberKind;
}

export interface BenchmarkRecord {
  metadata?: MetadataRecord;
  runs: RunRecord[];
}

export interface SuiteDocument {
  version: string;
  metadata?: MetadataRecord;
  benchmarks: BenchmarkRecord[];
}

const metadataSchema: SchemaObject = {
  type: 'object',
  propertyNames: { minLength: 1 },
  additionalProperties: { type: ['string', 'number'] },
};

const runSchema: SchemaObject = {
  type: 'object',
  additionalProperties: false,
  required: ['samples'],
  properties: {
    samples: { type: 'array', items: { type: 'number' } },
    warmups: {
      type: 'array',
      items: {
        type: 'array',
        prefixItems: [{ type: 'integer', minimum: 1 }, { type: 'number' }],
        items: false,
        minItems: 2,
      },
    },
    metadata: metadataSchema,
    number_kind: { enum: ['integer', 'float'] },
  },
};

export const SUITE_DOCUMENT_SCHEMA: SchemaObject = {
  $schema: 'https://json-schema.org/draft/2020-12/schema',
  title: 'runstat benchmark suite',
  type: 'object',
  required: ['version', 'benchmarks'],
  properties: {
    version: { const: DOCUMENT_VERSION },
    metadata: metadataSchema,
    benchmarks: {
      type: 'array',
      items: {
        type: 'object',
        additionalProperties: false,
        required: ['runs'],
        properties: {
          metadata: metadataSchema,
          runs: { type: 'array', minItems: 1, items: runSchema },
        },
      },
    },
  },
};

const ajv = new Ajv2020({ strict: false, allErrors: true });
const validateSuiteDocument = ajv.compile<SuiteDocument>(SUITE_DOCUMENT_SCHEMA);

/**
 * Check an untrusted value against the suite document schema.
 */
export function parseSuiteDocument(data: unknown, path?: string): SuiteDocument {
  if (!validateSuiteDocument(data)) {
    const details = ajv.errorsText(validateSuiteDocument.errors, {
      dataVar: 'document',
    });
    throw new PersistenceError(`Invalid benchmark document: ${details}`, {
      errorCode: ErrorCode.DOCUMENT_INVALID,
      path,
    });
  }
  return data;
}

function sharedEntries(records: ReadonlyArray<MetadataRecord>): MetadataRecord {
  const [first, ...rest] = records;
  const shared: MetadataRecord = {};
  if (!first) return shared;
  for (const [key, value] of Object.entries(first)) {
    if (rest.every((other) => Object.hasOwn(other, key) && other[key] === value)) {
      shared[key] = value;
    }
  }
  return shared;
}

function withoutKeys(
  record: MetadataRecord,
  keys: MetadataRecord
): MetadataRecord | undefined {
  const out: MetadataRecord = {};
  for (const [key, value] of Object.entries(record)) {
    if (!Object.hasOwn(keys, key)) out[key] = value;
  }
  return Object.keys(out).length > 0 ? out : undefined;
}

function compactRun(run: RunRecord, metadata: MetadataRecord | undefined): RunRecord {
  const out: RunRecord = { samples: run.samples };
  if (run.warmups && run.warmups.length > 0) out.warmups = run.warmups;
  if (metadata) out.metadata = metadata;
  if (run.number_kind) out.number_kind = run.number_kind;
  return out;
}

/**
 * Assemble a document from the run records of each benchmark.
 * Metadata shared by every run of a benchmark moves to the benchmark record,
 * metadata shared by every benchmark moves to the document.
 */
export function buildSuiteDocument(
  benchmarks: ReadonlyArray<ReadonlyArray<RunRecord>>
): SuiteDocument {
  const perBenchmark = benchmarks.map((runs) =>
    sharedEntries(runs.map((run) => run.metadata ?? {}))
  );
  const suiteMetadata = sharedEntries(perBenchmark);
  // Each benchmark record keeps its own name
  delete suiteMetadata.name;

  const document: SuiteDocument = {
    version: DOCUMENT_VERSION,
    benchmarks: benchmarks.map((runs, index) => {
      const common = perBenchmark[index] ?? {};
      const record: BenchmarkRecord = {
        runs: runs.map((run) =>
          compactRun(run, withoutKeys(run.metadata ?? {}, common))
        ),
      };
      const own = withoutKeys(common, suiteMetadata);
      if (own) record.metadata = own;
      return record;
    }),
  };
  if (Object.keys(suiteMetadata).length > 0) {
    document.metadata = suiteMetadata;
  }
  return document;
}

/**
 * Inverse of buildSuiteDocument(): run records with their full metadata.
 * Run entries override benchmark entries, which override document entries.
 */
export function expandSuiteDocument(document: SuiteDocument): RunRecord[][] {
  const suiteMetadata = document.metadata ?? {};
  return document.benchmarks.map((benchmark) =>
    benchmark.runs.map((run) => ({
      samples: run.samples,
      warmups: run.warmups ?? [],
      metadata: { ...suiteMetadata, ...benchmark.metadata, ...run.metadata },
      number_kind: run.number_kind,
    }))
  );
}
