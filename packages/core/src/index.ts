// @runstat/core entry point
//
// Public API:
// - Run / Benchmark / BenchmarkSuite value objects with their validation,
//   aggregation and merge rules, plus dump()/load() on Benchmark and
//   BenchmarkSuite.
// - Metadata values, parsers and the collector interface.
// - Persistence building blocks (document schema, reader/writer) for tools
//   that need the raw document.
// - Error hierarchy, stable codes and the CLI presenter.

// Model
export { Run, type RunOptions, type RunChanges, type Warmup, type NumberKind } from './model/run.js';
export {
  Benchmark,
  widenDateRange,
  type RunCount,
  type DateRange,
} from './model/benchmark.js';
export { BenchmarkSuite } from './model/suite.js';

// Metadata
export {
  MetadataValue,
  CHECKED_METADATA_KEYS,
  PROTECTED_METADATA_KEYS,
  parseMetadata,
  parseMetadataValue,
  commonMetadata,
  type MetadataUnit,
  type MetadataPrimitive,
  type MetadataInput,
} from './metadata/metadata.js';
export {
  NodeMetadataCollector,
  StaticMetadataCollector,
  type MetadataCollector,
} from './metadata/collector.js';
export { parseIsoTimestamp } from './metadata/date.js';

// Formatting and statistics
export {
  BENCHMARK_UNITS,
  formatSamples,
  formatTimedelta,
  formatTimedeltas,
  formatFilesize,
  formatInteger,
  formatNumber,
  isBenchmarkUnit,
  type BenchmarkUnit,
} from './format/units.js';
export { max, mean, median, min, stdev } from './stats/stats.js';

// Persistence
export {
  DOCUMENT_VERSION,
  SUITE_DOCUMENT_SCHEMA,
  buildSuiteDocument,
  expandSuiteDocument,
  parseSuiteDocument,
  type SuiteDocument,
  type BenchmarkRecord,
  type RunRecord,
  type MetadataRecord,
} from './persistence/document.js';
export {
  readDocument,
  writeDocument,
  resolveWriteOptions,
  type WriteDocumentOptions,
  type ResolvedWriteOptions,
} from './persistence/io.js';

// Errors
export { ErrorCode, type Severity, getExitCode } from './errors/codes.js';
export {
  ErrorPresenter,
  type CLIErrorView,
  type ProductionView,
  type PresenterOptions,
} from './errors/presenter.js';
export {
  RunstatError,
  ValidationError,
  ArgumentTypeError,
  IncompatibilityError,
  BenchmarkNotFoundError,
  StateError,
  PersistenceError,
  isRunstatError,
  type ErrorContext,
  type SerializedError,
  type RunstatErrorOptions,
} from './types/errors.js';
