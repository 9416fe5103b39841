/**
 * Error Code Infrastructure
 * Stable error codes and CLI exit code mappings.
 */

// Severity levels used across the system
export type Severity = 'info' | 'warn' | 'error';

// Stable error codes grouped by domain
export enum ErrorCode {
  // Model validation (E100–E199)
  INVALID_RUN_DATA = 'E100',
  INVALID_METADATA = 'E101',
  INVALID_BENCHMARK = 'E110',
  DUPLICATE_BENCHMARK = 'E111',

  // Argument shape (E200–E299)
  ARGUMENT_TYPE_MISMATCH = 'E200',

  // Merge compatibility (E300–E399)
  INCOMPATIBLE_RUN = 'E300',
  INCOMPATIBLE_BENCHMARK = 'E301',

  // Lookup (E400–E499)
  BENCHMARK_NOT_FOUND = 'E400',

  // State (E500–E599)
  NO_SAMPLES = 'E500',
  IMMUTABLE_METADATA = 'E501',

  // Persistence (E600–E699)
  FILE_EXISTS = 'E600',
  DOCUMENT_PARSE_FAILED = 'E601',
  DOCUMENT_INVALID = 'E602',
  IO_FAILED = 'E603',

  // Internal Errors (E900–E999)
  INTERNAL_ERROR = 'E900',
}

// CLI exit codes mapping
export const EXIT_CODES = {
  [ErrorCode.INVALID_RUN_DATA]: 10,
  [ErrorCode.INVALID_METADATA]: 11,
  [ErrorCode.INVALID_BENCHMARK]: 12,
  [ErrorCode.DUPLICATE_BENCHMARK]: 13,
  [ErrorCode.ARGUMENT_TYPE_MISMATCH]: 20,
  [ErrorCode.INCOMPATIBLE_RUN]: 30,
  [ErrorCode.INCOMPATIBLE_BENCHMARK]: 31,
  [ErrorCode.BENCHMARK_NOT_FOUND]: 40,
  [ErrorCode.NO_SAMPLES]: 50,
  [ErrorCode.IMMUTABLE_METADATA]: 51,
  [ErrorCode.FILE_EXISTS]: 60,
  [ErrorCode.DOCUMENT_PARSE_FAILED]: 61,
  [ErrorCode.DOCUMENT_INVALID]: 62,
  [ErrorCode.IO_FAILED]: 63,
  [ErrorCode.INTERNAL_ERROR]: 99,
} satisfies Record<ErrorCode, number>;

export function getExitCode(code: ErrorCode): number {
  return EXIT_CODES[code];
}
