import {
  ErrorCode,
  ValidationError,
  type MetadataPrimitive,
} from '@runstat/core';

/**
 * CLI options interface matching Commander.js option structure
 */
export interface ConvertCliOptions {
  output: string;
  add?: string[];
  includeBenchmark?: string[];
  excludeBenchmark?: string[];
  extractMetadata?: string;
  removeAllMetadata?: boolean;
  updateMetadata?: string;
  replace?: boolean;
  compact?: boolean;
}

const INTEGER_RE = /^[+-]?\d+$/;
const NUMBER_RE = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Command-line metadata values are text; numbers-looking values become numbers.
 */
export function parseMetadataArgument(raw: string): MetadataPrimitive {
  const value = raw.trim();
  if (INTEGER_RE.test(value)) return Number.parseInt(value, 10);
  if (NUMBER_RE.test(value)) return Number.parseFloat(value);
  return value;
}

/**
 * Parse `key=value,key2=value2` as given to --update-metadata.
 */
export function parseMetadataAssignments(
  flagValue: string
): Record<string, MetadataPrimitive> {
  const patch: Record<string, MetadataPrimitive> = {};
  for (const item of flagValue.split(',')) {
    const assignment = item.trim();
    if (!assignment) continue;
    const separator = assignment.indexOf('=');
    if (separator <= 0) {
      throw new ValidationError(
        `Invalid metadata assignment ${JSON.stringify(assignment)}: expected key=value`,
        { errorCode: ErrorCode.INVALID_METADATA, context: { value: assignment } }
      );
    }
    const key = assignment.slice(0, separator).trim();
    patch[key] = parseMetadataArgument(assignment.slice(separator + 1));
  }
  if (Object.keys(patch).length === 0) {
    throw new ValidationError(
      '--update-metadata requires at least one key=value pair',
      { errorCode: ErrorCode.INVALID_METADATA }
    );
  }
  return patch;
}

/** Commander collector for repeatable options */
export function collectList(value: string, previous: string[] = []): string[] {
  const items = value
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);
  return [...previous, ...items];
}
