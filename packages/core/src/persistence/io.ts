import { open, readFile, type FileHandle } from 'node:fs/promises';
import { promisify } from 'node:util';
import { gunzip, gzip } from 'node:zlib';

import { ErrorCode } from '../errors/codes.js';
import { PersistenceError } from '../types/errors.js';

const gzipAsync = promisify(gzip);
const gunzipAsync = promisify(gunzip);

export interface WriteDocumentOptions {
  /** Overwrite an existing file instead of failing with EEXIST */
  replace?: boolean;
  /** Single-line JSON instead of 2-space indentation */
  compact?: boolean;
}

export interface ResolvedWriteOptions {
  replace: boolean;
  compact: boolean;
}

export function resolveWriteOptions(
  options: WriteDocumentOptions = {}
): ResolvedWriteOptions {
  return {
    replace: options.replace ?? false,
    compact: options.compact ?? false,
  };
}

export function isGzipPath(path: string): boolean {
  return path.toLowerCase().endsWith('.gz');
}

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

function toPersistenceError(
  error: unknown,
  path: string,
  action: 'read' | 'write'
): PersistenceError {
  const code = errnoCode(error);
  const cause = error instanceof Error ? error : undefined;
  if (code === 'EEXIST') {
    return new PersistenceError(`File already exists: ${path}`, {
      errorCode: ErrorCode.FILE_EXISTS,
      code,
      path,
      cause,
    });
  }
  const reason = cause?.message ?? String(error);
  return new PersistenceError(`Unable to ${action} ${path}: ${reason}`, {
    errorCode: ErrorCode.IO_FAILED,
    code,
    path,
    cause,
  });
}

async function openForWrite(path: string, replace: boolean): Promise<FileHandle> {
  try {
    // 'wx' fails with EEXIST instead of truncating
    return await open(path, replace ? 'w' : 'wx');
  } catch (error) {
    throw toPersistenceError(error, path, 'write');
  }
}

/**
 * Serialize a document to JSON (gzip-compressed for `.gz` paths) and write it.
 */
export async function writeDocument(
  path: string,
  document: unknown,
  options: WriteDocumentOptions = {}
): Promise<void> {
  const { replace, compact } = resolveWriteOptions(options);
  const text = compact
    ? `${JSON.stringify(document)}\n`
    : `${JSON.stringify(document, null, 2)}\n`;
  const payload = isGzipPath(path)
    ? await gzipAsync(text)
    : Buffer.from(text, 'utf8');

  await writeAndClose(await openForWrite(path, replace), payload, path);
}

/**
 * Write `payload` and close the handle. A failed write is reported even
 * when closing fails afterwards.
 */
export async function writeAndClose(
  handle: Pick<FileHandle, 'writeFile' | 'close'>,
  payload: Buffer,
  path: string
): Promise<void> {
  let failure: PersistenceError | undefined;
  try {
    await handle.writeFile(payload);
  } catch (error) {
    failure = toPersistenceError(error, path, 'write');
  }
  try {
    await handle.close();
  } catch (error) {
    if (!failure) failure = toPersistenceError(error, path, 'write');
  }
  if (failure) throw failure;
}

/**
 * Read and JSON-parse a document written by writeDocument().
 * The result is untrusted; callers validate its shape.
 */
export async function readDocument(path: string): Promise<unknown> {
  let raw: Buffer;
  try {
    raw = await readFile(path);
  } catch (error) {
    throw toPersistenceError(error, path, 'read');
  }

  let text: string;
  try {
    text = isGzipPath(path)
      ? (await gunzipAsync(raw)).toString('utf8')
      : raw.toString('utf8');
  } catch (error) {
    throw new PersistenceError(`Unable to decompress ${path}`, {
      errorCode: ErrorCode.DOCUMENT_PARSE_FAILED,
      path,
      cause: error instanceof Error ? error : undefined,
    });
  }

  try {
    return JSON.parse(text);
  } catch (error) {
    throw new PersistenceError(
      `Invalid JSON in ${path}: ${error instanceof Error ? error.message : String(error)}`,
      {
        errorCode: ErrorCode.DOCUMENT_PARSE_FAILED,
        path,
        cause: error instanceof Error ? error : undefined,
      }
    );
  }
}
