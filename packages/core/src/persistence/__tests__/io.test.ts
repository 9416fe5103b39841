import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { ErrorCode } from '../../errors/codes.js';
import { PersistenceError } from '../../types/errors.js';
import {
  isGzipPath,
  readDocument,
  resolveWriteOptions,
  writeAndClose,
  writeDocument,
} from '../io.js';

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(path.join(os.tmpdir(), 'runstat-io-'));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

async function captureError(promise: Promise<unknown>): Promise<PersistenceError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof PersistenceError) return error;
    throw error;
  }
  throw new Error('expected a PersistenceError');
}

describe('writeDocument / readDocument', () => {
  const document = { version: '1.0', benchmarks: [] };

  it('writes indented JSON by default and compact JSON on request', async () => {
    const pretty = path.join(dir, 'pretty.json');
    const compact = path.join(dir, 'compact.json');
    await writeDocument(pretty, document);
    await writeDocument(compact, document, { compact: true });

    expect(await readFile(pretty, 'utf8')).toBe(
      '{\n  "version": "1.0",\n  "benchmarks": []\n}\n'
    );
    expect(await readFile(compact, 'utf8')).toBe(
      '{"version":"1.0","benchmarks":[]}\n'
    );
  });

  it('gzips .gz paths', async () => {
    const file = path.join(dir, 'results.json.gz');
    await writeDocument(file, document);

    const bytes = await readFile(file);
    expect([bytes[0], bytes[1]]).toEqual([0x1f, 0x8b]);
    expect(await readDocument(file)).toEqual(document);
  });

  it('refuses to overwrite unless replace is set', async () => {
    const file = path.join(dir, 'results.json');
    await writeDocument(file, document);

    const error = await captureError(writeDocument(file, document));
    expect(error.code).toBe('EEXIST');
    expect(error.errorCode).toBe(ErrorCode.FILE_EXISTS);
    expect(error.path).toBe(file);

    await writeDocument(file, { version: '1.0', benchmarks: [{ runs: [] }] }, {
      replace: true,
    });
    expect(await readDocument(file)).toEqual({
      version: '1.0',
      benchmarks: [{ runs: [] }],
    });
  });

  it('reports missing files and broken JSON', async () => {
    const missing = await captureError(readDocument(path.join(dir, 'missing.json')));
    expect(missing.errorCode).toBe(ErrorCode.IO_FAILED);
    expect(missing.code).toBe('ENOENT');

    const broken = path.join(dir, 'broken.json');
    await writeFile(broken, '{"version":', 'utf8');
    const parse = await captureError(readDocument(broken));
    expect(parse.errorCode).toBe(ErrorCode.DOCUMENT_PARSE_FAILED);

    const notGzip = path.join(dir, 'plain.json.gz');
    await writeFile(notGzip, '{}', 'utf8');
    const decompress = await captureError(readDocument(notGzip));
    expect(decompress.errorCode).toBe(ErrorCode.DOCUMENT_PARSE_FAILED);
  });
});

describe('writeAndClose', () => {
  const errno = (message: string, code: string): Error =>
    Object.assign(new Error(message), { code });

  it('keeps the write failure when closing fails too', async () => {
    const handle = {
      writeFile: vi.fn().mockRejectedValue(errno('disk full', 'ENOSPC')),
      close: vi.fn().mockRejectedValue(errno('bad descriptor', 'EBADF')),
    };
    const error = await captureError(
      writeAndClose(handle, Buffer.from('{}'), 'out.json')
    );
    expect(error.code).toBe('ENOSPC');
    expect(error.message).toBe('Unable to write out.json: disk full');
    expect(handle.close).toHaveBeenCalledTimes(1);
  });

  it('reports a close failure after a successful write', async () => {
    const handle = {
      writeFile: vi.fn().mockResolvedValue(undefined),
      close: vi.fn().mockRejectedValue(errno('i/o error', 'EIO')),
    };
    const error = await captureError(
      writeAndClose(handle, Buffer.from('{}'), 'out.json')
    );
    expect(error.code).toBe('EIO');
    expect(error.errorCode).toBe(ErrorCode.IO_FAILED);
  });
});

describe('write options', () => {
  it('defaults to no replace and indented output', () => {
    expect(resolveWriteOptions()).toEqual({ replace: false, compact: false });
    expect(resolveWriteOptions({ compact: true })).toEqual({
      replace: false,
      compact: true,
    });
  });

  it('detects gzip paths case-insensitively', () => {
    expect(isGzipPath('a.json.GZ')).toBe(true);
    expect(isGzipPath('a.json')).toBe(false);
  });
});
