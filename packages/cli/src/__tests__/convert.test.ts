import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import {
  Benchmark,
  BenchmarkNotFoundError,
  BenchmarkSuite,
  Run,
  type MetadataInput,
} from '@runstat/core';

import { applyConversion, loadSuites } from '../convert.js';

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(path.join(os.tmpdir(), 'runstat-convert-'));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

function makeBenchmark(name: string, metadata: MetadataInput = {}): Benchmark {
  return new Benchmark([
    new Run([1.0, 2.0], { metadata: { name, hostname: 'host1', ...metadata } }),
  ]);
}

function makeSuite(): BenchmarkSuite {
  return new BenchmarkSuite(
    [makeBenchmark('a'), makeBenchmark('b'), makeBenchmark('c')],
    'input.json'
  );
}

describe('applyConversion', () => {
  it('keeps only included benchmarks', () => {
    const converted = applyConversion(makeSuite(), { includeBenchmarks: ['c', 'a'] });
    expect(converted.getBenchmarkNames()).toEqual(['a', 'c']);
    expect(converted.filename).toBe('input.json');
  });

  it('fails on an unknown included benchmark', () => {
    expect(() => applyConversion(makeSuite(), { includeBenchmarks: ['z'] })).toThrow(
      BenchmarkNotFoundError
    );
  });

  it('drops excluded benchmarks', () => {
    const converted = applyConversion(makeSuite(), { excludeBenchmarks: ['b'] });
    expect(converted.getBenchmarkNames()).toEqual(['a', 'c']);
  });

  it('extracts then updates metadata', () => {
    const suite = new BenchmarkSuite([makeBenchmark('a', { mem_max_rss: 2048 })]);
    const converted = applyConversion(suite, {
      extractMetadata: 'mem_max_rss',
      updateMetadata: { os: 'linux' },
    });
    const benchmark = converted.getBenchmark('a');
    expect(benchmark.getSamples()).toEqual([2048]);
    expect(benchmark.getUnit()).toBe('byte');
    expect(benchmark.getMetadata().os?.value).toBe('linux');
  });

  it('removes all metadata but name and unit', () => {
    const converted = applyConversion(makeSuite(), { removeAllMetadata: true });
    expect(Object.keys(converted.getBenchmark('a').getMetadata())).toEqual(['name']);
  });
});

describe('loadSuites', () => {
  it('merges the runs of every file', async () => {
    const first = path.join(dir, 'first.json');
    const second = path.join(dir, 'second.json');
    await new BenchmarkSuite([makeBenchmark('a')]).dump(first);
    await new BenchmarkSuite([makeBenchmark('a'), makeBenchmark('b')]).dump(second);

    const suite = await loadSuites([first, second]);
    expect(suite.filename).toBe(first);
    expect(suite.getBenchmark('a').getNrun()).toBe(2);
    expect(suite.getBenchmark('b').getNrun()).toBe(1);
  });

  it('needs at least one file', async () => {
    await expect(loadSuites([])).rejects.toThrow('At least one input file is required');
  });
});
