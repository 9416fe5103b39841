import { describe, it, expect, vi } from 'vitest';
import { Benchmark, BenchmarkSuite, Run } from '@runstat/core';

import { printSuiteDebug } from '../debug.js';

describe('printSuiteDebug', () => {
  it('prints benchmark counts and common metadata to stderr', () => {
    const spy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

    try {
      const suite = new BenchmarkSuite([
        new Benchmark([
          new Run([1, 2], { metadata: { name: 'a' } }),
          new Run([3], { metadata: { name: 'a' } }),
        ]),
      ]);
      printSuiteDebug(suite, 'input');

      const output = spy.mock.calls.map((call) => String(call[0])).join('');
      expect(output).toBe(
        '[runstat] input: <memory> (1 benchmarks)\n' +
          '[runstat]   a: runs=2 samples/run=1.5 (average) unit=second\n' +
          '[runstat] input.metadata: {"name":"a"}\n'
      );
    } finally {
      spy.mockRestore();
    }
  });
});
