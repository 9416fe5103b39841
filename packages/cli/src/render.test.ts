import { describe, it, expect } from 'vitest';
import {
  Benchmark,
  BenchmarkSuite,
  ErrorCode,
  Run,
  type CLIErrorView,
} from '@runstat/core';

import {
  renderCLIView,
  renderMetadata,
  renderShow,
  renderStats,
  stripAnsi,
} from './render.js';

function makeSuite(): BenchmarkSuite {
  const bench = new Benchmark([
    new Run([1.0, 1.5, 2.0], {
      metadata: {
        name: 'bench',
        hostname: 'host1',
        date: '2016-07-20T14:06:00',
        duration: 60,
      },
    }),
  ]);
  const calib = new Benchmark([
    new Run([], {
      warmups: [
        [1, 0.1],
        [8, 0.5],
      ],
      metadata: { name: 'calib', hostname: 'host1' },
    }),
  ]);
  return new BenchmarkSuite([calib, bench]);
}

describe('renderCLIView', () => {
  it('renders title and location', () => {
    const view: CLIErrorView = {
      title: 'Error E400: Benchmark not found: "x"',
      code: ErrorCode.BENCHMARK_NOT_FOUND,
      location: 'Benchmark: x',
      colors: false,
      terminalWidth: 80,
    };
    expect(renderCLIView(view)).toBe(
      'Error E400: Benchmark not found: "x"\nBenchmark: x'
    );
  });

  it('applies ANSI colors when enabled', () => {
    const view: CLIErrorView = {
      title: 'Error E900: Internal error',
      code: ErrorCode.INTERNAL_ERROR,
      colors: true,
      terminalWidth: 80,
    };
    const out = renderCLIView(view);
    expect(out.includes('\u001B[31m')).toBe(true);
    expect(stripAnsi(out)).toBe('Error E900: Internal error');
  });

  it('wraps sections based on terminalWidth', () => {
    const view: CLIErrorView = {
      title: 'Error E300: Incompatible run',
      code: ErrorCode.INCOMPATIBLE_RUN,
      detail: 'hostname: expected "host1", got "host2"',
      cause: 'boom',
      colors: false,
      terminalWidth: 20,
    };
    expect(renderCLIView(view).split('\n')).toEqual([
      'Error E300: Incompatible run',
      'hostname: expected',
      '"host1", got "host2"',
      'Caused by: boom',
    ]);
  });
});

describe('suite rendering', () => {
  it('shows one line per benchmark', () => {
    expect(renderShow(makeSuite())).toEqual([
      'bench: Median +- std dev: 1.50 sec +- 0.50 sec',
      'calib: Calibration: 8 loops',
    ]);
  });

  it('renders statistics of every benchmark', () => {
    expect(renderStats(makeSuite())).toEqual([
      'bench:',
      '  Runs: 1',
      '  Warmups per run: 0',
      '  Samples per run: 3',
      '  Total samples: 3',
      '  Minimum: 1.00 sec',
      '  Median: 1.50 sec',
      '  Maximum: 2.00 sec',
      '  Mean: 1.50 sec',
      '  Standard deviation: 0.50 sec',
      '  Total duration: 60.0 sec',
      '  Dates: 2016-07-20T14:06:00.000Z -> 2016-07-20T14:07:00.000Z',
      '',
      'calib:',
      '  Runs: 1',
      '  Warmups per run: 2',
      '  Samples per run: 0',
      '  Total samples: 0',
      '  Calibration: 8 loops',
      '  Total duration: 600 ms',
    ]);
  });

  it('reports uneven sample counts as averages', () => {
    const suite = new BenchmarkSuite([
      new Benchmark([
        new Run([1, 2], { metadata: { name: 'uneven', unit: 'integer' } }),
        new Run([3], { metadata: { name: 'uneven', unit: 'integer' } }),
      ]),
    ]);
    expect(renderStats(suite).slice(0, 5)).toEqual([
      'uneven:',
      '  Runs: 2',
      '  Warmups per run: 0',
      '  Samples per run: 1.5 (average)',
      '  Total samples: 3',
    ]);
  });

  it('renders statistics of very large sample sets', () => {
    const samples = Array.from({ length: 300_000 }, (_, index) =>
      index % 2 === 0 ? 0.002 : 0.004
    );
    const suite = new BenchmarkSuite([
      new Benchmark([new Run(samples, { metadata: { name: 'big' } })]),
    ]);
    expect(renderStats(suite).slice(4, 8)).toEqual([
      '  Total samples: 300000',
      '  Minimum: 2.00 ms',
      '  Median: 3.00 ms',
      '  Maximum: 4.00 ms',
    ]);
  });

  it('renders common and per-benchmark metadata', () => {
    const suite = new BenchmarkSuite([
      new Benchmark([
        new Run([1.0], {
          metadata: { name: 'bench', hostname: 'host1', duration: 60 },
        }),
      ]),
    ]);
    expect(renderMetadata(suite)).toEqual([
      'Common metadata:',
      '- duration: 60.0 sec',
      '- hostname: host1',
      '- name: bench',
      '',
      'Metadata of bench:',
      '- duration: 60.0 sec',
      '- hostname: host1',
      '- name: bench',
    ]);
  });

  it('marks empty metadata', () => {
    expect(renderMetadata(new BenchmarkSuite())).toEqual(['Common metadata: (none)']);
  });
});
