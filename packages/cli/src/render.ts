import {
  formatSamples,
  formatTimedelta,
  type Benchmark,
  type BenchmarkSuite,
  type CLIErrorView,
  type MetadataValue,
  type RunCount,
} from '@runstat/core';

// Minimal ANSI helpers (no external deps)
const ANSI = {
  reset: '\u001B[0m',
  red: '\u001B[31m',
  bold: '\u001B[1m',
};

function colorize(text: string, useColor: boolean, color: string): string {
  if (!useColor) return text;
  return `${color}${text}${ANSI.reset}`;
}

function wrapText(text: string, width: number): string {
  if (!text) return '';
  const words = text.split(/\s+/);
  const lines: string[] = [];
  let line = '';
  for (const word of words) {
    if ((line + (line ? ' ' : '') + word).length > width) {
      if (line) lines.push(line);
      line = word;
    } else {
      line = line ? `${line} ${word}` : word;
    }
  }
  if (line) lines.push(line);
  return lines.join('\n');
}

export function renderCLIView(view: CLIErrorView): string {
  const width = view.terminalWidth || 80;
  const lines: string[] = [];

  lines.push(
    colorize(colorize(view.title, view.colors, ANSI.bold), view.colors, ANSI.red)
  );
  if (view.location) {
    lines.push(wrapText(view.location, width));
  }
  if (view.detail) {
    lines.push(wrapText(view.detail, width));
  }
  if (view.cause) {
    lines.push(wrapText(`Caused by: ${view.cause}`, width));
  }
  return lines.join('\n');
}

export function stripAnsi(input: string): string {
  // Simple ANSI escape code stripper
  const ansiRe =
    /[\u001B\u009B][[\]()#;?]*(?:\d{1,4}(?:;\d{0,4})*)?[\dA-PR-TZcf-ntqry=><~]/g; // eslint-disable-line no-control-regex
  return input.replace(ansiRe, '');
}

/** `name: Median +- std dev: ...`, one line per benchmark */
export function renderShow(suite: BenchmarkSuite): string[] {
  return suite
    .getBenchmarks()
    .map((benchmark) => `${benchmark.getName()}: ${benchmark.toString()}`);
}

function renderMetadataBlock(
  title: string,
  metadata: Record<string, MetadataValue>
): string[] {
  const names = Object.keys(metadata).sort();
  if (names.length === 0) return [`${title}: (none)`];
  return [
    `${title}:`,
    ...names.map((name) => `- ${name}: ${metadata[name]?.format() ?? ''}`),
  ];
}

export function renderMetadata(suite: BenchmarkSuite): string[] {
  const lines = renderMetadataBlock('Common metadata', suite.getMetadata());
  for (const benchmark of suite.getBenchmarks()) {
    lines.push('');
    lines.push(
      ...renderMetadataBlock(
        `Metadata of ${benchmark.getName()}`,
        benchmark.getMetadata()
      )
    );
  }
  return lines;
}

function formatCount(count: RunCount): string {
  return count.kind === 'exact'
    ? String(count.value)
    : `${count.value.toFixed(1)} (average)`;
}

export function renderBenchmarkStats(benchmark: Benchmark): string[] {
  const lines = [
    `${benchmark.getName()}:`,
    `  Runs: ${benchmark.getNrun()}`,
    `  Warmups per run: ${formatCount(benchmark.getNwarmup())}`,
    `  Samples per run: ${formatCount(benchmark.getNsamplePerRun())}`,
    `  Total samples: ${benchmark.getNsample()}`,
  ];

  if (benchmark.isCalibration()) {
    lines.push(`  Calibration: ${benchmark.getCalibrationLoops()} loops`);
  } else {
    const values = [
      benchmark.min(),
      benchmark.median(),
      benchmark.max(),
      benchmark.mean(),
    ];
    if (benchmark.getNsample() > 1) values.push(benchmark.stdev());
    // One scale for every value, taken from the minimum
    const [min, median, max, mean, stdev] = formatSamples(
      benchmark.getUnit(),
      values
    );
    lines.push(`  Minimum: ${min}`, `  Median: ${median}`, `  Maximum: ${max}`);
    lines.push(`  Mean: ${mean}`);
    if (stdev !== undefined) lines.push(`  Standard deviation: ${stdev}`);
  }

  lines.push(`  Total duration: ${formatTimedelta(benchmark.getTotalDuration())}`);
  const dates = benchmark.getDates();
  if (dates) {
    const [start, end] = dates;
    lines.push(`  Dates: ${start.toISOString()} -> ${end.toISOString()}`);
  }
  return lines;
}

export function renderStats(suite: BenchmarkSuite): string[] {
  const lines: string[] = [];
  for (const benchmark of suite.getBenchmarks()) {
    if (lines.length > 0) lines.push('');
    lines.push(...renderBenchmarkStats(benchmark));
  }
  return lines;
}

export default renderCLIView;
