import { describe, it, expect } from 'vitest';

import {
  collectList,
  parseMetadataArgument,
  parseMetadataAssignments,
} from '../flags.js';

describe('parseMetadataArgument', () => {
  it('turns numeric text into numbers', () => {
    expect(parseMetadataArgument('42')).toBe(42);
    expect(parseMetadataArgument('-3')).toBe(-3);
    expect(parseMetadataArgument('1.5')).toBe(1.5);
    expect(parseMetadataArgument('1e3')).toBe(1000);
  });

  it('keeps other values as trimmed text', () => {
    expect(parseMetadataArgument(' linux ')).toBe('linux');
    expect(parseMetadataArgument('20.1.0')).toBe('20.1.0');
  });
});

describe('parseMetadataAssignments', () => {
  it('parses comma separated key=value pairs', () => {
    expect(parseMetadataAssignments('os=linux, cpu_count=8')).toEqual({
      os: 'linux',
      cpu_count: 8,
    });
  });

  it('splits on the first equals sign only', () => {
    expect(parseMetadataAssignments('flags=-O2=on')).toEqual({ flags: '-O2=on' });
  });

  it('rejects assignments without a key', () => {
    expect(() => parseMetadataAssignments('linux')).toThrow(
      'Invalid metadata assignment "linux": expected key=value'
    );
    expect(() => parseMetadataAssignments('=linux')).toThrow('expected key=value');
    expect(() => parseMetadataAssignments(' , ')).toThrow(
      '--update-metadata requires at least one key=value pair'
    );
  });
});

describe('collectList', () => {
  it('appends comma separated items to previous values', () => {
    expect(collectList('a,b', ['x'])).toEqual(['x', 'a', 'b']);
    expect(collectList(' a , ,b')).toEqual(['a', 'b']);
  });
});
