import { describe, expect, test } from 'vitest';

import { CsvSyntaxError, escapeCsvValue, parseCsv, stringifyCsv } from '../csv.js';

describe('escapeCsvValue', () => {
  test('leaves plain values alone', () => {
    expect(escapeCsvValue('plain value')).toBe('plain value');
  });

  test('quotes values with separators, quotes or line breaks', () => {
    expect(escapeCsvValue('a,b')).toBe('"a,b"');
    expect(escapeCsvValue('say "hi"')).toBe('"say ""hi"""');
    expect(escapeCsvValue('two\nlines')).toBe('"two\nlines"');
  });
});

describe('parseCsv', () => {
  test('reads quoted fields spanning lines', () => {
    const text = stringifyCsv([
      ['id', 'note'],
      ['1', 'line one\nline "two"'],
      ['2', ''],
    ]);

    expect(parseCsv(text)).toEqual([
      { line: 1, values: ['id', 'note'] },
      { line: 2, values: ['1', 'line one\nline "two"'] },
      { line: 4, values: ['2', ''] },
    ]);
  });

  test('accepts CRLF and skips blank lines', () => {
    expect(parseCsv('a,b\r\n\r\nc,d')).toEqual([
      { line: 1, values: ['a', 'b'] },
      { line: 3, values: ['c', 'd'] },
    ]);
  });

  test('rejects an unterminated quote with its line number', () => {
    expect(() => parseCsv('a,b\n1,"open\n')).toThrow(CsvSyntaxError);
    try {
      parseCsv('a,b\n1,"open\n');
    } catch (err) {
      expect(err).toBeInstanceOf(CsvSyntaxError);
      expect(err instanceof CsvSyntaxError ? err.line : -1).toBe(2);
    }
  });

  test('rejects text after a closing quote', () => {
    expect(() => parseCsv('"a"b,c')).toThrow('unexpected text after a closing quote');
  });
});
