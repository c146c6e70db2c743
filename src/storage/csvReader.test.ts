import { describe, expect, test } from 'vitest';
import { parseCsv, parseCsvRecords } from './csvReader.js';

describe('parseCsv', () => {
  test('handles quotes, embedded delimiters and CRLF', () => {
    const text = 'a,b\r\n"x, y","he said ""ok"""\r\n"multi\nline",2\r\n';
    expect(parseCsv(text)).toEqual([
      ['a', 'b'],
      ['x, y', 'he said "ok"'],
      ['multi\nline', '2'],
    ]);
  });

  test('keeps empty fields and skips blank lines', () => {
    expect(parseCsv('a,,c\n\nd,e,\n')).toEqual([
      ['a', '', 'c'],
      ['d', 'e', ''],
    ]);
  });

  test('ignores a leading byte order mark', () => {
    expect(parseCsv('\uFEFFid,wer\n1,5')).toEqual([
      ['id', 'wer'],
      ['1', '5'],
    ]);
  });
});

describe('parseCsvRecords', () => {
  test('keys cells by header', () => {
    const { header, records } = parseCsvRecords('id,wer\n1,12.5\n2');
    expect(header).toEqual(['id', 'wer']);
    expect(records).toEqual([
      { id: '1', wer: '12.5' },
      { id: '2', wer: '' },
    ]);
  });
});
