import { describe, expect, test } from 'vitest';
import { normalizeText, tokenizeWords, TranscriptEncodingError } from './normalize.js';

describe('normalizeText', () => {
  test('only trims by default', () => {
    expect(normalizeText('  Hello, World!  ')).toBe('Hello, World!');
  });

  test('applies NFKC, lowercase and punctuation stripping when asked', () => {
    expect(normalizeText('ＡＢＣ, Def!', { nfkc: true, lowercase: true, stripPunct: true })).toBe('abc def');
  });

  test('rejects unpaired surrogates', () => {
    expect(() => normalizeText('a\uDC00b')).toThrow(TranscriptEncodingError);
    expect(normalizeText('emoji 😀')).toBe('emoji 😀');
  });
});

describe('tokenizeWords', () => {
  test('splits on whitespace and drops empties', () => {
    expect(tokenizeWords('  one\ttwo\n\nthree ')).toEqual(['one', 'two', 'three']);
  });
});
