import type { NormalizationConfig } from '../types.js';

// Everything off: plain whitespace tokenization of the trimmed text.
const defaultConfig: Required<NormalizationConfig> = {
  nfkc: false,
  lowercase: false,
  stripPunct: false,
};

const punctRegex = /[\p{P}\p{S}]/gu;
const spaceRegex = /\s+/;
const loneSurrogateRegex = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

export class TranscriptEncodingError extends Error {
  code: 'MALFORMED_TEXT';

  constructor(message: string) {
    super(message);
    this.name = 'TranscriptEncodingError';
    this.code = 'MALFORMED_TEXT';
  }
}

export function normalizeText(text: string, config?: NormalizationConfig): string {
  if (loneSurrogateRegex.test(text)) {
    throw new TranscriptEncodingError('text contains an unpaired UTF-16 surrogate');
  }
  const settings = { ...defaultConfig, ...config };
  let output = text;

  if (settings.nfkc) {
    output = output.normalize('NFKC');
  }
  if (settings.lowercase) {
    output = output.toLowerCase();
  }
  if (settings.stripPunct) {
    output = output.replace(punctRegex, '');
  }
  return output.trim();
}

export function tokenizeWords(text: string, config?: NormalizationConfig): string[] {
  return normalizeText(text, config).split(spaceRegex).filter(Boolean);
}
