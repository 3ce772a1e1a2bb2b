/**
 * Script normalization and word segmentation.
 *
 * Segmentation goes through `Intl.Segmenter`, which carries dictionary-based
 * word breaking for scripts written without spaces (Thai, Lao, Khmer, CJK).
 * Output order always follows the input text; the same input and options
 * always yield the same tokens.
 */

import type { Token } from '../../types/alignment.types';

export interface SegmentationOptions {
  locale: string;
  stripPunctuation: boolean;
  customDictionary: readonly string[];
}

const DEFAULT_SEGMENTATION: SegmentationOptions = {
  locale: 'th',
  stripPunctuation: true,
  customDictionary: [],
};

const ZERO_WIDTH = /[\u200B\u200C\u200D\uFEFF]/g;
const PUNCTUATION_ONLY = /^[\p{P}\p{S}]+$/u;
const WHITESPACE_ONLY = /^\s*$/;

/** Code point length, so combining marks count once each. */
export function codePointLength(text: string): number {
  return Array.from(text).length;
}

export function normalizeScriptText(raw: string): string {
  return raw.normalize('NFC').replace(ZERO_WIDTH, '').replace(/\s+/g, ' ').trim();
}

export function isPunctuationOnly(text: string): boolean {
  return PUNCTUATION_ONLY.test(text);
}

/**
 * Merge consecutive segments whose concatenation is a dictionary phrase.
 * Longer phrases win; scanning is left to right.
 */
function applyCustomDictionary(segments: string[], dictionary: readonly string[]): string[] {
  const phrases = dictionary
    .map((p) => p.normalize('NFC'))
    .filter((p) => p.length > 0)
    .sort((x, y) => y.length - x.length);
  if (phrases.length === 0) return segments;

  const merged: string[] = [];
  let pos = 0;

  while (pos < segments.length) {
    let consumed = 0;

    for (const phrase of phrases) {
      let joined = '';
      let end = pos;
      while (end < segments.length && joined.length < phrase.length) {
        joined += segments[end];
        end++;
      }
      if (joined === phrase && end - pos > 1) {
        merged.push(phrase);
        consumed = end - pos;
        break;
      }
    }

    if (consumed === 0) {
      merged.push(segments[pos]);
      pos++;
    } else {
      pos += consumed;
    }
  }

  return merged;
}

/**
 * Split normalized text into word strings. Whitespace never survives; pure
 * punctuation is dropped when `stripPunctuation` is set.
 */
export function segmentWords(text: string, options: Partial<SegmentationOptions> = {}): string[] {
  const opts: SegmentationOptions = {
    locale: options.locale ?? DEFAULT_SEGMENTATION.locale,
    stripPunctuation: options.stripPunctuation ?? DEFAULT_SEGMENTATION.stripPunctuation,
    customDictionary: options.customDictionary ?? DEFAULT_SEGMENTATION.customDictionary,
  };
  const segmenter = new Intl.Segmenter(opts.locale, { granularity: 'word' });
  const segments = Array.from(segmenter.segment(text), (s) => s.segment);

  return applyCustomDictionary(segments, opts.customDictionary)
    .map((s) => s.trim())
    .filter((s) => !WHITESPACE_ONLY.test(s))
    .filter((s) => !(opts.stripPunctuation && isPunctuationOnly(s)));
}

/**
 * Number tokens and record their code point offsets in the reference string
 * (tokens joined without separators).
 */
export function buildTokens(words: readonly string[]): Token[] {
  const tokens: Token[] = [];
  let offset = 0;

  for (const word of words) {
    const text = word.normalize('NFC').trim();
    if (!text) continue;

    const length = codePointLength(text);
    tokens.push({ text, index: tokens.length, charStart: offset, charEnd: offset + length });
    offset += length;
  }

  return tokens;
}

export function tokenizeScript(raw: string, options: Partial<SegmentationOptions> = {}): Token[] {
  return buildTokens(segmentWords(normalizeScriptText(raw), options));
}

/** Reference string the character-level aligner runs on. */
export function joinTokens(tokens: readonly Token[]): string {
  return tokens.map((t) => t.text).join('');
}
