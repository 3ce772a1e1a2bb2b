/**
 * Canonical alignment types shared by the alignment engine, the caption
 * timing helpers, the HTTP controllers and the alignment worker.
 *
 * All times are seconds (float). Character offsets count Unicode code points,
 * not UTF-16 units, so unspaced scripts with combining marks line up.
 */

/** How the reference and the hypothesis are compared. */
export const ALIGNMENT_GRANULARITIES = ['character', 'token'] as const;
export type AlignmentGranularity = (typeof ALIGNMENT_GRANULARITIES)[number];

/** A word of the reference script, produced once by the normalizer. */
export interface Token {
  text: string;
  /** Ordinal position in the reference sequence */
  index: number;
  /** Half-open code point range inside the concatenated reference string */
  charStart: number;
  charEnd: number;
}

/** A timestamped span of the external transcript (ASR or forced aligner). */
export interface HypothesisFragment {
  text: string;
  start: number;
  end: number;
}

export interface TimeInterval {
  start: number;
  end: number;
}

/**
 * Flattened hypothesis: `characters[i]` was produced by a fragment spanning
 * `intervals[i]`. Both arrays always have the same length.
 */
export interface CharacterTimeMap {
  characters: string[];
  intervals: TimeInterval[];
}

export type OpcodeTag = 'equal' | 'replace' | 'insert' | 'delete';

/** `[i1, i2)` is a reference range, `[j1, j2)` the matching hypothesis range. */
export interface EditOpcode {
  tag: OpcodeTag;
  i1: number;
  i2: number;
  j1: number;
  j2: number;
}

/** Projector output for one token; `null` means unresolved. */
export type RawTiming = TimeInterval | null;

/** Final output unit handed to caption rendering. */
export interface AlignedWord {
  word: string;
  start: number;
  end: number;
}

export interface AlignmentOptions {
  granularity: AlignmentGranularity;
  /** Duration forced on a token whose end collapsed onto its start */
  minDuration: number;
  /** Seconds per token when extrapolating a trailing unresolved run */
  trailingSecondsPerToken: number;
  /** Matched characters an overlap needs before it is trusted for longer tokens */
  minMatchChars: number;
  /** Tokens of this length or shorter accept any overlap */
  shortTokenLength: number;
  roundingDecimals: number;
  /** BCP 47 locale used for word segmentation */
  locale: string;
  stripPunctuation: boolean;
  caseSensitive: boolean;
  /** Phrases that must survive segmentation as single tokens */
  customDictionary: string[];
}

export interface AlignmentStats {
  granularity: AlignmentGranularity;
  tokenCount: number;
  fragmentCount: number;
  opcodeCount: number;
  resolvedCount: number;
  unresolvedCount: number;
}

export interface AlignmentResult {
  words: AlignedWord[];
  stats: AlignmentStats;
}

/** Reference input: raw script text, or an already segmented token list. */
export type ReferenceInput = string | readonly string[];
