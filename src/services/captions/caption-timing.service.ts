/**
 * Caption-time adjustments on an aligned word timeline.
 *
 * These run after alignment and never feed back into it: the display floor
 * may make a word's caption outlast the next word's start, which is fine for
 * rendering but would break the alignment guarantees if applied earlier.
 */

import type { AlignedWord } from '../../types/alignment.types';
import { DEFAULT_CAPTION_MIN_DISPLAY_SECONDS } from '../../config/alignment.config';
import { AppError } from '../../middleware/errorHandler';
import { roundTo } from '../alignment/timeline-repairer.service';

export interface CaptionCue {
  /** 1-based, as in SRT */
  index: number;
  start: number;
  end: number;
  text: string;
  words: AlignedWord[];
}

export interface CaptionGroupingOptions {
  maxWords: number;
  maxChars: number;
  /** Silence (seconds) between two words that forces a new cue */
  maxGap: number;
  /** Joins words inside a cue; use '' for unspaced scripts */
  joiner: string;
}

export const DEFAULT_CAPTION_GROUPING: CaptionGroupingOptions = {
  maxWords: 3,
  maxChars: 24,
  maxGap: 0.6,
  joiner: ' ',
};

/**
 * Extend every word shorter than `minDisplaySeconds` so it stays on screen
 * long enough to read. Start times are never moved.
 */
export function applyDisplayFloor(
  words: readonly AlignedWord[],
  minDisplaySeconds: number = DEFAULT_CAPTION_MIN_DISPLAY_SECONDS
): AlignedWord[] {
  return words.map((w) =>
    w.end - w.start < minDisplaySeconds ? { ...w, end: roundTo(w.start + minDisplaySeconds, 3) } : { ...w }
  );
}

/**
 * Retime words for audio played back at `speedFactor`x (1.3 = 30% faster).
 */
export function scaleTimeline(words: readonly AlignedWord[], speedFactor: number, decimals = 2): AlignedWord[] {
  if (!Number.isFinite(speedFactor) || speedFactor <= 0) {
    throw new AppError(`Speed factor must be a positive number, got ${speedFactor}`, 400, 'INVALID_SPEED_FACTOR');
  }
  return words.map((w) => ({
    word: w.word,
    start: roundTo(w.start / speedFactor, decimals),
    end: roundTo(w.end / speedFactor, decimals),
  }));
}

function buildCue(index: number, words: AlignedWord[], joiner: string): CaptionCue {
  return {
    index,
    start: words[0].start,
    end: words[words.length - 1].end,
    text: words.map((w) => w.word).join(joiner),
    words,
  };
}

/**
 * Group consecutive words into cues. A cue closes when adding the next word
 * would exceed `maxWords` or `maxChars`, or when the silence before the next
 * word is longer than `maxGap`. A single word longer than `maxChars` still
 * gets its own cue.
 */
export function groupIntoCaptions(
  words: readonly AlignedWord[],
  options: Partial<CaptionGroupingOptions> = {}
): CaptionCue[] {
  const opts: CaptionGroupingOptions = {
    maxWords: options.maxWords ?? DEFAULT_CAPTION_GROUPING.maxWords,
    maxChars: options.maxChars ?? DEFAULT_CAPTION_GROUPING.maxChars,
    maxGap: options.maxGap ?? DEFAULT_CAPTION_GROUPING.maxGap,
    joiner: options.joiner ?? DEFAULT_CAPTION_GROUPING.joiner,
  };
  const cues: CaptionCue[] = [];
  let current: AlignedWord[] = [];

  for (const word of words) {
    const previous = current[current.length - 1];
    if (previous) {
      const text = [...current, word].map((w) => w.word).join(opts.joiner);
      const overflow = current.length >= opts.maxWords || Array.from(text).length > opts.maxChars;
      const silence = word.start - previous.end > opts.maxGap;
      if (overflow || silence) {
        cues.push(buildCue(cues.length + 1, current, opts.joiner));
        current = [];
      }
    }
    current.push({ ...word });
  }

  if (current.length > 0) {
    cues.push(buildCue(cues.length + 1, current, opts.joiner));
  }
  return cues;
}

/** `HH:MM:SS<sep>mmm` */
export function formatTimestamp(seconds: number, separator: ',' | '.'): string {
  const totalMs = Math.max(0, Math.round(seconds * 1000));
  const ms = totalMs % 1000;
  const totalSeconds = Math.floor(totalMs / 1000);
  const s = totalSeconds % 60;
  const m = Math.floor(totalSeconds / 60) % 60;
  const h = Math.floor(totalSeconds / 3600);
  const pad = (n: number, width = 2) => String(n).padStart(width, '0');
  return `${pad(h)}:${pad(m)}:${pad(s)}${separator}${pad(ms, 3)}`;
}

export function toSrt(cues: readonly CaptionCue[]): string {
  return cues
    .map((cue) => `${cue.index}\n${formatTimestamp(cue.start, ',')} --> ${formatTimestamp(cue.end, ',')}\n${cue.text}\n`)
    .join('\n');
}

export function toWebVtt(cues: readonly CaptionCue[]): string {
  const body = cues
    .map((cue) => `${cue.index}\n${formatTimestamp(cue.start, '.')} --> ${formatTimestamp(cue.end, '.')}\n${cue.text}\n`)
    .join('\n');
  return `WEBVTT\n\n${body}`;
}
