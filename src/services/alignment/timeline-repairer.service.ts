/**
 * Timeline repair: raw, partially unresolved timings in, a complete ordered
 * word timeline out.
 *
 *   1. Monotonic pass over resolved tokens: start clamped to the previous
 *      end, collapsed intervals widened to `minDuration`
 *   2. Unresolved runs between anchors (or before the first anchor, from
 *      0.0) are spread evenly over the gap
 *   3. A trailing unresolved run is extrapolated at `trailingSecondsPerToken`
 *   4. Rounding happens once, at the end, in the same fold that re-checks
 *      order, so rounding can never reintroduce an overlap or a zero span
 *
 * Each pass is a fold over the sequence carrying the last end time; nothing
 * outside the call is read or written.
 */

import type { AlignedWord, RawTiming, TimeInterval } from '../../types/alignment.types';
import { InputEmptyError } from '../../middleware/errorHandler';
import { distributeEvenly } from './timestamp-projector.service';

export interface RepairOptions {
  minDuration: number;
  trailingSecondsPerToken: number;
  roundingDecimals: number;
}

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round((value + Number.EPSILON) * factor) / factor;
}

/**
 * Rule 1. Unresolved entries pass through untouched and do not move the
 * running end.
 */
export function enforceMonotonicity(raw: readonly RawTiming[], minDuration: number): RawTiming[] {
  return raw.reduce<{ timings: RawTiming[]; lastEnd: number }>(
    (acc, timing) => {
      if (!timing) {
        acc.timings.push(null);
        return acc;
      }
      const start = Math.max(timing.start, acc.lastEnd);
      const end = timing.end <= start ? start + minDuration : timing.end;
      acc.timings.push({ start, end });
      return { timings: acc.timings, lastEnd: end };
    },
    { timings: [], lastEnd: 0 }
  ).timings;
}

/**
 * Rules 2 and 3. Expects the output of `enforceMonotonicity`, so every
 * following anchor starts at or after the preceding anchor's end.
 */
export function fillUnresolved(
  timings: readonly RawTiming[],
  trailingSecondsPerToken: number
): TimeInterval[] {
  const filled: TimeInterval[] = [];
  let runStart = -1;
  let anchorEnd = 0;

  const closeRun = (runEnd: number, nextStart: number | null) => {
    const count = runEnd - runStart;
    const gapEnd = nextStart ?? anchorEnd + trailingSecondsPerToken * count;
    filled.push(...distributeEvenly(anchorEnd, gapEnd, count));
    runStart = -1;
  };

  timings.forEach((timing, i) => {
    if (!timing) {
      if (runStart === -1) runStart = i;
      return;
    }
    if (runStart !== -1) closeRun(i, timing.start);
    filled.push(timing);
    anchorEnd = timing.end;
  });

  if (runStart !== -1) closeRun(timings.length, null);
  return filled;
}

/**
 * Round, then re-check order in the rounded domain. A span that rounded to
 * zero is widened by at least one rounding step.
 */
export function finalizeTimeline(
  words: readonly string[],
  timings: readonly TimeInterval[],
  options: RepairOptions
): AlignedWord[] {
  const { roundingDecimals } = options;
  const step = Math.max(options.minDuration, 10 ** -roundingDecimals);

  return timings.reduce<{ words: AlignedWord[]; lastEnd: number }>(
    (acc, timing, i) => {
      const start = roundTo(Math.max(timing.start, acc.lastEnd), roundingDecimals);
      let end = roundTo(timing.end, roundingDecimals);
      if (end <= start) {
        end = roundTo(start + step, roundingDecimals);
      }
      acc.words.push({ word: words[i], start, end });
      return { words: acc.words, lastEnd: end };
    },
    { words: [], lastEnd: 0 }
  ).words;
}

export function repairTimeline(
  words: readonly string[],
  raw: readonly RawTiming[],
  options: RepairOptions
): AlignedWord[] {
  if (words.length === 0) {
    throw new InputEmptyError();
  }
  if (raw.length !== words.length) {
    throw new Error(`Timing count ${raw.length} does not match token count ${words.length}`);
  }

  const monotonic = enforceMonotonicity(raw, options.minDuration);
  const filled = fillUnresolved(monotonic, options.trailingSecondsPerToken);
  return finalizeTimeline(words, filled, options);
}

/**
 * Degraded mode for callers that caught `NoTimeSourceError`: equal slots
 * over `totalDurationSeconds`, or the trailing rate per token when the total
 * is unknown.
 */
export function buildUniformTimeline(
  words: readonly string[],
  totalDurationSeconds: number | null,
  options: RepairOptions
): AlignedWord[] {
  if (words.length === 0) {
    throw new InputEmptyError();
  }
  const total =
    totalDurationSeconds && totalDurationSeconds > 0
      ? totalDurationSeconds
      : options.trailingSecondsPerToken * words.length;

  return finalizeTimeline(words, distributeEvenly(0, total, words.length), options);
}
