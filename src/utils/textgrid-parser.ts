/**
 * Praat TextGrid reader for forced-aligner output (e.g. Montreal Forced
 * Aligner `long_textgrid` / `short_textgrid` exports).
 *
 * Both layouts carry the same value stream; the long one just labels each
 * value (`xmin = 0`). We tokenize the file into strings, numbers and
 * `<exists>`/`<absent>` flags, ignore labels, and read the stream in order.
 */

import type { HypothesisFragment } from '../types/alignment.types';
import { AppError } from '../middleware/errorHandler';

export class TextGridParseError extends AppError {
  constructor(message: string) {
    super(`Invalid TextGrid: ${message}`, 400, 'MALFORMED_TEXTGRID');
  }
}

export interface TextGridInterval {
  xmin: number;
  xmax: number;
  text: string;
}

export interface TextGridPoint {
  time: number;
  mark: string;
}

export type TextGridTier =
  | { kind: 'interval'; name: string; xmin: number; xmax: number; intervals: TextGridInterval[] }
  | { kind: 'point'; name: string; xmin: number; xmax: number; points: TextGridPoint[] };

export interface TextGrid {
  xmin: number;
  xmax: number;
  tiers: TextGridTier[];
}

type StreamValue =
  | { type: 'string'; value: string }
  | { type: 'number'; value: number }
  | { type: 'flag'; value: boolean };

const VALUE_PATTERN = /"((?:[^"]|"")*)"|<(exists|absent)>|(\S+)/g;
const NUMBER_PATTERN = /^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;

function tokenize(content: string): StreamValue[] {
  const values: StreamValue[] = [];
  for (const match of content.replace(/^\uFEFF/, '').matchAll(VALUE_PATTERN)) {
    const [, quoted, flag, bare] = match;
    if (quoted !== undefined) {
      values.push({ type: 'string', value: quoted.replace(/""/g, '"') });
    } else if (flag !== undefined) {
      values.push({ type: 'flag', value: flag === 'exists' });
    } else if (bare !== undefined && NUMBER_PATTERN.test(bare)) {
      values.push({ type: 'number', value: Number(bare) });
    }
    // anything else is a label such as `xmin`, `=`, `item [1]:`
  }
  return values;
}

function isValueOf<K extends StreamValue['type']>(
  value: StreamValue,
  type: K
): value is Extract<StreamValue, { type: K }> {
  return value.type === type;
}

class ValueReader {
  private pos = 0;

  constructor(private readonly values: StreamValue[]) {}

  private next<K extends StreamValue['type']>(expected: K): Extract<StreamValue, { type: K }> {
    const value = this.values[this.pos];
    if (!value) {
      throw new TextGridParseError(`unexpected end of file, expected ${expected}`);
    }
    if (!isValueOf(value, expected)) {
      throw new TextGridParseError(`expected ${expected} at value ${this.pos + 1}, found ${value.type}`);
    }
    this.pos++;
    return value;
  }

  string(): string {
    return this.next('string').value;
  }

  number(): number {
    return this.next('number').value;
  }

  count(): number {
    const n = this.number();
    if (!Number.isInteger(n) || n < 0) {
      throw new TextGridParseError(`invalid count ${n}`);
    }
    return n;
  }

  flag(): boolean {
    return this.next('flag').value;
  }
}

export function parseTextGrid(content: string): TextGrid {
  const reader = new ValueReader(tokenize(content));

  const fileType = reader.string();
  const objectClass = reader.string();
  if (fileType !== 'ooTextFile' || objectClass !== 'TextGrid') {
    throw new TextGridParseError(`unsupported header "${fileType}" / "${objectClass}"`);
  }

  const xmin = reader.number();
  const xmax = reader.number();
  if (!reader.flag()) {
    return { xmin, xmax, tiers: [] };
  }

  const tierCount = reader.count();
  const tiers: TextGridTier[] = [];

  for (let t = 0; t < tierCount; t++) {
    const tierClass = reader.string();
    const name = reader.string();
    const tierMin = reader.number();
    const tierMax = reader.number();
    const size = reader.count();

    if (tierClass === 'IntervalTier') {
      const intervals: TextGridInterval[] = [];
      for (let i = 0; i < size; i++) {
        intervals.push({ xmin: reader.number(), xmax: reader.number(), text: reader.string() });
      }
      tiers.push({ kind: 'interval', name, xmin: tierMin, xmax: tierMax, intervals });
    } else if (tierClass === 'TextTier') {
      const points: TextGridPoint[] = [];
      for (let i = 0; i < size; i++) {
        points.push({ time: reader.number(), mark: reader.string() });
      }
      tiers.push({ kind: 'point', name, xmin: tierMin, xmax: tierMax, points });
    } else {
      throw new TextGridParseError(`unknown tier class "${tierClass}"`);
    }
  }

  return { xmin, xmax, tiers };
}

export interface TierSelection {
  /** Tier to read; defaults to the first interval tier (MFA puts words first) */
  tierName?: string;
}

const SKIPPED_MARKS = new Set(['', '<eps>']);

function roundMillis(seconds: number): number {
  return Math.round(seconds * 1000) / 1000;
}

/**
 * Word intervals as hypothesis fragments. Silence (empty marks) and `<eps>`
 * are skipped; `<unk>` is kept for token-level repair.
 */
export function textGridToFragments(content: string, selection: TierSelection = {}): HypothesisFragment[] {
  const grid = parseTextGrid(content);
  const intervalTiers = grid.tiers.filter(
    (tier): tier is Extract<TextGridTier, { kind: 'interval' }> => tier.kind === 'interval'
  );

  const tier = selection.tierName
    ? intervalTiers.find((t) => t.name === selection.tierName)
    : intervalTiers[0];
  if (!tier) {
    throw new TextGridParseError(
      selection.tierName ? `no interval tier named "${selection.tierName}"` : 'no interval tier found'
    );
  }

  return tier.intervals
    .map((interval) => ({ ...interval, text: interval.text.trim() }))
    .filter((interval) => !SKIPPED_MARKS.has(interval.text))
    .map((interval) => ({
      text: interval.text,
      start: roundMillis(interval.xmin),
      end: roundMillis(interval.xmax),
    }));
}
