/**
 * Global sequence alignment by recursive longest-matching-block partition
 * (Ratcliff/Obershelp).
 *
 * The whole reference is aligned against the whole hypothesis in one pass:
 * find the longest common contiguous block, then recurse on the pair of
 * prefixes and the pair of suffixes on either side of it. Because blocks are
 * only ever searched inside the ranges left between earlier blocks, matches
 * never cross each other and the resulting opcodes are ordered on both sides.
 *
 * Units are compared by key (`unit` itself, or `toKey(unit)`), so the same
 * matcher works for code points and for whole tokens.
 */

import type { EditOpcode, OpcodeTag } from '../../types/alignment.types';

export interface MatchingBlock {
  /** Start in the reference sequence */
  a: number;
  /** Start in the hypothesis sequence */
  b: number;
  size: number;
}

export type UnitKey = string | number;

interface SearchRange {
  alo: number;
  ahi: number;
  blo: number;
  bhi: number;
}

/**
 * Index hypothesis positions by unit key; position lists are ascending.
 */
function indexPositions(keys: readonly UnitKey[]): Map<UnitKey, number[]> {
  const index = new Map<UnitKey, number[]>();
  keys.forEach((key, j) => {
    const positions = index.get(key);
    if (positions) {
      positions.push(j);
    } else {
      index.set(key, [j]);
    }
  });
  return index;
}

/**
 * Longest common block of `a[alo:ahi]` and `b[blo:bhi]`.
 *
 * Ties go to the block starting earliest in `a`, then earliest in `b`.
 * Returns a zero-size block at `(alo, blo)` when nothing matches.
 */
export function findLongestMatch(
  a: readonly UnitKey[],
  bIndex: Map<UnitKey, number[]>,
  range: SearchRange
): MatchingBlock {
  const { alo, ahi, blo, bhi } = range;
  let bestA = alo;
  let bestB = blo;
  let bestSize = 0;

  // runLengths.get(j) = length of the match ending at a[i - 1] and b[j]
  let runLengths = new Map<number, number>();

  for (let i = alo; i < ahi; i++) {
    const next = new Map<number, number>();
    const positions = bIndex.get(a[i]) ?? [];

    for (const j of positions) {
      if (j < blo) continue;
      if (j >= bhi) break;

      const k = (runLengths.get(j - 1) ?? 0) + 1;
      next.set(j, k);
      // strict > keeps the earliest start on both sides
      if (k > bestSize) {
        bestA = i - k + 1;
        bestB = j - k + 1;
        bestSize = k;
      }
    }
    runLengths = next;
  }

  return { a: bestA, b: bestB, size: bestSize };
}

/**
 * All matching blocks, in order, with adjacent blocks merged. The list ends
 * with a zero-size sentinel at `(a.length, b.length)`.
 */
export function getMatchingBlocks(a: readonly UnitKey[], b: readonly UnitKey[]): MatchingBlock[] {
  const bIndex = indexPositions(b);
  const found: MatchingBlock[] = [];
  const pending: SearchRange[] = [{ alo: 0, ahi: a.length, blo: 0, bhi: b.length }];

  while (pending.length > 0) {
    const range = pending.pop();
    if (!range) break;

    const match = findLongestMatch(a, bIndex, range);
    if (match.size === 0) continue;

    found.push(match);
    if (range.alo < match.a && range.blo < match.b) {
      pending.push({ alo: range.alo, ahi: match.a, blo: range.blo, bhi: match.b });
    }
    if (match.a + match.size < range.ahi && match.b + match.size < range.bhi) {
      pending.push({
        alo: match.a + match.size,
        ahi: range.ahi,
        blo: match.b + match.size,
        bhi: range.bhi,
      });
    }
  }

  found.sort((x, y) => x.a - y.a || x.b - y.b);

  const merged: MatchingBlock[] = [];
  for (const block of found) {
    const last = merged[merged.length - 1];
    if (last && last.a + last.size === block.a && last.b + last.size === block.b) {
      last.size += block.size;
    } else {
      merged.push({ ...block });
    }
  }

  merged.push({ a: a.length, b: b.length, size: 0 });
  return merged;
}

/**
 * Convert matching blocks to opcodes that partition both sequences.
 */
export function blocksToOpcodes(blocks: readonly MatchingBlock[]): EditOpcode[] {
  const opcodes: EditOpcode[] = [];
  let i = 0;
  let j = 0;

  for (const block of blocks) {
    let tag: OpcodeTag | null = null;
    if (i < block.a && j < block.b) {
      tag = 'replace';
    } else if (i < block.a) {
      tag = 'delete';
    } else if (j < block.b) {
      tag = 'insert';
    }
    if (tag) {
      opcodes.push({ tag, i1: i, i2: block.a, j1: j, j2: block.b });
    }

    i = block.a + block.size;
    j = block.b + block.size;
    if (block.size > 0) {
      opcodes.push({ tag: 'equal', i1: block.a, i2: i, j1: block.b, j2: j });
    }
  }

  return opcodes;
}

/**
 * Align a reference sequence against a hypothesis sequence and return the
 * full edit script covering both end to end.
 */
export function align<T>(
  reference: readonly T[],
  hypothesis: readonly T[],
  toKey: (unit: T) => UnitKey = defaultKey
): EditOpcode[] {
  const a = reference.map(toKey);
  const b = hypothesis.map(toKey);
  return blocksToOpcodes(getMatchingBlocks(a, b));
}

function defaultKey(unit: unknown): UnitKey {
  return typeof unit === 'number' ? unit : String(unit);
}
