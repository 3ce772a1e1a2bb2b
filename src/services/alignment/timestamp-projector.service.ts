/**
 * Timestamp projection: turn an edit script into a raw `(start, end)` per
 * reference token, or `null` where no trustworthy timing exists.
 *
 * Two granularities share the same opcodes format:
 *   - character: tokens are located by their code point range in the joined
 *     reference string and pick up the intervals of every hypothesis
 *     character an `equal` opcode maps onto them
 *   - token: opcodes run over whole tokens; `equal` copies timing, `replace`
 *     spreads the hypothesis span evenly, `insert` is dropped and `delete`
 *     stays unresolved
 */

import type {
  CharacterTimeMap,
  EditOpcode,
  HypothesisFragment,
  RawTiming,
  TimeInterval,
  Token,
} from '../../types/alignment.types';

export interface OverlapPolicy {
  /** Matched characters an overlap needs when the token is longer than `shortTokenLength` */
  minMatchChars: number;
  shortTokenLength: number;
}

// ---------------------------------------------------------------------------
// Character granularity
// ---------------------------------------------------------------------------

/**
 * Hypothesis character indices that `equal` opcodes map onto the token's
 * reference range. Overlaps shorter than the policy allows are ignored.
 */
export function matchedHypothesisIndices(
  token: Token,
  equalOpcodes: readonly EditOpcode[],
  policy: OverlapPolicy
): number[] {
  const tokenLength = token.charEnd - token.charStart;
  const indices: number[] = [];

  for (const op of equalOpcodes) {
    if (op.i1 >= token.charEnd) break;
    if (op.i2 <= token.charStart) continue;

    const overlapStart = Math.max(token.charStart, op.i1);
    const overlapEnd = Math.min(token.charEnd, op.i2);
    const matched = overlapEnd - overlapStart;
    if (matched <= 0) continue;
    if (tokenLength > policy.shortTokenLength && matched < policy.minMatchChars) continue;

    const from = op.j1 + (overlapStart - op.i1);
    const to = op.j1 + (overlapEnd - op.i1);
    for (let j = from; j < to; j++) {
      indices.push(j);
    }
  }

  return indices;
}

export function projectCharacterTimings(
  tokens: readonly Token[],
  timeMap: CharacterTimeMap,
  opcodes: readonly EditOpcode[],
  policy: OverlapPolicy
): RawTiming[] {
  const equalOpcodes = opcodes.filter((op) => op.tag === 'equal');

  return tokens.map((token) => {
    const indices = matchedHypothesisIndices(token, equalOpcodes, policy).filter(
      (j) => j < timeMap.intervals.length
    );
    if (indices.length === 0) return null;

    let start = Infinity;
    let end = -Infinity;
    for (const j of indices) {
      const interval = timeMap.intervals[j];
      start = Math.min(start, interval.start);
      end = Math.max(end, interval.end);
    }
    return { start, end };
  });
}

// ---------------------------------------------------------------------------
// Token granularity
// ---------------------------------------------------------------------------

/**
 * Spread `[start, end)` evenly over `count` slots, cumulatively, so the last
 * slot ends on `end` up to float error.
 */
export function distributeEvenly(start: number, end: number, count: number): TimeInterval[] {
  const step = (end - start) / count;
  const slots: TimeInterval[] = [];
  let cursor = start;
  for (let k = 0; k < count; k++) {
    const next = k === count - 1 ? end : cursor + step;
    slots.push({ start: cursor, end: next });
    cursor = next;
  }
  return slots;
}

export function projectTokenTimings(
  tokenCount: number,
  fragments: readonly HypothesisFragment[],
  opcodes: readonly EditOpcode[]
): RawTiming[] {
  const raw: RawTiming[] = new Array<RawTiming>(tokenCount).fill(null);

  for (const op of opcodes) {
    switch (op.tag) {
      case 'equal':
        for (let k = 0; k < op.i2 - op.i1; k++) {
          const fragment = fragments[op.j1 + k];
          raw[op.i1 + k] = { start: fragment.start, end: fragment.end };
        }
        break;
      case 'replace': {
        const spanStart = fragments[op.j1].start;
        const spanEnd = fragments[op.j2 - 1].end;
        distributeEvenly(spanStart, spanEnd, op.i2 - op.i1).forEach((slot, k) => {
          raw[op.i1 + k] = slot;
        });
        break;
      }
      case 'insert':
      case 'delete':
        // insert: hypothesis-only words carry no reference token
        // delete: left for the repairer
        break;
    }
  }

  return raw;
}
