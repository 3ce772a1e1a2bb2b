import type { CharacterTimeMap, HypothesisFragment } from '../../types/alignment.types';
import { MalformedFragmentError } from '../../middleware/errorHandler';

/**
 * Reject fragments that would put invalid intervals into the time map:
 * missing or empty text, non-finite or negative times, `end < start`.
 */
export function validateFragments(fragments: readonly HypothesisFragment[]): void {
  fragments.forEach((fragment, index) => {
    if (typeof fragment.text !== 'string' || fragment.text.length === 0) {
      throw new MalformedFragmentError(index, 'text is missing');
    }
    if (!Number.isFinite(fragment.start) || !Number.isFinite(fragment.end)) {
      throw new MalformedFragmentError(index, 'start and end must be finite numbers');
    }
    if (fragment.start < 0) {
      throw new MalformedFragmentError(index, `start ${fragment.start} is negative`);
    }
    if (fragment.end < fragment.start) {
      throw new MalformedFragmentError(index, `end ${fragment.end} is before start ${fragment.start}`);
    }
  });
}

/**
 * Expand fragments into one entry per code point. Every character of a
 * fragment gets that fragment's whole interval; no intra-fragment split.
 * An empty fragment list gives an empty map.
 */
export function flattenFragments(fragments: readonly HypothesisFragment[]): CharacterTimeMap {
  validateFragments(fragments);

  const characters: string[] = [];
  const intervals: CharacterTimeMap['intervals'] = [];

  for (const fragment of fragments) {
    const interval = { start: fragment.start, end: fragment.end };
    for (const char of fragment.text.normalize('NFC')) {
      characters.push(char);
      intervals.push(interval);
    }
  }

  return { characters, intervals };
}
