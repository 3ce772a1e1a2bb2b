import {
  distributeEvenly,
  matchedHypothesisIndices,
  projectCharacterTimings,
  projectTokenTimings,
} from '../../src/services/alignment/timestamp-projector.service';
import { align } from '../../src/services/alignment/sequence-matcher';
import { flattenFragments } from '../../src/services/alignment/timestamp-flattener.service';
import { buildTokens, joinTokens } from '../../src/services/alignment/text-normalizer.service';
import type { EditOpcode } from '../../src/types/alignment.types';

const policy = { minMatchChars: 2, shortTokenLength: 2 };

describe('matchedHypothesisIndices', () => {
  const token = { text: 'cde', index: 1, charStart: 2, charEnd: 5 };
  const equalOps: EditOpcode[] = [
    { tag: 'equal', i1: 0, i2: 3, j1: 0, j2: 3 },
    { tag: 'equal', i1: 4, i2: 6, j1: 5, j2: 7 },
  ];

  test('single-character overlaps on a long token are rejected', () => {
    expect(matchedHypothesisIndices(token, equalOps, policy)).toEqual([]);
  });

  test('a lower threshold accepts them', () => {
    expect(matchedHypothesisIndices(token, equalOps, { minMatchChars: 1, shortTokenLength: 2 })).toEqual([2, 5]);
  });

  test('short tokens accept any overlap', () => {
    const short = { text: 'cd', index: 1, charStart: 2, charEnd: 4 };
    expect(matchedHypothesisIndices(short, equalOps, policy)).toEqual([2]);
  });
});

describe('projectCharacterTimings', () => {
  test('a word missing from the transcript stays unresolved', () => {
    const tokens = buildTokens(['hello', 'big', 'world']);
    const timeMap = flattenFragments([
      { text: 'hello', start: 0, end: 0.5 },
      { text: 'world', start: 1, end: 1.5 },
    ]);
    const opcodes = align(Array.from(joinTokens(tokens)), timeMap.characters);

    expect(opcodes.map((op) => op.tag)).toEqual(['equal', 'delete', 'equal']);
    expect(projectCharacterTimings(tokens, timeMap, opcodes, policy)).toEqual([
      { start: 0, end: 0.5 },
      null,
      { start: 1, end: 1.5 },
    ]);
  });

  test('tokens sharing a fragment both get its full interval', () => {
    const tokens = buildTokens(['ab', 'cd']);
    const timeMap = flattenFragments([{ text: 'abcd', start: 0, end: 2 }]);
    const opcodes = align(Array.from(joinTokens(tokens)), timeMap.characters);

    expect(projectCharacterTimings(tokens, timeMap, opcodes, policy)).toEqual([
      { start: 0, end: 2 },
      { start: 0, end: 2 },
    ]);
  });

  test('a token spanning two fragments takes min start and max end', () => {
    const tokens = buildTokens(['sunshine']);
    const timeMap = flattenFragments([
      { text: 'sun', start: 0.2, end: 0.5 },
      { text: 'shine', start: 0.6, end: 1.1 },
    ]);
    const opcodes = align(Array.from(joinTokens(tokens)), timeMap.characters);

    expect(projectCharacterTimings(tokens, timeMap, opcodes, policy)).toEqual([{ start: 0.2, end: 1.1 }]);
  });
});

describe('distributeEvenly', () => {
  test('equal slots ending exactly on the span end', () => {
    expect(distributeEvenly(0, 1, 4)).toEqual([
      { start: 0, end: 0.25 },
      { start: 0.25, end: 0.5 },
      { start: 0.5, end: 0.75 },
      { start: 0.75, end: 1 },
    ]);

    const thirds = distributeEvenly(1, 2, 3);
    expect(thirds[1].start).toBeCloseTo(4 / 3);
    expect(thirds[2].end).toBe(2);
  });
});

describe('projectTokenTimings', () => {
  test('equal copies and replace spreads the hypothesis span', () => {
    const fragments = [
      { text: 'a', start: 0, end: 1 },
      { text: 'zz', start: 1, end: 3 },
      { text: 'd', start: 3, end: 4 },
    ];
    const opcodes = align(['a', 'b', 'c', 'd'], fragments.map((f) => f.text));

    expect(projectTokenTimings(4, fragments, opcodes)).toEqual([
      { start: 0, end: 1 },
      { start: 1, end: 2 },
      { start: 2, end: 3 },
      { start: 3, end: 4 },
    ]);
  });

  test('placeholder tokens take the timing of the word they replace', () => {
    const fragments = [
      { text: 'the', start: 0, end: 0.4 },
      { text: '<unk>', start: 0.4, end: 1 },
      { text: 'fox', start: 1, end: 1.3 },
    ];
    const opcodes = align(['the', 'quick', 'fox'], fragments.map((f) => f.text));

    expect(projectTokenTimings(3, fragments, opcodes)).toEqual([
      { start: 0, end: 0.4 },
      { start: 0.4, end: 1 },
      { start: 1, end: 1.3 },
    ]);
  });

  test('inserted words are dropped and deleted words stay unresolved', () => {
    const fragments = [
      { text: 'one', start: 0, end: 1 },
      { text: 'um', start: 1, end: 1.5 },
      { text: 'three', start: 2, end: 3 },
    ];
    const opcodes = align(['one', 'three', 'four'], fragments.map((f) => f.text));

    expect(projectTokenTimings(3, fragments, opcodes)).toEqual([
      { start: 0, end: 1 },
      { start: 2, end: 3 },
      null,
    ]);
  });
});
