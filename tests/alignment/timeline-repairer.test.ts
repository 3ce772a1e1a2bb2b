import {
  buildUniformTimeline,
  enforceMonotonicity,
  fillUnresolved,
  finalizeTimeline,
  repairTimeline,
  roundTo,
} from '../../src/services/alignment/timeline-repairer.service';
import { InputEmptyError } from '../../src/middleware/errorHandler';

const options = { minDuration: 0.1, trailingSecondsPerToken: 0.5, roundingDecimals: 2 };

test('roundTo', () => {
  expect(roundTo(2.3456, 2)).toBe(2.35);
  expect(roundTo(0.125, 2)).toBe(0.13);
  expect(roundTo(1.5, 0)).toBe(2);
});

describe('enforceMonotonicity', () => {
  test('clamps starts to the previous end and widens collapsed spans', () => {
    const result = enforceMonotonicity(
      [
        { start: 1, end: 2 },
        { start: 1.5, end: 1.8 },
        null,
        { start: 1.7, end: 3 },
      ],
      0.1
    );

    expect(result[0]).toEqual({ start: 1, end: 2 });
    expect(result[1]?.start).toBe(2);
    expect(result[1]?.end).toBeCloseTo(2.1);
    expect(result[2]).toBeNull();
    expect(result[3]?.start).toBeCloseTo(2.1);
    expect(result[3]?.end).toBe(3);
  });
});

describe('fillUnresolved', () => {
  test('a leading run fills from zero to the first anchor', () => {
    expect(fillUnresolved([null, null, { start: 2, end: 3 }], 0.5)).toEqual([
      { start: 0, end: 1 },
      { start: 1, end: 2 },
      { start: 2, end: 3 },
    ]);
  });

  test('an inner run fills the gap between anchors', () => {
    expect(fillUnresolved([{ start: 0, end: 1 }, null, { start: 3, end: 4 }], 0.5)).toEqual([
      { start: 0, end: 1 },
      { start: 1, end: 3 },
      { start: 3, end: 4 },
    ]);
  });

  test('a trailing run is extrapolated at the fixed rate', () => {
    expect(fillUnresolved([{ start: 9, end: 10 }, null, null], 0.5)).toEqual([
      { start: 9, end: 10 },
      { start: 10, end: 10.5 },
      { start: 10.5, end: 11 },
    ]);
  });

  test('no anchors at all', () => {
    expect(fillUnresolved([null, null], 0.5)).toEqual([
      { start: 0, end: 0.5 },
      { start: 0.5, end: 1 },
    ]);
  });
});

describe('finalizeTimeline', () => {
  test('spans that round to zero are widened', () => {
    expect(
      finalizeTimeline(
        ['a', 'b'],
        [
          { start: 0, end: 0.001 },
          { start: 0.001, end: 0.002 },
        ],
        options
      )
    ).toEqual([
      { word: 'a', start: 0, end: 0.1 },
      { word: 'b', start: 0.1, end: 0.2 },
    ]);
  });
});

describe('repairTimeline', () => {
  test('overlapping raw timings are clamped', () => {
    expect(
      repairTimeline(
        ['first', 'second'],
        [
          { start: 0, end: 5 },
          { start: 3, end: 4 },
        ],
        options
      )
    ).toEqual([
      { word: 'first', start: 0, end: 5 },
      { word: 'second', start: 5, end: 5.1 },
    ]);
  });

  test('gaps between anchors are interpolated', () => {
    expect(repairTimeline(['a', 'b', 'c'], [{ start: 0, end: 0.5 }, null, { start: 2, end: 3 }], options)).toEqual([
      { word: 'a', start: 0, end: 0.5 },
      { word: 'b', start: 0.5, end: 2 },
      { word: 'c', start: 2, end: 3 },
    ]);
  });

  test('empty input', () => {
    expect(() => repairTimeline([], [], options)).toThrow(InputEmptyError);
  });

  test('mismatched lengths', () => {
    expect(() => repairTimeline(['a'], [], options)).toThrow('Timing count 0 does not match token count 1');
  });
});

describe('buildUniformTimeline', () => {
  test('splits a known duration evenly', () => {
    expect(buildUniformTimeline(['a', 'b', 'c'], 1, options)).toEqual([
      { word: 'a', start: 0, end: 0.33 },
      { word: 'b', start: 0.33, end: 0.67 },
      { word: 'c', start: 0.67, end: 1 },
    ]);
  });

  test('uses the trailing rate when the duration is unknown', () => {
    expect(buildUniformTimeline(['a', 'b'], null, options)).toEqual([
      { word: 'a', start: 0, end: 0.5 },
      { word: 'b', start: 0.5, end: 1 },
    ]);
  });
});
