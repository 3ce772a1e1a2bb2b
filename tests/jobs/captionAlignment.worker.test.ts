import { UnrecoverableError } from 'bullmq';
import { processCaptionAlignment } from '../../src/jobs/captionAlignment.worker';
import type { CaptionAlignmentJobData } from '../../src/jobs/captionAlignment.types';

function fakeJob(data: CaptionAlignmentJobData) {
  return {
    id: 'job-1',
    data,
    updateProgress: jest.fn().mockResolvedValue(undefined),
  };
}

describe('processCaptionAlignment', () => {
  test('aligns and reports progress', async () => {
    const job = fakeJob({
      script: ['hello', 'world'],
      fragments: [
        { text: 'hello', start: 0, end: 0.5 },
        { text: 'world', start: 0.6, end: 1.1 },
      ],
    });

    const result = await processCaptionAlignment(job);

    expect(result.usedFallback).toBe(false);
    expect(result.words).toEqual([
      { word: 'hello', start: 0, end: 0.5 },
      { word: 'world', start: 0.6, end: 1.1 },
    ]);
    expect(job.updateProgress.mock.calls).toEqual([[10], [100]]);
  });

  test('job options override the defaults', async () => {
    const job = fakeJob({
      script: ['one', 'two'],
      fragments: [
        { text: 'one', start: 0, end: 1 },
        { text: 'two', start: 1, end: 2 },
      ],
      options: { granularity: 'token' },
    });

    const result = await processCaptionAlignment(job);
    expect(result.stats.granularity).toBe('token');
  });

  test('falls back to uniform spacing when allowed', async () => {
    const job = fakeJob({
      script: ['a', 'b'],
      fragments: [],
      fallbackToUniform: true,
      totalDurationSeconds: 2,
    });

    const result = await processCaptionAlignment(job);

    expect(result.usedFallback).toBe(true);
    expect(result.words).toEqual([
      { word: 'a', start: 0, end: 1 },
      { word: 'b', start: 1, end: 2 },
    ]);
  });

  test('input errors are not retried', async () => {
    const job = fakeJob({ script: ['a'], fragments: [] });

    const attempt = processCaptionAlignment(job);
    await expect(attempt).rejects.toBeInstanceOf(UnrecoverableError);
    await expect(attempt).rejects.toThrow(/^NO_TIME_SOURCE: /);
  });
});
