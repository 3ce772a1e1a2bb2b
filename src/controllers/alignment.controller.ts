import { Request, Response } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { AppError, asyncHandler } from '../middleware/errorHandler';
import { logger } from '../config/logger';
import { getAlignmentConfig } from '../config/alignment.config';
import { getCaptionAlignmentQueue } from '../config/redis';
import { resolveAlignmentOptions, runAlignment } from '../services/alignment/alignment-engine.service';
import {
  applyDisplayFloor,
  groupIntoCaptions,
  scaleTimeline,
  toSrt,
  toWebVtt,
} from '../services/captions/caption-timing.service';
import { textGridToFragments } from '../utils/textgrid-parser';
import type { AlignedWord, AlignmentOptions, HypothesisFragment } from '../types/alignment.types';
import type { CaptionAlignmentJobData } from '../jobs/captionAlignment.types';

interface AlignBody {
  script: string | string[];
  fragments: HypothesisFragment[];
  options?: Partial<AlignmentOptions>;
}

interface AlignTextGridBody {
  script: string | string[];
  textGrid: string;
  tierName?: string;
  options?: Partial<AlignmentOptions>;
}

interface CaptionsBody {
  words: AlignedWord[];
  speedFactor?: number;
  minDisplaySeconds?: number;
  maxWords?: number;
  maxChars?: number;
  maxGap?: number;
  joiner?: string;
  format: 'json' | 'srt' | 'vtt';
}

function withEnvDefaults(options: Partial<AlignmentOptions> | undefined): AlignmentOptions {
  return resolveAlignmentOptions(options, getAlignmentConfig().alignment);
}

/**
 * Align a script against timestamped transcript fragments
 */
export const alignTranscript = asyncHandler(async (req: Request, res: Response) => {
  const { script, fragments, options }: AlignBody = req.body;
  const runId = uuidv4();

  const result = runAlignment(script, fragments, withEnvDefaults(options));
  logger.info(`Alignment ${runId}: ${result.stats.tokenCount} tokens, ${result.stats.unresolvedCount} interpolated`);

  res.json({
    success: true,
    data: { runId, ...result },
  });
});

/**
 * Align a script against a forced-aligner TextGrid. Token granularity is the
 * default here since TextGrid intervals are whole words.
 */
export const alignTextGrid = asyncHandler(async (req: Request, res: Response) => {
  const { script, textGrid, tierName, options }: AlignTextGridBody = req.body;
  const runId = uuidv4();

  const fragments = textGridToFragments(textGrid, { tierName });
  const result = runAlignment(
    script,
    fragments,
    withEnvDefaults({ ...options, granularity: options?.granularity ?? 'token' })
  );
  logger.info(`TextGrid alignment ${runId}: ${fragments.length} intervals, ${result.stats.tokenCount} tokens`);

  res.json({
    success: true,
    data: { runId, ...result },
  });
});

/**
 * Turn an aligned timeline into caption cues (JSON, SRT or WebVTT)
 */
export const buildCaptions = asyncHandler(async (req: Request, res: Response) => {
  const { words, speedFactor, minDisplaySeconds, maxWords, maxChars, maxGap, joiner, format }: CaptionsBody =
    req.body;

  const scaled = speedFactor ? scaleTimeline(words, speedFactor) : words;
  const floored = applyDisplayFloor(scaled, minDisplaySeconds ?? getAlignmentConfig().captionMinDisplaySeconds);
  const cues = groupIntoCaptions(floored, { maxWords, maxChars, maxGap, joiner });

  if (format === 'srt') {
    res.type('application/x-subrip').send(toSrt(cues));
    return;
  }
  if (format === 'vtt') {
    res.type('text/vtt').send(toWebVtt(cues));
    return;
  }

  res.json({
    success: true,
    data: { cues },
  });
});

/**
 * Queue an alignment for background processing
 */
export const createAlignmentJob = asyncHandler(async (req: Request, res: Response) => {
  const data: CaptionAlignmentJobData = req.body;

  const job = await getCaptionAlignmentQueue().add('align-captions', data);
  logger.info(`Caption alignment job queued: ${job.id}`);

  res.status(202).json({
    success: true,
    data: { jobId: job.id },
  });
});

/**
 * Job state, with the aligned words once it has completed
 */
export const getAlignmentJob = asyncHandler(async (req: Request, res: Response) => {
  const { id } = req.params;

  const job = await getCaptionAlignmentQueue().getJob(id);
  if (!job) {
    throw new AppError('Alignment job not found', 404);
  }

  const state = await job.getState();

  res.json({
    success: true,
    data: {
      jobId: job.id,
      state,
      progress: job.progress,
      result: state === 'completed' ? job.returnvalue : null,
      failedReason: state === 'failed' ? job.failedReason : null,
    },
  });
});
