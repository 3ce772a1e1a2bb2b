import { Worker, Job, UnrecoverableError } from 'bullmq';
import { getRedisConnection, QUEUE_NAMES } from '../config/redis';
import { getAlignmentConfig } from '../config/alignment.config';
import { logger } from '../config/logger';
import { AlignmentError } from '../middleware/errorHandler';
import {
  alignWithUniformFallback,
  resolveAlignmentOptions,
  runAlignment,
} from '../services/alignment/alignment-engine.service';
import type { CaptionAlignmentJobData, CaptionAlignmentJobResult } from './captionAlignment.types';

type AlignmentJob = Pick<Job<CaptionAlignmentJobData, CaptionAlignmentJobResult>, 'id' | 'data' | 'updateProgress'>;

/**
 * Process one caption alignment job.
 *
 * Input errors (empty script, bad fragment, no time source without fallback)
 * are unrecoverable: the same input fails the same way on every attempt.
 */
export const processCaptionAlignment = async (job: AlignmentJob): Promise<CaptionAlignmentJobResult> => {
  const { script, fragments, fallbackToUniform, totalDurationSeconds } = job.data;
  const options = resolveAlignmentOptions(job.data.options, getAlignmentConfig().alignment);

  logger.info(`Processing caption alignment job ${job.id}`, {
    fragments: fragments.length,
    granularity: options.granularity,
    fallbackToUniform: !!fallbackToUniform,
  });

  await job.updateProgress(10);

  try {
    const { result, usedFallback } = fallbackToUniform
      ? alignWithUniformFallback(script, fragments, options, totalDurationSeconds ?? null)
      : { result: runAlignment(script, fragments, options), usedFallback: false };

    await job.updateProgress(100);

    logger.info(`Caption alignment job ${job.id} aligned ${result.words.length} words`, {
      unresolved: result.stats.unresolvedCount,
      usedFallback,
    });

    return { ...result, usedFallback };
  } catch (error) {
    if (error instanceof AlignmentError) {
      logger.warn(`Caption alignment job ${job.id} rejected: ${error.message}`, { code: error.code });
      throw new UnrecoverableError(`${error.code}: ${error.message}`);
    }
    throw error;
  }
};

/**
 * Create and start the caption alignment worker
 */
export const createCaptionAlignmentWorker = (concurrency = 4) => {
  const worker = new Worker<CaptionAlignmentJobData, CaptionAlignmentJobResult>(
    QUEUE_NAMES.CAPTION_ALIGNMENT,
    processCaptionAlignment,
    {
      connection: getRedisConnection(),
      concurrency,
    }
  );

  worker.on('completed', (job) => {
    logger.info(`Job ${job.id} completed successfully`);
  });

  worker.on('failed', (job, err) => {
    logger.error(`Job ${job?.id} failed:`, {
      error: err.message,
      attempts: job?.attemptsMade,
    });
  });

  worker.on('error', (err) => {
    logger.error('Worker error:', err);
  });

  logger.info('Caption alignment worker started');

  return worker;
};

export default createCaptionAlignmentWorker;
