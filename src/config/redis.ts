import { Queue, QueueEvents } from 'bullmq';
import Redis from 'ioredis';
import { logger } from './logger';
import type { CaptionAlignmentJobData, CaptionAlignmentJobResult } from '../jobs/captionAlignment.types';

// Queue names
export const QUEUE_NAMES = {
  CAPTION_ALIGNMENT: 'caption-alignment',
} as const;

let redisConnection: Redis | null = null;
let captionAlignmentQueue: Queue<CaptionAlignmentJobData, CaptionAlignmentJobResult> | null = null;
let captionAlignmentEvents: QueueEvents | null = null;

/**
 * Shared connection, opened on first use so that importing queue helpers
 * (tests, one-off scripts) does not dial Redis.
 */
export function getRedisConnection(): Redis {
  if (!redisConnection) {
    redisConnection = new Redis(process.env.REDIS_URL || 'redis://localhost:6379', {
      maxRetriesPerRequest: null,
      enableReadyCheck: false,
    });

    redisConnection.on('connect', () => {
      logger.info('Redis connected successfully');
    });

    redisConnection.on('error', (error) => {
      logger.error('Redis connection error:', error);
    });
  }
  return redisConnection;
}

export function getCaptionAlignmentQueue(): Queue<CaptionAlignmentJobData, CaptionAlignmentJobResult> {
  if (!captionAlignmentQueue) {
    captionAlignmentQueue = new Queue<CaptionAlignmentJobData, CaptionAlignmentJobResult>(
      QUEUE_NAMES.CAPTION_ALIGNMENT,
      {
        connection: getRedisConnection(),
        defaultJobOptions: {
          // Alignment is deterministic; a retry only helps with infrastructure hiccups
          attempts: 2,
          backoff: {
            type: 'exponential',
            delay: 1000,
          },
          removeOnComplete: {
            count: 500,
            age: 24 * 3600,
          },
          removeOnFail: {
            count: 200,
          },
        },
      }
    );
  }
  return captionAlignmentQueue;
}

/**
 * Log queue lifecycle events; called once by the server at startup.
 */
export function watchCaptionAlignmentQueue(): QueueEvents {
  if (!captionAlignmentEvents) {
    const queueName = QUEUE_NAMES.CAPTION_ALIGNMENT;
    captionAlignmentEvents = new QueueEvents(queueName, { connection: getRedisConnection() });

    captionAlignmentEvents.on('completed', ({ jobId }) => {
      logger.info(`Job ${jobId} in queue ${queueName} completed`);
    });

    captionAlignmentEvents.on('failed', ({ jobId, failedReason }) => {
      logger.error(`Job ${jobId} in queue ${queueName} failed:`, failedReason);
    });

    captionAlignmentEvents.on('progress', ({ jobId, data }) => {
      logger.debug(`Job ${jobId} in queue ${queueName} progress:`, data);
    });
  }
  return captionAlignmentEvents;
}

export async function closeQueues(): Promise<void> {
  await captionAlignmentEvents?.close();
  await captionAlignmentQueue?.close();
  await redisConnection?.quit();
  captionAlignmentEvents = null;
  captionAlignmentQueue = null;
  redisConnection = null;
}
