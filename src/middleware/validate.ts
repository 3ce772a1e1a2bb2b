import { Request, Response, NextFunction } from 'express';
import Joi from 'joi';
import { AppError } from './errorHandler';
import { ALIGNMENT_GRANULARITIES } from '../types/alignment.types';

export const validate = (schema: Joi.ObjectSchema) => {
  return (req: Request, res: Response, next: NextFunction): void => {
    const { error, value } = schema.validate(req.body, {
      abortEarly: false,
      stripUnknown: true,
    });

    if (error) {
      const errorMessage = error.details
        .map((detail) => detail.message)
        .join(', ');
      throw new AppError(errorMessage, 400, 'VALIDATION_ERROR');
    }

    // Replace request body with validated value
    req.body = value;
    next();
  };
};

const seconds = Joi.number().min(0);

// Interval order is checked by the flattener so the error names the fragment index
const fragment = Joi.object({
  text: Joi.string().min(1).required(),
  start: seconds.required(),
  end: seconds.required(),
});

const alignedWord = Joi.object({
  word: Joi.string().min(1).required(),
  start: seconds.required(),
  end: seconds.required(),
});

const alignmentOptions = Joi.object({
  granularity: Joi.string().valid(...ALIGNMENT_GRANULARITIES).optional(),
  minDuration: Joi.number().positive().optional(),
  trailingSecondsPerToken: Joi.number().positive().optional(),
  minMatchChars: Joi.number().integer().min(1).optional(),
  shortTokenLength: Joi.number().integer().min(0).optional(),
  roundingDecimals: Joi.number().integer().min(0).max(6).optional(),
  locale: Joi.string().min(1).optional(),
  stripPunctuation: Joi.boolean().optional(),
  caseSensitive: Joi.boolean().optional(),
  customDictionary: Joi.array().items(Joi.string().min(1)).max(5000).optional(),
});

// Reference is raw script text or a pre-segmented word list
const reference = Joi.alternatives().try(
  Joi.string().max(200000),
  Joi.array().items(Joi.string().min(1)).min(1).max(50000)
);

export const schemas = {
  align: Joi.object({
    script: reference.required(),
    fragments: Joi.array().items(fragment).max(200000).required(),
    options: alignmentOptions.optional(),
  }),

  alignTextGrid: Joi.object({
    script: reference.required(),
    textGrid: Joi.string().min(1).required(),
    tierName: Joi.string().optional(),
    options: alignmentOptions.optional(),
  }),

  captions: Joi.object({
    words: Joi.array().items(alignedWord).min(1).required(),
    speedFactor: Joi.number().positive().optional(),
    minDisplaySeconds: Joi.number().min(0).optional(),
    maxWords: Joi.number().integer().min(1).optional(),
    maxChars: Joi.number().integer().min(1).optional(),
    maxGap: Joi.number().min(0).optional(),
    joiner: Joi.string().allow('').optional(),
    format: Joi.string().valid('json', 'srt', 'vtt').default('json'),
  }),

  createAlignmentJob: Joi.object({
    script: reference.required(),
    fragments: Joi.array().items(fragment).max(200000).required(),
    options: alignmentOptions.optional(),
    fallbackToUniform: Joi.boolean().default(false),
    totalDurationSeconds: Joi.number().positive().optional(),
  }),
};
