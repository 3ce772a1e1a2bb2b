import { z } from 'zod';
import { ALIGNMENT_GRANULARITIES, type AlignmentOptions } from '../types/alignment.types';
import { formatEnvIssues } from './env';

/** Built-in defaults; every value can be overridden by env or per call. */
export const DEFAULT_ALIGNMENT_OPTIONS: Readonly<AlignmentOptions> = {
  granularity: 'character',
  minDuration: 0.1,
  trailingSecondsPerToken: 0.5,
  minMatchChars: 2,
  shortTokenLength: 2,
  roundingDecimals: 2,
  locale: 'th',
  stripPunctuation: true,
  caseSensitive: false,
  customDictionary: [],
};

export const DEFAULT_CAPTION_MIN_DISPLAY_SECONDS = 0.15;

const booleanFlag = z.enum(['true', 'false']).transform((v) => v === 'true');

const alignmentEnvSchema = z.object({
  ALIGN_GRANULARITY: z.enum(ALIGNMENT_GRANULARITIES).default(DEFAULT_ALIGNMENT_OPTIONS.granularity),
  ALIGN_MIN_DURATION: z.coerce.number().positive().default(DEFAULT_ALIGNMENT_OPTIONS.minDuration),
  ALIGN_TRAILING_SECONDS_PER_TOKEN: z.coerce
    .number()
    .positive()
    .default(DEFAULT_ALIGNMENT_OPTIONS.trailingSecondsPerToken),
  ALIGN_MIN_MATCH_CHARS: z.coerce.number().int().min(1).default(DEFAULT_ALIGNMENT_OPTIONS.minMatchChars),
  ALIGN_SHORT_TOKEN_LENGTH: z.coerce.number().int().min(0).default(DEFAULT_ALIGNMENT_OPTIONS.shortTokenLength),
  ALIGN_ROUNDING_DECIMALS: z.coerce.number().int().min(0).max(6).default(DEFAULT_ALIGNMENT_OPTIONS.roundingDecimals),
  ALIGN_LOCALE: z.string().min(1).default(DEFAULT_ALIGNMENT_OPTIONS.locale),
  ALIGN_STRIP_PUNCTUATION: booleanFlag.default('true'),
  ALIGN_CASE_SENSITIVE: booleanFlag.default('false'),
  ALIGN_CUSTOM_DICTIONARY: z
    .string()
    .default('')
    .transform((v) => v.split(',').map((s) => s.trim()).filter(Boolean)),
  CAPTION_MIN_DISPLAY_SECONDS: z.coerce.number().min(0).default(DEFAULT_CAPTION_MIN_DISPLAY_SECONDS),
});

export interface AlignmentEnvConfig {
  alignment: AlignmentOptions;
  captionMinDisplaySeconds: number;
}

/**
 * Read engine defaults from the environment. Throws on the first load with
 * every invalid key listed.
 */
export function loadAlignmentConfig(env: NodeJS.ProcessEnv = process.env): AlignmentEnvConfig {
  const parsed = alignmentEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid alignment configuration: ${formatEnvIssues(parsed.error)}`);
  }
  const e = parsed.data;

  return {
    alignment: {
      granularity: e.ALIGN_GRANULARITY,
      minDuration: e.ALIGN_MIN_DURATION,
      trailingSecondsPerToken: e.ALIGN_TRAILING_SECONDS_PER_TOKEN,
      minMatchChars: e.ALIGN_MIN_MATCH_CHARS,
      shortTokenLength: e.ALIGN_SHORT_TOKEN_LENGTH,
      roundingDecimals: e.ALIGN_ROUNDING_DECIMALS,
      locale: e.ALIGN_LOCALE,
      stripPunctuation: e.ALIGN_STRIP_PUNCTUATION,
      caseSensitive: e.ALIGN_CASE_SENSITIVE,
      customDictionary: e.ALIGN_CUSTOM_DICTIONARY,
    },
    captionMinDisplaySeconds: e.CAPTION_MIN_DISPLAY_SECONDS,
  };
}

let cached: AlignmentEnvConfig | null = null;

export function getAlignmentConfig(): AlignmentEnvConfig {
  if (!cached) {
    cached = loadAlignmentConfig();
  }
  return cached;
}
