/**
 * Transcript-to-script alignment engine.
 *
 * Takes the authored script (ground truth) and an independently timestamped
 * transcript, and returns one timed entry per script word:
 *
 *   normalize -> flatten -> align -> project -> repair
 *
 * Granularity is a switch, not a separate code path: character mode aligns
 * code points (for ASR output whose fragments don't follow word boundaries),
 * token mode aligns whole words (for forced-aligner output with `<unk>`
 * placeholders). Both share the aligner and the repairer.
 *
 * Pure and synchronous; safe to call concurrently from independent jobs.
 */

import { logger } from '../../config/logger';
import { DEFAULT_ALIGNMENT_OPTIONS } from '../../config/alignment.config';
import { InputEmptyError, NoTimeSourceError } from '../../middleware/errorHandler';
import type {
  AlignedWord,
  AlignmentOptions,
  AlignmentResult,
  EditOpcode,
  HypothesisFragment,
  RawTiming,
  ReferenceInput,
  Token,
} from '../../types/alignment.types';
import { align } from './sequence-matcher';
import { buildTokens, joinTokens, tokenizeScript } from './text-normalizer.service';
import { flattenFragments, validateFragments } from './timestamp-flattener.service';
import { projectCharacterTimings, projectTokenTimings } from './timestamp-projector.service';
import { buildUniformTimeline, repairTimeline } from './timeline-repairer.service';

/** Per-call overrides on top of the defaults; `undefined` keeps the default. */
export function resolveAlignmentOptions(
  overrides: Partial<AlignmentOptions> = {},
  defaults: Readonly<AlignmentOptions> = DEFAULT_ALIGNMENT_OPTIONS
): AlignmentOptions {
  return {
    granularity: overrides.granularity ?? defaults.granularity,
    minDuration: overrides.minDuration ?? defaults.minDuration,
    trailingSecondsPerToken: overrides.trailingSecondsPerToken ?? defaults.trailingSecondsPerToken,
    minMatchChars: overrides.minMatchChars ?? defaults.minMatchChars,
    shortTokenLength: overrides.shortTokenLength ?? defaults.shortTokenLength,
    roundingDecimals: overrides.roundingDecimals ?? defaults.roundingDecimals,
    locale: overrides.locale ?? defaults.locale,
    stripPunctuation: overrides.stripPunctuation ?? defaults.stripPunctuation,
    caseSensitive: overrides.caseSensitive ?? defaults.caseSensitive,
    customDictionary: [...(overrides.customDictionary ?? defaults.customDictionary)],
  };
}

export function referenceTokens(reference: ReferenceInput, options: AlignmentOptions): Token[] {
  return typeof reference === 'string' ? tokenizeScript(reference, options) : buildTokens(reference);
}

function unitKey(caseSensitive: boolean): (unit: string) => string {
  return caseSensitive ? (unit) => unit : (unit) => unit.toLowerCase();
}

interface Projection {
  raw: RawTiming[];
  opcodes: EditOpcode[];
}

function projectByCharacter(
  tokens: readonly Token[],
  fragments: readonly HypothesisFragment[],
  options: AlignmentOptions
): Projection {
  const timeMap = flattenFragments(fragments);
  const referenceChars = Array.from(joinTokens(tokens));
  const opcodes = align(referenceChars, timeMap.characters, unitKey(options.caseSensitive));
  return { raw: projectCharacterTimings(tokens, timeMap, opcodes, options), opcodes };
}

function projectByToken(
  tokens: readonly Token[],
  fragments: readonly HypothesisFragment[],
  options: AlignmentOptions
): Projection {
  validateFragments(fragments);
  const opcodes = align(
    tokens.map((t) => t.text),
    fragments.map((f) => f.text.normalize('NFC').trim()),
    unitKey(options.caseSensitive)
  );
  return { raw: projectTokenTimings(tokens.length, fragments, opcodes), opcodes };
}

/**
 * Align and report how the run went.
 *
 * @throws InputEmptyError when the script has no words
 * @throws NoTimeSourceError when there are words but no fragments
 * @throws MalformedFragmentError on an invalid fragment
 */
export function runAlignment(
  reference: ReferenceInput,
  fragments: readonly HypothesisFragment[],
  overrides: Partial<AlignmentOptions> = {}
): AlignmentResult {
  const options = resolveAlignmentOptions(overrides);
  const tokens = referenceTokens(reference, options);

  if (tokens.length === 0) {
    throw new InputEmptyError();
  }
  if (fragments.length === 0) {
    throw new NoTimeSourceError(tokens.length);
  }

  const { raw, opcodes } =
    options.granularity === 'character'
      ? projectByCharacter(tokens, fragments, options)
      : projectByToken(tokens, fragments, options);

  const unresolvedCount = raw.filter((timing) => timing === null).length;
  const stats = {
    granularity: options.granularity,
    tokenCount: tokens.length,
    fragmentCount: fragments.length,
    opcodeCount: opcodes.length,
    resolvedCount: tokens.length - unresolvedCount,
    unresolvedCount,
  };

  logger.debug('Alignment projected', stats);
  if (unresolvedCount * 2 > tokens.length) {
    logger.warn(
      `Alignment resolved only ${stats.resolvedCount}/${tokens.length} tokens; the rest were interpolated`,
      { granularity: options.granularity }
    );
  }

  const words = repairTimeline(
    tokens.map((t) => t.text),
    raw,
    options
  );

  return { words, stats };
}

export function alignTranscript(
  reference: ReferenceInput,
  fragments: readonly HypothesisFragment[],
  overrides: Partial<AlignmentOptions> = {}
): AlignedWord[] {
  return runAlignment(reference, fragments, overrides).words;
}

export interface FallbackAlignment {
  result: AlignmentResult;
  usedFallback: boolean;
}

/**
 * `runAlignment`, except that a missing time source degrades to uniform
 * spacing over `totalDurationSeconds` instead of failing. Every other error
 * still propagates.
 */
export function alignWithUniformFallback(
  reference: ReferenceInput,
  fragments: readonly HypothesisFragment[],
  overrides: Partial<AlignmentOptions> = {},
  totalDurationSeconds: number | null = null
): FallbackAlignment {
  try {
    return { result: runAlignment(reference, fragments, overrides), usedFallback: false };
  } catch (error) {
    if (!(error instanceof NoTimeSourceError)) {
      throw error;
    }

    const options = resolveAlignmentOptions(overrides);
    const texts = referenceTokens(reference, options).map((t) => t.text);
    logger.warn(`No time source for ${texts.length} tokens; using uniform spacing`, {
      totalDurationSeconds,
    });

    return {
      result: {
        words: buildUniformTimeline(texts, totalDurationSeconds, options),
        stats: {
          granularity: options.granularity,
          tokenCount: texts.length,
          fragmentCount: 0,
          opcodeCount: 0,
          resolvedCount: 0,
          unresolvedCount: texts.length,
        },
      },
      usedFallback: true,
    };
  }
}
