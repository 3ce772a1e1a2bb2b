import type {
  AlignedWord,
  AlignmentOptions,
  AlignmentStats,
  HypothesisFragment,
} from '../types/alignment.types';

export interface CaptionAlignmentJobData {
  script: string | string[];
  fragments: HypothesisFragment[];
  options?: Partial<AlignmentOptions>;
  /** Use uniform spacing when the transcript carried no timing at all */
  fallbackToUniform?: boolean;
  totalDurationSeconds?: number;
}

export interface CaptionAlignmentJobResult {
  words: AlignedWord[];
  stats: AlignmentStats;
  usedFallback: boolean;
}
