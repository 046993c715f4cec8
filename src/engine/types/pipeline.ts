/**
 * Translation pipeline types
 */

import type { TokenUsage } from './common.js';
import type { AnalysisResult } from '../stages/stage-1-analyze.js';
import type { TranslationStats } from '../stages/stage-2-translate.js';
import type { ValidationReport } from '../stages/stage-3-validate.js';

export type StageType = 'analyze' | 'translate' | 'validate';

export interface StageResult<T> {
  stage: StageType;
  success: boolean;
  data?: T;
  error?: string;
  tokensUsed: number;
  duration: number; // ms
}

export type PipelinePhase = 'analysis' | 'translation' | 'validation';

export interface PipelineProgress {
  phase: PipelinePhase;
  /** 0..1 within the current phase */
  phaseProgress: number;
  /** 0..1 across the run: analysis 10%, translation 80%, validation 10% */
  overallProgress: number;
  message?: string;
}

export type ProgressCallback = (progress: PipelineProgress) => void;

export interface PipelineResult {
  analysis?: AnalysisResult;
  translationStats: TranslationStats;
  validation?: ValidationReport;
  tokensUsed: TokenUsage;
  durationMs: number;
  success: boolean;
  error?: string;
}
