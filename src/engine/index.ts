/**
 * Cuecraft Engine - context-aware subtitle translation
 *
 * 3-phase pipeline over a format-agnostic subtitle document:
 * 1. Analyze: speakers, scenes, glossary, summary
 * 2. Translate: sliding context windows through an LLM
 * 3. Validate: check, repair and score the result
 *
 * @module cuecraft-engine
 */

// Types
export type { Language, FormattingTag, RawEntry, TokenUsage, Sleep } from './types/common.js';
export { emptyTokenUsage, addTokenUsage } from './types/common.js';
export type { GlossaryTerm, GlossaryData, GlossaryIssue, GlossaryIssueKind } from './types/glossary.js';
export type {
  StageType,
  StageResult,
  PipelinePhase,
  PipelineProgress,
  ProgressCallback,
  PipelineResult,
} from './types/pipeline.js';

// Interfaces
export type {
  ILLMProvider,
  LLMProviderConfig,
  Message,
  CompletionOptions,
  CompletionResult,
} from './interfaces/llm-provider.js';
export {
  resumeOutcome,
  canProceed,
  completionPercentage,
  type SessionRepository,
  type SessionStatus,
  type SessionKey,
  type SessionLookup,
  type TranslationSession,
  type ResumeOutcome,
} from './interfaces/session-repository.js';

// Providers
export { OpenAIProvider } from './providers/openai.js';
export { MockProvider, type MockStep, type MockProviderOptions } from './providers/mock.js';
export {
  PROVIDER_PROFILES,
  profileFor,
  minDispatchIntervalMs,
  type ProviderName,
  type ProviderProfile,
} from './providers/profiles.js';

// Document
export {
  SubtitleDocument,
  DocumentEntry,
  Timecode,
  renumberEntries,
  sceneContains,
  sceneLength,
  type Scene,
  type DocumentMetadata,
} from './document/subtitle-document.js';
export { detectFormatting, isSoundEffect, stripMarkup } from './document/formatting.js';

// Glossary
export { GlossaryManager } from './glossary/glossary-manager.js';
export { GlossaryEnforcer } from './glossary/glossary-enforcer.js';

// Analysis
export { SceneDetector, SCENE_PRESETS, type SceneDetectionConfig } from './analysis/scene-detector.js';
export { SpeakerTracker, SPEAKER_PRESETS, extractSpeaker, type SpeakerConfig, type SpeakerStats } from './analysis/speaker-tracker.js';
export { GlossaryExtractor, EXTRACTION_PRESETS, type ExtractionConfig } from './analysis/glossary-extractor.js';
export { HistorySummarizer, type SummarizationConfig, type HistorySummary } from './analysis/summarizer.js';

// Context
export {
  ContextWindow,
  contextWindows,
  WINDOW_PRESETS,
  type ContextWindowConfig,
  type TranslatedEntryContext,
  type WindowEntry,
} from './context/context-window.js';
export { DynamicWindowSizer, DYNAMIC_PRESETS, type DynamicWindowConfig } from './context/dynamic-sizer.js';

// Quality
export { TranslationError, classifyError, isRetryableKind, type TranslationErrorKind } from './quality/errors.js';
export {
  ErrorRecovery,
  decideRecovery,
  describeAction,
  RECOVERY_STRATEGIES,
  type RecoveryAction,
  type RecoveryStrategy,
  type RecoveryProfile,
} from './quality/recovery.js';
export {
  issueSeverity,
  issueFeedback,
  describeIssue,
  isRepairable,
  type ValidationIssue,
  type ValidationIssueKind,
} from './quality/validation-issue.js';
export { TranslationRepairer, describeRepair, type RepairAction, type RepairResult } from './quality/repair.js';
export { QualityMetrics, QualityScore, QUALITY_THRESHOLDS, type QualityDimension } from './quality/metrics.js';

// Stages
export { AnalyzeStage, ANALYSIS_PRESETS, describeAnalysis, type AnalysisConfig, type AnalysisResult } from './stages/stage-1-analyze.js';
export {
  TranslateStage,
  BatchResult,
  TranslationStats,
  TRANSLATION_PRESETS,
  buildCorrectionMessages,
  type TranslationConfig,
  type TranslatedEntry,
} from './stages/stage-2-translate.js';
export {
  ValidateStage,
  ValidationReport,
  VALIDATION_PRESETS,
  type ValidationConfig,
  type SemanticCheck,
} from './stages/stage-3-validate.js';

// Pipeline
export {
  TranslationPipeline,
  pipelineConfig,
  overallProgress,
  pipelineQualityScore,
  summarizePipelineResult,
  type PipelineConfig,
  type PipelinePreset,
  type PipelineDependencies,
} from './pipeline/translation-pipeline.js';
export { WorkerPool, type WorkerPoolConfig, type PoolTask, type TaskOutcome } from './pipeline/worker-pool.js';
export { ParallelTranslator, type ParallelTranslatorConfig, type ParallelTranslationResult } from './pipeline/parallel-translator.js';

// Utils
export { chunkEntries, estimateTokens, charLength } from './utils/chunker.js';

// Prompts
export {
  TRANSLATOR_SYSTEM_PROMPT,
  renderTranslatorSystemPrompt,
  createTranslatorPrompt,
  createCorrectionPrompt,
} from './prompts/system/translator.js';
