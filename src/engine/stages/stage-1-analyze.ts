/**
 * Stage 1: Analysis
 *
 * Annotates the document before translation:
 * - Speakers from "NAME:" labels
 * - Scenes from timing gaps and speaker changes
 * - Glossary of recurring names and quoted phrases
 * - Extractive summary of the whole document
 *
 * Runs locally, no model calls.
 */

import type { StageResult } from '../types/pipeline.js';
import type { Scene, SubtitleDocument } from '../document/subtitle-document.js';
import { GlossaryManager } from '../glossary/glossary-manager.js';
import { SceneDetector, type SceneDetectionConfig, SCENE_PRESETS } from '../analysis/scene-detector.js';
import { SpeakerTracker, type SpeakerConfig, type SpeakerStats, SPEAKER_PRESETS } from '../analysis/speaker-tracker.js';
import { GlossaryExtractor, type ExtractionConfig, EXTRACTION_PRESETS } from '../analysis/glossary-extractor.js';
import { HistorySummarizer, type SummarizationConfig, DEFAULT_SUMMARIZATION_CONFIG } from '../analysis/summarizer.js';

export interface AnalysisConfig {
  extractGlossary: boolean;
  detectScenes: boolean;
  generateSummary: boolean;
  detectSpeakers: boolean;
  glossary: ExtractionConfig;
  scenes: SceneDetectionConfig;
  speakers: SpeakerConfig;
  summary: SummarizationConfig;
}

export const DEFAULT_ANALYSIS_CONFIG: AnalysisConfig = {
  extractGlossary: true,
  detectScenes: true,
  generateSummary: true,
  detectSpeakers: true,
  glossary: EXTRACTION_PRESETS.default,
  scenes: SCENE_PRESETS.default,
  speakers: SPEAKER_PRESETS.default,
  summary: DEFAULT_SUMMARIZATION_CONFIG,
};

export const ANALYSIS_PRESETS = {
  default: DEFAULT_ANALYSIS_CONFIG,
  minimal: {
    ...DEFAULT_ANALYSIS_CONFIG,
    generateSummary: false,
    detectSpeakers: false,
    glossary: EXTRACTION_PRESETS.minimal,
    scenes: SCENE_PRESETS.shortForm,
  },
  thorough: {
    ...DEFAULT_ANALYSIS_CONFIG,
    glossary: EXTRACTION_PRESETS.aggressive,
    scenes: SCENE_PRESETS.detailed,
    speakers: SPEAKER_PRESETS.lenient,
  },
} satisfies Record<string, AnalysisConfig>;

export interface AnalysisResult {
  glossary: GlossaryManager;
  scenes: Scene[];
  summary?: string;
  speakerStats?: SpeakerStats;
  characterCount: number;
  /** Terms plus technical terms */
  termCount: number;
  sceneCount: number;
}

export function describeAnalysis(result: AnalysisResult): string {
  const parts: string[] = [];
  if (result.characterCount > 0) parts.push(`${result.characterCount} characters`);
  if (result.termCount > 0) parts.push(`${result.termCount} terms`);
  if (result.sceneCount > 0) parts.push(`${result.sceneCount} scenes`);
  if (result.summary) parts.push('summary generated');
  return parts.length > 0 ? parts.join(', ') : 'no analysis data';
}

export class AnalyzeStage {
  readonly config: AnalysisConfig;
  private quiet: boolean;

  constructor(config: Partial<AnalysisConfig> = {}, options: { quiet?: boolean } = {}) {
    this.config = { ...DEFAULT_ANALYSIS_CONFIG, ...config };
    this.quiet = options.quiet ?? false;
  }

  /**
   * Analyze without touching the document. Speaker labels are detected on
   * a throwaway pass so scene breaks can still use them.
   */
  analyze(doc: SubtitleDocument): AnalysisResult {
    const speakers = this.config.detectSpeakers
      ? new SpeakerTracker(this.config.speakers).extractSpeakerNames(doc.entries)
      : [];

    const glossary = this.config.extractGlossary
      ? new GlossaryExtractor(this.config.glossary).extractAndMerge(doc.entries, doc.glossary)
      : doc.glossary.clone();
    for (const name of speakers) glossary.addCharacter(name);

    const scenes = this.config.detectScenes
      ? new SceneDetector(this.config.scenes).detectScenes(doc.entries)
      : [];

    const summary = this.config.generateSummary
      ? new HistorySummarizer(this.config.summary).summarize(doc.entries).text || undefined
      : undefined;

    return this.buildResult(glossary, scenes, summary);
  }

  /**
   * Analyze and write speakers, scenes, glossary and summary onto the document
   */
  analyzeAndUpdate(doc: SubtitleDocument): AnalysisResult {
    let speakerStats: SpeakerStats | undefined;
    if (this.config.detectSpeakers) {
      const tracker = new SpeakerTracker(this.config.speakers);
      speakerStats = tracker.detectSpeakers(doc.entries);
      doc.characters = tracker.getSpeakers(doc.entries).map(s => s.name);
      for (const name of doc.characters) doc.glossary.addCharacter(name);
    }

    if (this.config.extractGlossary) {
      new GlossaryExtractor(this.config.glossary).extractAndUpdate(doc);
    }

    if (this.config.detectScenes) {
      new SceneDetector(this.config.scenes).detectAndUpdate(doc);
    }

    if (this.config.generateSummary) {
      const text = new HistorySummarizer(this.config.summary).summarize(doc.entries).text;
      doc.contextSummary = text || undefined;
    }

    return { ...this.buildResult(doc.glossary.clone(), [...doc.scenes], doc.contextSummary), speakerStats };
  }

  /**
   * Stage wrapper used by the pipeline
   */
  execute(doc: SubtitleDocument): StageResult<AnalysisResult> {
    const startTime = Date.now();
    try {
      const data = this.analyzeAndUpdate(doc);
      if (!this.quiet) console.log(`[AnalyzeStage] ${describeAnalysis(data)}`);
      return { stage: 'analyze', success: true, data, tokensUsed: 0, duration: Date.now() - startTime };
    } catch (error) {
      return {
        stage: 'analyze',
        success: false,
        error: error instanceof Error ? error.message : 'Unknown error',
        tokensUsed: 0,
        duration: Date.now() - startTime,
      };
    }
  }

  private buildResult(glossary: GlossaryManager, scenes: Scene[], summary?: string): AnalysisResult {
    return {
      glossary,
      scenes,
      summary,
      characterCount: glossary.characterCount,
      termCount: glossary.termCount,
      sceneCount: scenes.length,
    };
  }
}
