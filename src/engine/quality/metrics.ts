/**
 * Multi-dimensional quality metrics
 *
 * Five weighted dimensions roll up into an overall score and a letter
 * grade. Inputs are plain counts and samples collected by the validation
 * stage (see `collectMetricsData`).
 */

import type { SubtitleDocument } from '../document/subtitle-document.js';
import { stripMarkup } from '../document/formatting.js';
import { charLength } from '../utils/chunker.js';

export type QualityDimension = 'completeness' | 'accuracy' | 'consistency' | 'formatting' | 'readability';

export const DIMENSION_WEIGHTS: Record<QualityDimension, number> = {
  completeness: 0.3,
  accuracy: 0.25,
  consistency: 0.2,
  formatting: 0.15,
  readability: 0.1,
};

const DIMENSION_ORDER: QualityDimension[] = ['completeness', 'accuracy', 'consistency', 'formatting', 'readability'];

export interface DimensionScore {
  score: number;
  weight: number;
  issues: number;
}

const dimension = (score: number, weight: number, issues: number): DimensionScore => ({
  score: Math.min(1, Math.max(0, score)),
  weight,
  issues,
});

const perfect = (d: QualityDimension): DimensionScore => dimension(1, DIMENSION_WEIGHTS[d], 0);

export interface QualityThresholds {
  minOverall: number;
  maxLengthRatio: number;
  minLengthRatio: number;
  maxCharsPerSecond: number;
  maxCharsPerLine: number;
}

export const QUALITY_THRESHOLDS = {
  default: { minOverall: 0.7, maxLengthRatio: 1.5, minLengthRatio: 0.3, maxCharsPerSecond: 25, maxCharsPerLine: 42 },
  strict: { minOverall: 0.85, maxLengthRatio: 1.3, minLengthRatio: 0.5, maxCharsPerSecond: 20, maxCharsPerLine: 37 },
  lenient: { minOverall: 0.5, maxLengthRatio: 2.0, minLengthRatio: 0.2, maxCharsPerSecond: 30, maxCharsPerLine: 50 },
} satisfies Record<string, QualityThresholds>;

export interface MetricsData {
  totalEntries: number;
  translatedEntries: number;
  emptyEntries: number;
  entriesWithIssues: number;
  lengthRatios: number[];
  totalTerms: number;
  inconsistentTerms: number;
  totalTags: number;
  missingTags: number;
  charsPerSecond: number[];
  lineLengths: number[];
}

export const emptyMetricsData = (): MetricsData => ({
  totalEntries: 0,
  translatedEntries: 0,
  emptyEntries: 0,
  entriesWithIssues: 0,
  lengthRatios: [],
  totalTerms: 0,
  inconsistentTerms: 0,
  totalTags: 0,
  missingTags: 0,
  charsPerSecond: [],
  lineLengths: [],
});

const GRADES: Array<[number, string]> = [
  [0.9, 'A'],
  [0.8, 'B'],
  [0.7, 'C'],
  [0.6, 'D'],
];

export class QualityScore {
  readonly overall: number;

  constructor(
    readonly dimensions: Record<QualityDimension, DimensionScore>,
    readonly entriesEvaluated: number,
    readonly entriesWithIssues: number
  ) {
    const all = DIMENSION_ORDER.map(d => dimensions[d]);
    const totalWeight = all.reduce((sum, d) => sum + d.weight, 0);
    this.overall = totalWeight > 0 ? all.reduce((sum, d) => sum + d.score * d.weight, 0) / totalWeight : 0;
  }

  static perfect(): QualityScore {
    return new QualityScore(
      {
        completeness: perfect('completeness'),
        accuracy: perfect('accuracy'),
        consistency: perfect('consistency'),
        formatting: perfect('formatting'),
        readability: perfect('readability'),
      },
      0,
      0
    );
  }

  meetsThreshold(threshold: number): boolean {
    return this.overall >= threshold;
  }

  /** First dimension with the lowest score, in weight order */
  weakestDimension(): QualityDimension {
    let weakest: QualityDimension = 'completeness';
    for (const name of DIMENSION_ORDER) {
      if (this.dimensions[name].score < this.dimensions[weakest].score) {
        weakest = name;
      }
    }
    return weakest;
  }

  grade(): string {
    return GRADES.find(([min]) => this.overall >= min)?.[1] ?? 'F';
  }

  summary(): string {
    return `Quality: ${(this.overall * 100).toFixed(1)}% (Grade: ${this.grade()}) - ${this.entriesEvaluated} entries, ${this.entriesWithIssues} with issues`;
  }
}

export class QualityMetrics {
  constructor(readonly thresholds: QualityThresholds = QUALITY_THRESHOLDS.default) {}

  completeness(total: number, translated: number, empty: number): DimensionScore {
    const weight = DIMENSION_WEIGHTS.completeness;
    if (total === 0) return perfect('completeness');
    const missing = Math.max(0, total - translated);
    return dimension(Math.max(0, translated - empty) / total, weight, missing + empty);
  }

  accuracy(ratios: readonly number[]): DimensionScore {
    if (ratios.length === 0) return perfect('accuracy');
    const { maxLengthRatio, minLengthRatio } = this.thresholds;
    let issues = 0;
    let penalty = 0;
    for (const ratio of ratios) {
      if (ratio > maxLengthRatio) {
        issues++;
        penalty += Math.min(1, (ratio - maxLengthRatio) / maxLengthRatio);
      } else if (ratio < minLengthRatio) {
        issues++;
        penalty += Math.min(1, (minLengthRatio - ratio) / minLengthRatio);
      }
    }
    return dimension(1 - penalty / ratios.length, DIMENSION_WEIGHTS.accuracy, issues);
  }

  consistency(totalTerms: number, inconsistent: number): DimensionScore {
    if (totalTerms === 0) return perfect('consistency');
    return dimension(Math.max(0, totalTerms - inconsistent) / totalTerms, DIMENSION_WEIGHTS.consistency, inconsistent);
  }

  formatting(totalTags: number, missing: number): DimensionScore {
    if (totalTags === 0) return perfect('formatting');
    return dimension(Math.max(0, totalTags - missing) / totalTags, DIMENSION_WEIGHTS.formatting, missing);
  }

  /** Over-limit reading speed and line length each cost up to half a check */
  readability(charsPerSecond: readonly number[], lineLengths: readonly number[]): DimensionScore {
    const { maxCharsPerSecond, maxCharsPerLine } = this.thresholds;
    let issues = 0;
    let penalty = 0;
    for (const cps of charsPerSecond) {
      if (cps > maxCharsPerSecond) {
        issues++;
        penalty += Math.min(1, (cps - maxCharsPerSecond) / maxCharsPerSecond) * 0.5;
      }
    }
    for (const length of lineLengths) {
      if (length > maxCharsPerLine) {
        issues++;
        penalty += Math.min(1, (length - maxCharsPerLine) / maxCharsPerLine) * 0.5;
      }
    }
    const checks = charsPerSecond.length + lineLengths.length;
    return dimension(checks > 0 ? 1 - penalty / checks : 1, DIMENSION_WEIGHTS.readability, issues);
  }

  score(data: MetricsData): QualityScore {
    return new QualityScore(
      {
        completeness: this.completeness(data.totalEntries, data.translatedEntries, data.emptyEntries),
        accuracy: this.accuracy(data.lengthRatios),
        consistency: this.consistency(data.totalTerms, data.inconsistentTerms),
        formatting: this.formatting(data.totalTags, data.missingTags),
        readability: this.readability(data.charsPerSecond, data.lineLengths),
      },
      data.totalEntries,
      data.entriesWithIssues
    );
  }
}

/**
 * Gather the samples the metrics need from a translated document. Glossary
 * and formatting issue counts come from the validator.
 */
export function collectMetricsData(
  doc: SubtitleDocument,
  counts: { entriesWithIssues: number; inconsistentTerms: number; missingTags: number }
): MetricsData {
  const data = emptyMetricsData();
  data.totalEntries = doc.length;
  data.entriesWithIssues = counts.entriesWithIssues;
  data.inconsistentTerms = counts.inconsistentTerms;
  data.missingTags = counts.missingTags;

  const names = [...doc.glossary.characterNames];
  const terms = [...doc.glossary.terms.keys()];

  for (const entry of doc.entries) {
    data.totalTags += entry.formatting.length;
    data.totalTerms += names.filter(n => entry.originalText.includes(n)).length;
    data.totalTerms += terms.filter(t => entry.originalText.includes(t)).length;

    if (entry.translatedText === undefined) continue;
    data.translatedEntries++;

    const translated = entry.translatedText;
    if (translated.trim() === '') {
      data.emptyEntries++;
      continue;
    }

    const originalLength = charLength(entry.originalText);
    if (originalLength > 0) {
      data.lengthRatios.push(charLength(translated) / originalLength);
    }

    const plain = stripMarkup(translated);
    const seconds = entry.timecode.durationMs / 1000;
    data.charsPerSecond.push(charLength(plain.replace(/\n/g, '')) / seconds);
    for (const line of plain.split('\n')) {
      data.lineLengths.push(charLength(line));
    }
  }

  return data;
}
