import {
  COMMON_WORD_MIN_LENGTH,
  NO_DATA_ERROR,
  QUALITY_THRESHOLDS,
  SENTINEL,
} from '../../config/constants';
import { CORE_FIELDS, type CoreField, type ExtractedRecord } from '../extraction/types/records';

export interface QualityReport {
  totalPosts: number;
  uniqueNames: number;
  /** Records whose field is not the sentinel, per core field */
  fieldCompleteness: Record<CoreField, number>;
  /** Share of non-sentinel core fields, 0-100, two decimals */
  dataQualityScore: number;
  insights: string[];
  recommendations: string[];
  generatedAt: string;
}

export interface AnalysisError {
  error: typeof NO_DATA_ERROR;
}

export type AnalysisResult = QualityReport | AnalysisError;

export function isAnalysisError(result: AnalysisResult): result is AnalysisError {
  return 'error' in result;
}

export const QUALITY_MESSAGES = {
  HIGH: 'High quality data extraction - most fields were successfully parsed',
  MODERATE: 'Moderate quality data extraction - some fields may need manual review',
  LOW: 'Low quality data extraction - manual review recommended',
  REVIEW_FORMAT:
    'Consider reviewing the MHTML file format - it may be from a different LinkedIn version',
  NO_DATA: 'No data extracted - check if the MHTML file contains LinkedIn content',
} as const;

// Two decimals, exact halves to the even neighbour (3.125 -> 3.12)
function round2(value: number): number {
  const scaled = value * 100;
  const floor = Math.floor(scaled);
  if (scaled - floor === 0.5) {
    return (floor % 2 === 0 ? floor : floor + 1) / 100;
  }
  return Math.round(scaled) / 100;
}

/**
 * Most frequent words (case-folded) of at least `minLength` characters.
 * Returns up to ten words that occur more than once; equal counts keep
 * first-seen order.
 */
export function findCommonWords(
  texts: readonly string[],
  minLength: number = COMMON_WORD_MIN_LENGTH
): string[] {
  const counts = new Map<string, number>();

  for (const text of texts) {
    for (const word of text.toLowerCase().match(/[\p{L}\p{N}_]+/gu) ?? []) {
      if ([...word].length >= minLength) {
        counts.set(word, (counts.get(word) ?? 0) + 1);
      }
    }
  }

  return [...counts.entries()]
    .sort((a, b) => b[1] - a[1])
    .slice(0, 10)
    .filter(([, count]) => count > 1)
    .map(([word]) => word);
}

export function scoreCompleteness(records: readonly ExtractedRecord[]): {
  fieldCompleteness: Record<CoreField, number>;
  dataQualityScore: number;
} {
  const fieldCompleteness: Record<CoreField, number> = { Name: 0, Title: 0, Period: 0, Details: 0 };

  for (const record of records) {
    for (const field of CORE_FIELDS) {
      if (record[field] !== SENTINEL) {
        fieldCompleteness[field] += 1;
      }
    }
  }

  const totalFields = records.length * CORE_FIELDS.length;
  const completeFields = CORE_FIELDS.reduce((sum, field) => sum + fieldCompleteness[field], 0);
  const dataQualityScore = totalFields === 0 ? 0 : round2((completeFields / totalFields) * 100);

  return { fieldCompleteness, dataQualityScore };
}

export function buildInsights(records: readonly ExtractedRecord[], score: number): string[] {
  const insights: string[] = [];

  if (score > QUALITY_THRESHOLDS.HIGH) {
    insights.push(QUALITY_MESSAGES.HIGH);
  } else if (score > QUALITY_THRESHOLDS.MODERATE) {
    insights.push(QUALITY_MESSAGES.MODERATE);
  } else {
    insights.push(QUALITY_MESSAGES.LOW);
  }

  if (records.length > 1) {
    const titles = records.map(record => record.Title).filter(title => title !== SENTINEL);
    const commonWords = findCommonWords(titles);
    if (commonWords.length > 0) {
      insights.push(`Common keywords in titles: ${commonWords.slice(0, 5).join(', ')}`);
    }
  }

  return insights;
}

/**
 * `analyzeRecords` never calls this with zero records; the no-data branch
 * serves callers that build recommendations for an arbitrary count.
 */
export function buildRecommendations(score: number, totalPosts: number): string[] {
  const recommendations: string[] = [];

  if (score < QUALITY_THRESHOLDS.HIGH) {
    recommendations.push(QUALITY_MESSAGES.REVIEW_FORMAT);
  }

  if (totalPosts === 0) {
    recommendations.push(QUALITY_MESSAGES.NO_DATA);
  }

  return recommendations;
}

export function analyzeRecords(
  records: readonly ExtractedRecord[],
  now: () => Date = () => new Date()
): AnalysisResult {
  if (records.length === 0) {
    return { error: NO_DATA_ERROR };
  }

  const { fieldCompleteness, dataQualityScore } = scoreCompleteness(records);

  return {
    totalPosts: records.length,
    uniqueNames: new Set(records.map(record => record.Name)).size,
    fieldCompleteness,
    dataQualityScore,
    insights: buildInsights(records, dataQualityScore),
    recommendations: buildRecommendations(dataQualityScore, records.length),
    generatedAt: now().toISOString(),
  };
}
