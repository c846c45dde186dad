export { decodeArchive, readArchiveFile, type ArchiveReadResult } from './core/archive/archiveReader';
export {
  extractField,
  extractFields,
  extractFieldsFromHtml,
  extractName,
  extractTitle,
  extractPeriod,
  extractDetails,
  FIELD_DEFAULTS,
} from './core/extraction/fieldExtractor';
export { extractPosts, findPostContainers } from './core/extraction/postEnumerator';
export { extractPostsWithAi } from './core/extraction/aiPostExtractor';
export {
  FIELD_STRATEGIES,
  POST_CONTAINER_SELECTORS,
  type SelectorStrategy,
} from './core/extraction/selectors';
export { attemptStrategy, firstAcceptedMatch, type StrategyOutcome } from './core/extraction/strategy';
export type {
  CoreField,
  ExtractedRecord,
  ExtractionMethod,
  FieldResult,
} from './core/extraction/types/records';
export {
  analyzeRecords,
  isAnalysisError,
  type AnalysisResult,
  type QualityReport,
} from './core/analysis/qualityAnalyzer';
export { EnhancementAdapter, type EnhancementState } from './core/enhancement/enhancementAdapter';
export {
  mergeEnhancements,
  parseEnhancementResponse,
  serializeRecords,
} from './core/enhancement/tabular';
export { TextGenerator, createTextGenerator, type TextGeneratorConfig } from './core/generation/textGenerator';
export { formatTable } from './core/output/formatter';
export { toCsv, toJson, toExportRows, EXPORT_COLUMNS } from './core/output/exporter';
export { processDocument, type ProcessResult, type ProcessorOptions } from './services/documentProcessor';
export * from './core/errors';
