import { readArchiveFile } from '../core/archive/archiveReader';
import { analyzeRecords, isAnalysisError, type AnalysisResult } from '../core/analysis/qualityAnalyzer';
import { EnhancementAdapter } from '../core/enhancement/enhancementAdapter';
import { extractPostsWithAi } from '../core/extraction/aiPostExtractor';
import { extractPosts } from '../core/extraction/postEnumerator';
import type { ExtractedRecord, ExtractionMethod } from '../core/extraction/types/records';
import { ConfigurationError, toErrorMessage } from '../core/errors';
import type { TextGenerator } from '../core/generation/textGenerator';
import { createChildLogger, generateCorrelationId, withTiming } from '../utils/logger';

export interface ProcessorOptions {
  /** Ask the text generator to find posts instead of using selectors */
  useAi?: boolean;
  /** Add Company and Location after extraction; requires `textGenerator` */
  enhance?: boolean;
  textGenerator?: TextGenerator | null;
  aiCharLimit?: number;
  correlationId?: string;
  now?: () => Date;
}

export interface ProcessSummary {
  totalPosts: number;
  qualityScore: number | null;
  extractionMethod: ExtractionMethod;
  enhanced: boolean;
  processedAt: string;
}

export type ProcessResult =
  | {
      success: true;
      filePath: string;
      records: ExtractedRecord[];
      analysis: AnalysisResult;
      summary: ProcessSummary;
    }
  | {
      success: false;
      status: 'no_content' | 'failed';
      error: string;
      filePath: string;
    };

export const NO_CONTENT_MESSAGE = 'No HTML content found in MHTML file';

/**
 * Run one archive through reading, extraction, analysis and optional
 * enhancement. Failures come back as a result value with a message.
 */
export async function processDocument(
  filePath: string,
  options: ProcessorOptions = {}
): Promise<ProcessResult> {
  const correlationId = options.correlationId ?? generateCorrelationId();
  const log = createChildLogger(correlationId);
  const now = options.now ?? (() => new Date());
  const generator = options.textGenerator ?? null;

  log.info(
    { event: 'process_start', filePath, useAi: Boolean(options.useAi), enhance: Boolean(options.enhance) },
    'Processing archive'
  );

  try {
    if ((options.enhance || options.useAi) && !generator) {
      throw new ConfigurationError('a text generator is required for AI extraction or enhancement');
    }

    return await withTiming<ProcessResult>(log, 'process_document', async () => {
      const archive = await readArchiveFile(filePath, { correlationId });
      if (archive.status === 'no_content') {
        return { success: false, status: 'no_content', error: NO_CONTENT_MESSAGE, filePath };
      }

      let records: ExtractedRecord[] = [];
      if (options.useAi && generator) {
        records = await extractPostsWithAi(archive.html, generator, {
          correlationId,
          charLimit: options.aiCharLimit,
        });
        if (records.length === 0) {
          log.warn({ event: 'ai_fallback' }, 'AI extraction failed, falling back to selectors');
        }
      }
      if (records.length === 0) {
        records = extractPosts(archive.html, { correlationId });
      }

      const analysis = analyzeRecords(records, now);

      let enhanced = false;
      if (options.enhance && generator) {
        const adapter = new EnhancementAdapter(generator, { correlationId });
        const result = await adapter.enhance(records);
        if (result) {
          records = result;
          enhanced = records.length > 0;
        }
      }

      const summary: ProcessSummary = {
        totalPosts: records.length,
        qualityScore: isAnalysisError(analysis) ? null : analysis.dataQualityScore,
        extractionMethod: records[0]?.ExtractionMethod ?? 'traditional',
        enhanced,
        processedAt: now().toISOString(),
      };

      log.info(
        { event: 'process_done', totalPosts: summary.totalPosts, qualityScore: summary.qualityScore },
        `Processed ${summary.totalPosts} posts`
      );

      return { success: true, filePath, records, analysis, summary };
    });
  } catch (error) {
    log.error({ event: 'process_failed', filePath, error: toErrorMessage(error) }, 'Processing failed');
    return { success: false, status: 'failed', error: toErrorMessage(error), filePath };
  }
}
