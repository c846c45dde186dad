import * as cheerio from 'cheerio';
import { z } from 'zod';
import { AI_CONFIDENCE, SENTINEL } from '../../config/constants';
import type { TextGenerator } from '../generation/textGenerator';
import { createChildLogger, generateCorrelationId } from '../../utils/logger';
import { isUsableName } from './postEnumerator';
import { collectText } from './strategy';
import type { ExtractedRecord } from './types/records';

export const AI_EXTRACTION_SYSTEM_PROMPT =
  'You are an expert at extracting structured data from LinkedIn posts. Return valid JSON only.';

const fieldValue = z
  .union([z.string(), z.number()])
  .nullish()
  .transform(value => {
    const text = value === null || value === undefined ? '' : String(value).trim();
    return text.length > 0 ? text : SENTINEL;
  });

const AiPostSchema = z.object({
  Name: fieldValue,
  Title: fieldValue,
  Period: fieldValue,
  Details: fieldValue,
  Location: fieldValue,
  Company: fieldValue,
});

const AiResponseSchema = z.array(AiPostSchema);

export interface AiExtractionOptions {
  correlationId?: string;
  charLimit?: number;
}

/**
 * Visible page text, one text block per line, without scripts and styles.
 */
export function toPlainText(html: string, charLimit: number): string {
  const $ = cheerio.load(html);
  $('script, style, meta, link').remove();

  const root = $.root().get(0);
  const text = root ? collectText(root, '\n') : '';

  return text.length > charLimit ? `${text.slice(0, charLimit)}...` : text;
}

export function buildAiExtractionPrompt(pageText: string): string {
  return `Extract LinkedIn post information from the following page content.
For each post, identify:
- Name: The person's name who made the post
- Title: Their job title or professional description
- Period: Time period mentioned (like "2w", "1mo", etc.)
- Details: The main content/text of their post
- Location: The expected location of the role and if in office is required
- Company: Name of the company

Return the data as a JSON array with objects containing these fields.
If you can't find specific information, use "N/A" as the value.

Page content:
${pageText}
`;
}

function stripFences(text: string): string {
  return text.replace(/```[\w-]*/g, '').trim();
}

export function parseAiPosts(responseText: string): ExtractedRecord[] | null {
  let payload: unknown;
  try {
    payload = JSON.parse(stripFences(responseText));
  } catch {
    return null;
  }

  const parsed = AiResponseSchema.safeParse(payload);
  if (!parsed.success) {
    return null;
  }

  return parsed.data
    .map((post, i) => ({ post, postIndex: i + 1 }))
    .filter(({ post }) => isUsableName(post.Name))
    .map(({ post, postIndex }) => ({
      ...post,
      PostIndex: postIndex,
      ExtractionMethod: 'ai' as const,
      Confidence: AI_CONFIDENCE,
    }));
}

/**
 * Ask the text generator to find posts in the whole page. Resolves to an
 * empty list on any failure; callers fall back to selector extraction.
 */
export async function extractPostsWithAi(
  html: string,
  generator: TextGenerator,
  options: AiExtractionOptions = {}
): Promise<ExtractedRecord[]> {
  const correlationId = options.correlationId ?? generateCorrelationId();
  const log = createChildLogger(correlationId);

  try {
    const pageText = toPlainText(html, options.charLimit ?? 10000);
    const response = await generator.generate(buildAiExtractionPrompt(pageText), {
      systemPrompt: AI_EXTRACTION_SYSTEM_PROMPT,
      correlationId,
    });

    const records = parseAiPosts(response);
    if (!records) {
      log.warn({ event: 'ai_extraction_unparsable' }, 'AI extraction returned no usable JSON');
      return [];
    }

    log.info({ event: 'ai_extraction_done', recordCount: records.length }, 'AI extraction completed');
    return records;
  } catch (error) {
    log.error(
      { event: 'ai_extraction_failed', error: error instanceof Error ? error.message : 'Unknown error' },
      'AI extraction failed'
    );
    return [];
  }
}
