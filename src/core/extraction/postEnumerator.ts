import * as cheerio from 'cheerio';
import { isTag, type Element } from 'domhandler';
import { SENTINEL } from '../../config/constants';
import { createChildLogger, generateCorrelationId } from '../../utils/logger';
import { extractFields } from './fieldExtractor';
import { POST_CONTAINER_SELECTORS } from './selectors';
import type { ExtractedRecord } from './types/records';

export interface EnumeratorOptions {
  correlationId?: string;
  /** Overrides the default container selector order */
  containerSelectors?: readonly string[];
}

export interface ContainerMatch {
  selector: string | null;
  containers: Element[];
}

export function findPostContainers(
  $: cheerio.CheerioAPI,
  selectors: readonly string[] = POST_CONTAINER_SELECTORS,
  onMiss?: (selector: string) => void
): ContainerMatch {
  for (const selector of selectors) {
    const containers = $(selector).toArray().filter(isTag);
    if (containers.length > 0) {
      return { selector, containers };
    }
    onMiss?.(selector);
  }

  return { selector: null, containers: [] };
}

export function isUsableName(name: string): boolean {
  const trimmed = name.trim();
  return trimmed.length > 0 && trimmed !== SENTINEL;
}

/**
 * Find every post container in a feed page and extract one record per post.
 * Posts without a usable name are skipped but still count toward PostIndex.
 */
export function extractPosts(html: string, options: EnumeratorOptions = {}): ExtractedRecord[] {
  const log = createChildLogger(options.correlationId ?? generateCorrelationId());
  const $ = cheerio.load(html);

  const { selector, containers } = findPostContainers(
    $,
    options.containerSelectors ?? POST_CONTAINER_SELECTORS,
    missed =>
      log.warn(
        { event: 'container_selector_miss', selector: missed },
        'No post containers for selector, trying next'
      )
  );

  log.info(
    { event: 'containers_found', selector, containerCount: containers.length },
    `Found ${containers.length} post containers`
  );

  const records: ExtractedRecord[] = [];

  containers.forEach((container, i) => {
    const postIndex = i + 1;
    try {
      const fields = extractFields($(container));
      const name = fields.Name.value.trim();

      if (!isUsableName(name)) {
        log.debug({ event: 'post_skipped', postIndex, reason: 'no_name' }, 'Skipping post');
        return;
      }

      records.push(
        Object.freeze({
          Name: name,
          Title: fields.Title.value.trim(),
          Period: fields.Period.value.trim(),
          Details: fields.Details.value.trim(),
          PostIndex: postIndex,
          ExtractionMethod: 'traditional' as const,
        })
      );

      log.debug(
        {
          event: 'post_extracted',
          postIndex,
          strategies: {
            Name: fields.Name.strategyId,
            Title: fields.Title.strategyId,
            Period: fields.Period.strategyId,
            Details: fields.Details.strategyId,
          },
        },
        'Extracted post'
      );
    } catch (error) {
      log.warn(
        {
          event: 'post_failed',
          postIndex,
          error: error instanceof Error ? error.message : 'Unknown error',
        },
        `Error processing post ${postIndex}`
      );
    }
  });

  return records;
}
