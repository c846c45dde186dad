import * as cheerio from 'cheerio';
import type { Cheerio } from 'cheerio';
import type { AnyNode } from 'domhandler';
import { SENTINEL, TITLE_SENTINEL } from '../../config/constants';
import { FIELD_STRATEGIES, type SelectorStrategy } from './selectors';
import { firstAcceptedMatch } from './strategy';
import { type CoreField, type FieldResult, type FieldResults } from './types/records';

// Title keeps its own placeholder; every other field uses the shared sentinel
export const FIELD_DEFAULTS: Readonly<Record<CoreField, string>> = {
  Name: SENTINEL,
  Title: TITLE_SENTINEL,
  Period: SENTINEL,
  Details: SENTINEL,
};

export function extractField<T extends AnyNode>(
  post: Cheerio<T>,
  field: CoreField,
  strategies: readonly SelectorStrategy[] = FIELD_STRATEGIES[field]
): FieldResult {
  const { match } = firstAcceptedMatch(post, strategies);

  if (match) {
    return { value: match.value, strategyId: match.strategyId };
  }

  return { value: FIELD_DEFAULTS[field], strategyId: null };
}

export function extractFields<T extends AnyNode>(post: Cheerio<T>): FieldResults {
  return {
    Name: extractField(post, 'Name'),
    Title: extractField(post, 'Title'),
    Period: extractField(post, 'Period'),
    Details: extractField(post, 'Details'),
  };
}

export const extractName = <T extends AnyNode>(post: Cheerio<T>): string =>
  extractField(post, 'Name').value;

export const extractTitle = <T extends AnyNode>(post: Cheerio<T>): string =>
  extractField(post, 'Title').value;

export const extractPeriod = <T extends AnyNode>(post: Cheerio<T>): string =>
  extractField(post, 'Period').value;

export const extractDetails = <T extends AnyNode>(post: Cheerio<T>): string =>
  extractField(post, 'Details').value;

/**
 * Treat a standalone markup fragment as one post.
 */
export function extractFieldsFromHtml(fragmentHtml: string): FieldResults {
  const $ = cheerio.load(fragmentHtml, null, false);
  return extractFields($.root());
}
