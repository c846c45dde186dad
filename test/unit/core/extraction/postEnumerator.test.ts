import { describe, test, expect, jest, afterEach } from '@jest/globals';
import * as cheerio from 'cheerio';
import * as fieldExtractor from '../../../../src/core/extraction/fieldExtractor';
import {
  extractPosts,
  findPostContainers,
  isUsableName,
} from '../../../../src/core/extraction/postEnumerator';
import { FEED_HTML } from '../../../fixtures/mhtml';

describe('PostEnumerator', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('extracts one record per named post and keeps document positions', () => {
    const records = extractPosts(FEED_HTML);

    expect(records).toEqual([
      {
        Name: 'Jane Doe',
        Title: 'Senior Product Manager at Acme',
        Period: '2w',
        Details: 'We are hiring a product manager for our remote team in Europe.',
        PostIndex: 1,
        ExtractionMethod: 'traditional',
      },
      {
        Name: 'John Smith',
        Title: 'Product Manager, Growth',
        Period: 'N/A',
        Details: 'Looking for a senior engineer in Berlin, Germany.',
        PostIndex: 3,
        ExtractionMethod: 'traditional',
      },
    ]);
  });

  test('emits frozen records with trimmed names', () => {
    const [record] = extractPosts(
      '<div class="feed-shared-update-v2"><span aria-hidden="true">  Jane   </span></div>'
    );

    expect(record.Name).toBe('Jane');
    expect(Object.isFrozen(record)).toBe(true);
  });

  test('handles the minimal single-post fragment', () => {
    const records = extractPosts(
      '<div class="feed-shared-update-v2"><span aria-hidden="true">Jane Doe</span></div>'
    );

    expect(records).toEqual([
      {
        Name: 'Jane Doe',
        Title: 'No title found',
        Period: 'N/A',
        Details: 'N/A',
        PostIndex: 1,
        ExtractionMethod: 'traditional',
      },
    ]);
  });

  test('falls back to broader container selectors when the primary finds nothing', () => {
    const $ = cheerio.load(
      '<div class="feed-shared-text"><span aria-hidden="true">Only Text</span></div>'
    );
    const misses: string[] = [];

    const match = findPostContainers($, undefined, selector => misses.push(selector));

    expect(match.selector).toBe('div.feed-shared-text');
    expect(match.containers.map(container => container.name)).toEqual(['div']);
    expect(misses).toEqual(['div.feed-shared-update-v2', 'div.feed-shared-update-v2__description']);
  });

  test('uses the first selector with matches even if later ones would match too', () => {
    const html =
      '<div class="feed-shared-update-v2__description"><span aria-hidden="true">Desc Author</span></div>' +
      '<div class="feed-shared-text"><span aria-hidden="true">Text Author</span></div>';

    expect(extractPosts(html).map(record => record.Name)).toEqual(['Desc Author']);
  });

  test('returns an empty list when no container selector matches', () => {
    expect(extractPosts('<html><body><p>Nothing to see</p></body></html>')).toEqual([]);
  });

  test('a failing post is skipped without aborting the rest', () => {
    const original = fieldExtractor.extractFields;
    let calls = 0;
    jest.spyOn(fieldExtractor, 'extractFields').mockImplementation(post => {
      calls += 1;
      if (calls === 1) {
        throw new Error('boom');
      }
      return original(post);
    });

    const html =
      '<div class="feed-shared-update-v2"><span aria-hidden="true">First</span></div>' +
      '<div class="feed-shared-update-v2"><span aria-hidden="true">Second</span></div>';

    const records = extractPosts(html);

    expect(records.map(record => [record.Name, record.PostIndex])).toEqual([['Second', 2]]);
  });

  test('isUsableName rejects blanks and the sentinel', () => {
    expect(isUsableName('')).toBe(false);
    expect(isUsableName('   ')).toBe(false);
    expect(isUsableName('N/A')).toBe(false);
    expect(isUsableName(' Jane ')).toBe(true);
  });
});
