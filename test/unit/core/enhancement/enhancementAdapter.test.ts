import { describe, test, expect } from '@jest/globals';
import { EnhancementAdapter } from '../../../../src/core/enhancement/enhancementAdapter';
import { ENHANCEMENT_SYSTEM_PROMPT, buildEnhancementPrompt } from '../../../../src/core/enhancement/prompt';
import type { ExtractedRecord } from '../../../../src/core/extraction/types/records';
import { FakeTextGenerator } from '../../../helpers/fakeTextGenerator';

const records: ExtractedRecord[] = [
  {
    Name: 'Jane Doe',
    Title: 'Product Manager at Acme',
    Period: '2w',
    Details: 'Hiring for a remote role',
    PostIndex: 1,
    ExtractionMethod: 'traditional',
  },
  {
    Name: 'John Smith',
    Title: 'Recruiter',
    Period: '1w',
    Details: 'Office based in Berlin, Germany',
    PostIndex: 2,
    ExtractionMethod: 'traditional',
  },
];

describe('EnhancementAdapter', () => {
  test('walks every state and merges the parsed answer', async () => {
    const generator = new FakeTextGenerator(
      '```\nID,Name,Company,Location\n1,Jane Doe,Acme,Remote\n2,John Smith,N/A,"Berlin, Germany"\n```'
    );
    const adapter = new EnhancementAdapter(generator);

    const enhanced = await adapter.enhance(records);

    expect(enhanced).toEqual([
      { ...records[0], Company: 'Acme', Location: 'Remote', ExtractionMethod: 'traditional+ai', Confidence: 0.9 },
      {
        ...records[1],
        Company: 'N/A',
        Location: 'Berlin, Germany',
        ExtractionMethod: 'traditional+ai',
        Confidence: 0.9,
      },
    ]);
    expect(adapter.getState()).toBe('done');
    expect(adapter.getHistory()).toEqual([
      'idle',
      'serializing',
      'awaiting_response',
      'parsing',
      'merging',
      'done',
    ]);
  });

  test('sends the fixed prompt with the serialized records', async () => {
    const generator = new FakeTextGenerator('ID,Name,Company,Location\n1,Jane Doe,Acme,Remote');
    await new EnhancementAdapter(generator).enhance(records);

    expect(generator.prompts).toHaveLength(1);
    expect(generator.prompts[0].prompt).toBe(
      buildEnhancementPrompt(
        [
          'Name,Title,Period,Details',
          'Jane Doe,Product Manager at Acme,2w,Hiring for a remote role',
          'John Smith,Recruiter,1w,"Office based in Berlin, Germany"',
        ].join('\n')
      )
    );
    expect(generator.prompts[0].options?.systemPrompt).toBe(ENHANCEMENT_SYSTEM_PROMPT);
  });

  test('returns null when only one table line comes back', async () => {
    const adapter = new EnhancementAdapter(
      new FakeTextGenerator('ID,Name,Company,Location\nI could not determine any companies.')
    );

    await expect(adapter.enhance(records)).resolves.toBeNull();
    expect(adapter.getState()).toBe('failed');
    expect(adapter.getHistory()).toEqual([
      'idle',
      'serializing',
      'awaiting_response',
      'parsing',
      'failed',
    ]);
  });

  test('returns null when the generator throws', async () => {
    const adapter = new EnhancementAdapter(new FakeTextGenerator(new Error('socket hang up')));

    await expect(adapter.enhance(records)).resolves.toBeNull();
    expect(adapter.getHistory()).toEqual(['idle', 'serializing', 'awaiting_response', 'failed']);
  });

  test('keeps the input count even when no names match', async () => {
    const adapter = new EnhancementAdapter(
      new FakeTextGenerator('ID,Name,Company,Location\n1,Someone Else,Acme,Remote')
    );

    const enhanced = await adapter.enhance(records);

    expect(enhanced?.map(r => [r.Name, r.Company, r.Location])).toEqual([
      ['Jane Doe', 'N/A', 'N/A'],
      ['John Smith', 'N/A', 'N/A'],
    ]);
  });

  test('finishes without a request for an empty record list', async () => {
    const generator = new FakeTextGenerator();
    const adapter = new EnhancementAdapter(generator);

    await expect(adapter.enhance([])).resolves.toEqual([]);
    expect(generator.prompts).toHaveLength(0);
    expect(adapter.getHistory()).toEqual(['idle', 'done']);
  });

  test('each call starts a fresh attempt', async () => {
    const adapter = new EnhancementAdapter(
      new FakeTextGenerator(new Error('down'), 'ID,Name,Company,Location\n1,Jane Doe,Acme,Remote')
    );

    await adapter.enhance(records);
    const second = await adapter.enhance(records);

    expect(second).toHaveLength(2);
    expect(adapter.getState()).toBe('done');
  });
});
