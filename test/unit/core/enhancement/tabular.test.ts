import { describe, test, expect } from '@jest/globals';
import {
  mergeEnhancements,
  normalizeRow,
  parseEnhancementResponse,
  serializeField,
  serializeRecords,
} from '../../../../src/core/enhancement/tabular';
import type { ExtractedRecord } from '../../../../src/core/extraction/types/records';

const record = (Name: string, PostIndex: number, overrides: Partial<ExtractedRecord> = {}) => ({
  Name,
  Title: 'Engineer',
  Period: '1w',
  Details: 'N/A',
  PostIndex,
  ExtractionMethod: 'traditional' as const,
  ...overrides,
});

describe('enhancement tabular helpers', () => {
  describe('serializeRecords', () => {
    test('doubles quotes and wraps only comma-bearing fields', () => {
      expect(serializeField('plain')).toBe('plain');
      expect(serializeField('PM, Growth')).toBe('"PM, Growth"');
      expect(serializeField('She said "hi"')).toBe('She said ""hi""');
      expect(serializeField('"Quoted", really')).toBe('"""Quoted"", really"');
    });

    test('writes the header and one line per record in order', () => {
      const table = serializeRecords([
        record('Jane Doe', 1, { Title: 'PM, Growth', Period: '2w', Details: 'Remote role' }),
        record('John Smith', 2),
      ]);

      expect(table).toBe(
        ['Name,Title,Period,Details', 'Jane Doe,"PM, Growth",2w,Remote role', 'John Smith,Engineer,1w,N/A'].join(
          '\n'
        )
      );
    });

    test('keeps a multi-line post body on a single line', () => {
      const table = serializeRecords([
        record('Jane Doe', 1, { Details: 'We are hiring\nengineers, Berlin' }),
      ]);

      expect(table.split('\n')).toEqual([
        'Name,Title,Period,Details',
        'Jane Doe,Engineer,1w,"We are hiring engineers, Berlin"',
      ]);
    });
  });

  describe('parseEnhancementResponse', () => {
    test('extracts the table from a fenced answer with prose around it', () => {
      const response = [
        'Here is the enriched data:',
        '```csv',
        'ID,Name,Company,Location',
        '1,Jane Doe,Acme,Remote',
        '2,John Smith,Globex,"Berlin, Germany"',
        '```',
        'Let me know if you need anything else.',
      ].join('\n');

      expect(parseEnhancementResponse(response)).toEqual([
        { ID: '1', Name: 'Jane Doe', Company: 'Acme', Location: 'Remote' },
        { ID: '2', Name: 'John Smith', Company: 'Globex', Location: 'Berlin, Germany' },
      ]);
    });

    test('drops lines with fewer than four fields', () => {
      const response = [
        'Note: companies, locations',
        'ID,Name,Company,Location',
        '1,Jane Doe,Acme,Remote',
      ].join('\n');

      expect(parseEnhancementResponse(response)).toEqual([
        { ID: '1', Name: 'Jane Doe', Company: 'Acme', Location: 'Remote' },
      ]);
    });

    test('gives up when only one table line survives', () => {
      expect(parseEnhancementResponse('ID,Name,Company,Location\nSorry, I cannot help.')).toBeNull();
      expect(parseEnhancementResponse('')).toBeNull();
    });

    test('fills blanks with the sentinel and trims stray quotes', () => {
      const response = "ID,Name,Company,Location\n3,Ann Lee,'Initech',";

      expect(parseEnhancementResponse(response)).toEqual([
        { ID: '3', Name: 'Ann Lee', Company: 'Initech', Location: 'N/A' },
      ]);
    });
  });

  test('normalizeRow matches headers case-insensitively and ignores extra columns', () => {
    expect(
      normalizeRow({ id: '7', NAME: ' Bo Kim ', company: '"Umbrella"', Extra: 'x' })
    ).toEqual({ ID: '7', Name: 'Bo Kim', Company: 'Umbrella', Location: 'N/A' });
  });

  describe('mergeEnhancements', () => {
    const records: ExtractedRecord[] = [
      record('Jane Doe', 1),
      record('Bob Ray', 2),
      record('John Smith', 4),
    ];

    test('keeps order and count, defaulting unmatched records', () => {
      const merged = mergeEnhancements(records, [
        { ID: '2', Name: 'John Smith', Company: 'Globex', Location: 'Berlin' },
        { ID: '1', Name: ' Jane Doe ', Company: 'Acme', Location: 'Remote' },
      ]);

      expect(merged.map(r => [r.Name, r.Company, r.Location])).toEqual([
        ['Jane Doe', 'Acme', 'Remote'],
        ['Bob Ray', 'N/A', 'N/A'],
        ['John Smith', 'Globex', 'Berlin'],
      ]);
      expect(merged.every(r => r.ExtractionMethod === 'traditional+ai')).toBe(true);
      expect(merged.every(r => r.Confidence === 0.9)).toBe(true);
    });

    test('retains the original core fields and leaves the input untouched', () => {
      const [first] = mergeEnhancements(records, []);

      expect(first).toEqual({
        ...records[0],
        Company: 'N/A',
        Location: 'N/A',
        ExtractionMethod: 'traditional+ai',
        Confidence: 0.9,
      });
      expect(records[0].ExtractionMethod).toBe('traditional');
      expect(records[0].Company).toBeUndefined();
    });
  });
});
