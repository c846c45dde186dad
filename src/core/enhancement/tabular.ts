import Papa from 'papaparse';
import { AI_CONFIDENCE, SENTINEL } from '../../config/constants';
import type { ExtractedRecord } from '../extraction/types/records';

export const ENHANCEMENT_INPUT_HEADER = ['Name', 'Title', 'Period', 'Details'] as const;

export const ENHANCEMENT_OUTPUT_COLUMNS = ['ID', 'Name', 'Company', 'Location'] as const;

export type EnhancementColumn = (typeof ENHANCEMENT_OUTPUT_COLUMNS)[number];

export type EnhancementRow = Record<EnhancementColumn, string>;

// Response lines with fewer fields than this are prose, not table rows
const MIN_RESPONSE_FIELDS = 4;

export function serializeField(value: string): string {
  const escaped = value.replace(/\r\n|\r|\n/g, ' ').replace(/"/g, '""');
  return escaped.includes(',') ? `"${escaped}"` : escaped;
}

/**
 * Compact table sent to the text generator: one header line, one line per
 * record, in input order.
 */
export function serializeRecords(records: readonly ExtractedRecord[]): string {
  const lines = [ENHANCEMENT_INPUT_HEADER.join(',')];

  for (const record of records) {
    lines.push(ENHANCEMENT_INPUT_HEADER.map(column => serializeField(record[column])).join(','));
  }

  return lines.join('\n');
}

function cleanValue(value: unknown): string {
  if (typeof value !== 'string') {
    return SENTINEL;
  }
  const cleaned = value
    .trim()
    .replace(/^["']+|["']+$/g, '')
    .trim();
  return cleaned.length > 0 ? cleaned : SENTINEL;
}

/**
 * Map a parsed row onto exactly the four output columns. Header names are
 * matched case-insensitively; missing or blank cells become the sentinel.
 */
export function normalizeRow(raw: Record<string, unknown>): EnhancementRow {
  const byLowerKey = new Map<string, unknown>();
  for (const [key, value] of Object.entries(raw)) {
    const lowerKey = key.trim().toLowerCase();
    if (!byLowerKey.has(lowerKey)) {
      byLowerKey.set(lowerKey, value);
    }
  }

  return {
    ID: cleanValue(byLowerKey.get('id')),
    Name: cleanValue(byLowerKey.get('name')),
    Company: cleanValue(byLowerKey.get('company')),
    Location: cleanValue(byLowerKey.get('location')),
  };
}

/**
 * Strip a language model's answer down to its table and parse it. Returns
 * null when fewer than a header and one row survive.
 */
export function parseEnhancementResponse(responseText: string): EnhancementRow[] | null {
  const withoutFences = responseText.replace(/```[\w-]*/g, '');

  const tableLines = withoutFences
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line.includes(','))
    .filter(line => line.split(',').length >= MIN_RESPONSE_FIELDS);

  if (tableLines.length < 2) {
    return null;
  }

  const parsed = Papa.parse<Record<string, unknown>>(tableLines.join('\n'), {
    header: true,
    skipEmptyLines: true,
    transformHeader: header => header.trim(),
  });

  if (parsed.data.length === 0) {
    return null;
  }

  return parsed.data.map(normalizeRow);
}

/**
 * Attach Company and Location to each record by name. Input order and
 * count are preserved; unmatched records get the sentinel for both.
 */
export function mergeEnhancements(
  records: readonly ExtractedRecord[],
  rows: readonly EnhancementRow[]
): ExtractedRecord[] {
  const byName = new Map<string, EnhancementRow>();
  for (const row of rows) {
    byName.set(row.Name.trim(), row);
  }

  return records.map(record => {
    const match = byName.get(record.Name.trim());
    return {
      ...record,
      Company: match ? match.Company : SENTINEL,
      Location: match ? match.Location : SENTINEL,
      ExtractionMethod: 'traditional+ai' as const,
      Confidence: AI_CONFIDENCE,
    };
  });
}
