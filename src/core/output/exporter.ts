import Papa from 'papaparse';
import { SENTINEL } from '../../config/constants';
import type { ExtractedRecord } from '../extraction/types/records';

export const EXPORT_COLUMNS = ['Name', 'Title', 'Period', 'Details', 'Company', 'Location'] as const;

export type ExportColumn = (typeof EXPORT_COLUMNS)[number];

export type ExportRow = Record<ExportColumn, string>;

export type ExportFormat = 'csv' | 'json';

/**
 * Fixed export column set. Company and Location fall back to the sentinel
 * here, never on the records themselves.
 */
export function toExportRows(records: readonly ExtractedRecord[]): ExportRow[] {
  return records.map(record => ({
    Name: record.Name,
    Title: record.Title,
    Period: record.Period,
    Details: record.Details,
    Company: record.Company ?? SENTINEL,
    Location: record.Location ?? SENTINEL,
  }));
}

export function toCsv(records: readonly ExtractedRecord[]): string {
  return Papa.unparse(
    { fields: [...EXPORT_COLUMNS], data: toExportRows(records) },
    { newline: '\n' }
  );
}

export function toJson(records: readonly ExtractedRecord[]): string {
  return JSON.stringify(toExportRows(records), null, 2);
}

export function exportRecords(records: readonly ExtractedRecord[], format: ExportFormat): string {
  return format === 'csv' ? toCsv(records) : toJson(records);
}
