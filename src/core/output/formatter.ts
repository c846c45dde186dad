import { EMPTY_TABLE_MESSAGE, TABLE_COLUMN_CAPS } from '../../config/constants';
import type { ExtractedRecord } from '../extraction/types/records';

type TableColumn = keyof typeof TABLE_COLUMN_CAPS;

const TABLE_COLUMNS: readonly TableColumn[] = ['Name', 'Title', 'Period', 'Details'];

const COLUMN_PADDING = 2;

// Lengths and cuts are in code points so emoji are never split
const codePointLength = (value: string): number => [...value].length;

const truncate = (value: string, max: number): string => [...value].slice(0, max).join('');

// One record per line: line breaks inside a value become spaces
const toCell = (value: string | undefined): string => (value ?? '').replace(/\r\n|\r|\n/g, ' ');

const padRight = (value: string, width: number): string =>
  value + ' '.repeat(Math.max(0, width - codePointLength(value)));

export function computeColumnWidths(
  records: readonly ExtractedRecord[]
): Record<TableColumn, number> {
  const widthOf = (column: TableColumn): number => {
    const longest = Math.max(...records.map(record => codePointLength(toCell(record[column]))));
    return Math.min(TABLE_COLUMN_CAPS[column], longest + COLUMN_PADDING);
  };

  return {
    Name: widthOf('Name'),
    Title: widthOf('Title'),
    Period: widthOf('Period'),
    Details: widthOf('Details'),
  };
}

/**
 * Fixed-width table: header, dash rule, one line per record.
 */
export function formatTable(records: readonly ExtractedRecord[]): string {
  if (records.length === 0) {
    return EMPTY_TABLE_MESSAGE;
  }

  const widths = computeColumnWidths(records);

  const header = TABLE_COLUMNS.map(column => padRight(column, widths[column])).join(' | ');
  const separator = '-'.repeat(codePointLength(header));

  const rows = records.map(record =>
    TABLE_COLUMNS.map(column =>
      padRight(truncate(toCell(record[column]), widths[column] - COLUMN_PADDING), widths[column])
    ).join(' | ')
  );

  return [header, separator, ...rows].join('\n');
}
