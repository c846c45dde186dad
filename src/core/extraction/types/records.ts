export type ExtractionMethod = 'traditional' | 'ai' | 'traditional+ai';

export type CoreField = 'Name' | 'Title' | 'Period' | 'Details';

export const CORE_FIELDS: readonly CoreField[] = ['Name', 'Title', 'Period', 'Details'];

export interface ExtractedRecord {
  Name: string;
  Title: string;
  Period: string;
  Details: string;
  Company?: string;
  Location?: string;
  /** 1-based position of the post container in the source document */
  PostIndex: number;
  ExtractionMethod: ExtractionMethod;
  /** Present only on AI-derived records */
  Confidence?: number;
}

export interface FieldResult {
  value: string;
  /** Id of the strategy that produced the value, null when the default was used */
  strategyId: string | null;
}

export type FieldResults = Record<CoreField, FieldResult>;
