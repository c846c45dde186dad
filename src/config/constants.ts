import { PACKAGE_VERSION } from '../utils/version';

export const APP_NAME = 'feed-post-extractor';
export const APP_VERSION = PACKAGE_VERSION;

export const USER_AGENT = `${APP_NAME}/${APP_VERSION}`;

// Placeholder written into any field no strategy could fill
export const SENTINEL = 'N/A';

export const TITLE_SENTINEL = 'No title found';

export const MIN_FIELD_LENGTH = 1;

// Post bodies shorter than this are usually buttons or counters
export const MIN_DETAILS_LENGTH = 10;

export const AI_CONFIDENCE = 0.9;

export const TABLE_COLUMN_CAPS = {
  Name: 30,
  Title: 60,
  Period: 15,
  Details: 50,
} as const;

export const COMMON_WORD_MIN_LENGTH = 4;

export const QUALITY_THRESHOLDS = {
  HIGH: 80,
  MODERATE: 60,
} as const;

export const EMPTY_TABLE_MESSAGE = 'No data to display';

export const NO_DATA_ERROR = 'No data to analyze';
