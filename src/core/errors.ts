export enum ErrorCode {
  ArchiveReadFailed = 'ARCHIVE_READ_FAILED',
  Configuration = 'CONFIGURATION',
  TextGeneration = 'TEXT_GENERATION',
}

export class ExtractorError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ArchiveReadError extends ExtractorError {
  constructor(message: string, filePath?: string) {
    const pathInfo = filePath ? ` (file: ${filePath})` : '';
    super(ErrorCode.ArchiveReadFailed, `Archive read failed: ${message}${pathInfo}`);
  }
}

export class TextGenerationError extends ExtractorError {
  constructor(message: string, statusCode?: number) {
    const statusInfo = statusCode ? ` (status: ${statusCode})` : '';
    super(ErrorCode.TextGeneration, `Text generation failed: ${message}${statusInfo}`);
  }
}

export class ConfigurationError extends ExtractorError {
  constructor(message: string) {
    super(ErrorCode.Configuration, `Configuration error: ${message}`);
  }
}

/**
 * Message for a document-level failure result. Never includes a stack trace.
 */
export function toErrorMessage(error: unknown, context?: string): string {
  const prefix = context ? `${context}: ` : '';

  if (error instanceof Error) {
    return `${prefix}${error.message}`;
  }

  return `${prefix}Unknown error occurred`;
}
