import { describe, test, expect } from '@jest/globals';
import {
  ArchiveReadError,
  ConfigurationError,
  ErrorCode,
  ExtractorError,
  TextGenerationError,
  toErrorMessage,
} from '../../../src/core/errors';

describe('errors', () => {
  test('ArchiveReadError carries its code and the file path', () => {
    const error = new ArchiveReadError('ENOENT', '/tmp/feed.mhtml');

    expect(error).toBeInstanceOf(ExtractorError);
    expect(error.code).toBe(ErrorCode.ArchiveReadFailed);
    expect(error.name).toBe('ArchiveReadError');
    expect(error.message).toBe('Archive read failed: ENOENT (file: /tmp/feed.mhtml)');
  });

  test('TextGenerationError includes the status code when given', () => {
    expect(new TextGenerationError('Unauthorized', 401).message).toBe(
      'Text generation failed: Unauthorized (status: 401)'
    );
    expect(new TextGenerationError('Empty completion').message).toBe(
      'Text generation failed: Empty completion'
    );
  });

  test('toErrorMessage normalizes unknown throwables', () => {
    expect(toErrorMessage(new ConfigurationError('missing key'))).toBe(
      'Configuration error: missing key'
    );
    expect(toErrorMessage('boom', 'Processing')).toBe('Processing: Unknown error occurred');
  });
});
