import { readFile } from 'fs/promises';
import { parseMimeEntity, walkParts } from './mimeParser';
import { decodeText, decodeTransferEncoding } from './transferEncoding';
import { ArchiveReadError } from '../errors';
import { createChildLogger, generateCorrelationId } from '../../utils/logger';

export type ArchiveReadResult =
  | { status: 'ok'; html: string; partCount: number; encoding: 'utf-8' | 'latin1' }
  | { status: 'no_content'; partCount: number };

export interface ArchiveReadOptions {
  correlationId?: string;
}

/**
 * Locate the first text/html part of an MHTML snapshot and decode it.
 * A missing HTML part is reported as `no_content`, never thrown.
 */
export function decodeArchive(
  source: Buffer | string,
  options: ArchiveReadOptions = {}
): ArchiveReadResult {
  const log = createChildLogger(options.correlationId ?? generateCorrelationId());
  // Text arrives as UTF-8 bytes; the parser works on one char per byte
  const bytes = typeof source === 'string' ? Buffer.from(source, 'utf-8') : source;
  const raw = bytes.toString('latin1');

  const root = parseMimeEntity(raw);
  const parts = [...walkParts(root)];

  log.debug(
    { event: 'archive_parsed', partCount: parts.length, rootType: root.contentType.mediaType },
    'Parsed archive container'
  );

  for (const [index, part] of parts.entries()) {
    if (part.contentType.mediaType !== 'text/html') continue;

    try {
      const bytes = decodeTransferEncoding(part.body, part.transferEncoding);
      if (bytes.length === 0) {
        log.debug({ event: 'html_part_empty', partIndex: index }, 'Skipping empty HTML part');
        continue;
      }

      const { text, encoding } = decodeText(bytes);
      log.info(
        {
          event: 'html_part_found',
          partIndex: index,
          transferEncoding: part.transferEncoding,
          encoding,
          htmlLength: text.length,
        },
        'Decoded HTML part'
      );
      return { status: 'ok', html: text, partCount: parts.length, encoding };
    } catch (error) {
      log.warn(
        {
          event: 'html_part_decode_failed',
          partIndex: index,
          error: error instanceof Error ? error.message : 'Unknown error',
        },
        'Error decoding HTML part, trying next candidate'
      );
    }
  }

  log.warn({ event: 'no_html_part', partCount: parts.length }, 'No HTML part found in archive');
  return { status: 'no_content', partCount: parts.length };
}

export async function readArchiveFile(
  filePath: string,
  options: ArchiveReadOptions = {}
): Promise<ArchiveReadResult> {
  let buffer: Buffer;
  try {
    buffer = await readFile(filePath);
  } catch (error) {
    throw new ArchiveReadError(
      error instanceof Error ? error.message : 'Unknown error',
      filePath
    );
  }

  return decodeArchive(buffer, options);
}
