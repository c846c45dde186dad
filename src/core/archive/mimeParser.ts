import { parseTransferEncoding, type TransferEncoding } from './transferEncoding';

export interface ContentType {
  mediaType: string;
  params: Record<string, string>;
}

export interface MimePart {
  headers: Map<string, string>;
  contentType: ContentType;
  transferEncoding: TransferEncoding;
  /** Raw body as a binary string, one char per byte */
  body: string;
  children: MimePart[];
}

const DEFAULT_CONTENT_TYPE: ContentType = { mediaType: 'text/plain', params: {} };

// Nested multiparts beyond this depth are treated as opaque bodies
const MAX_DEPTH = 16;

function splitHeadersAndBody(raw: string): { headerBlock: string; body: string } {
  const match = /\r?\n\r?\n/.exec(raw);
  if (!match) {
    return { headerBlock: raw, body: '' };
  }
  return {
    headerBlock: raw.slice(0, match.index),
    body: raw.slice(match.index + match[0].length),
  };
}

export function parseHeaders(headerBlock: string): Map<string, string> {
  const headers = new Map<string, string>();
  // Continuation lines start with whitespace
  const unfolded = headerBlock.replace(/\r?\n[ \t]+/g, ' ');

  for (const line of unfolded.split(/\r?\n/)) {
    const colon = line.indexOf(':');
    if (colon <= 0) continue;

    const name = line.slice(0, colon).trim().toLowerCase();
    // First occurrence wins
    if (!headers.has(name)) {
      headers.set(name, line.slice(colon + 1).trim());
    }
  }

  return headers;
}

export function parseContentType(value: string | undefined): ContentType {
  if (!value) {
    return DEFAULT_CONTENT_TYPE;
  }

  const [typePart, ...paramParts] = splitOutsideQuotes(value, ';');
  const mediaType = typePart.trim().toLowerCase();
  if (!mediaType.includes('/')) {
    return DEFAULT_CONTENT_TYPE;
  }

  const params: Record<string, string> = {};
  for (const part of paramParts) {
    const eq = part.indexOf('=');
    if (eq <= 0) continue;

    const key = part.slice(0, eq).trim().toLowerCase();
    let paramValue = part.slice(eq + 1).trim();
    if (paramValue.startsWith('"') && paramValue.endsWith('"') && paramValue.length >= 2) {
      paramValue = paramValue.slice(1, -1).replace(/\\(.)/g, '$1');
    }
    params[key] = paramValue;
  }

  return { mediaType, params };
}

function splitOutsideQuotes(value: string, separator: string): string[] {
  const parts: string[] = [];
  let current = '';
  let inQuotes = false;

  for (let i = 0; i < value.length; i++) {
    const char = value[i];
    if (char === '\\' && inQuotes && i + 1 < value.length) {
      current += char + value[i + 1];
      i++;
    } else if (char === '"') {
      inQuotes = !inQuotes;
      current += char;
    } else if (char === separator && !inQuotes) {
      parts.push(current);
      current = '';
    } else {
      current += char;
    }
  }
  parts.push(current);

  return parts;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Split a multipart body into raw part strings. Text before the first
 * delimiter and after the closing delimiter is ignored.
 */
export function splitMultipartBody(body: string, boundary: string): string[] {
  const delimiter = new RegExp(`(?:^|\\r?\\n)--${escapeRegExp(boundary)}(--)?[ \\t]*(?:\\r?\\n|$)`, 'g');
  const parts: string[] = [];
  let partStart: number | null = null;

  for (const match of body.matchAll(delimiter)) {
    const index = match.index ?? 0;
    if (partStart !== null) {
      parts.push(body.slice(partStart, index));
    }
    if (match[1] === '--') {
      return parts;
    }
    partStart = index + match[0].length;
  }

  // Truncated archive without a closing delimiter
  if (partStart !== null && partStart < body.length) {
    parts.push(body.slice(partStart));
  }

  return parts;
}

export function parseMimeEntity(raw: string, depth = 0): MimePart {
  const { headerBlock, body } = splitHeadersAndBody(raw);
  const headers = parseHeaders(headerBlock);
  const contentType = parseContentType(headers.get('content-type'));
  const transferEncoding = parseTransferEncoding(headers.get('content-transfer-encoding'));

  const boundary = contentType.params.boundary;
  const children =
    contentType.mediaType.startsWith('multipart/') && boundary && depth < MAX_DEPTH
      ? splitMultipartBody(body, boundary).map(part => parseMimeEntity(part, depth + 1))
      : [];

  return { headers, contentType, transferEncoding, body, children };
}

/**
 * Depth-first, document-order traversal of every part, the root included.
 */
export function* walkParts(part: MimePart): Generator<MimePart> {
  yield part;
  for (const child of part.children) {
    yield* walkParts(child);
  }
}
