import iconv from 'iconv-lite';

export type TransferEncoding = 'base64' | 'quoted-printable' | '7bit' | '8bit' | 'binary';

const KNOWN_ENCODINGS: readonly TransferEncoding[] = [
  'base64',
  'quoted-printable',
  '7bit',
  '8bit',
  'binary',
];

export function parseTransferEncoding(value: string | undefined): TransferEncoding {
  const normalized = (value ?? '').trim().toLowerCase();
  const match = KNOWN_ENCODINGS.find(encoding => encoding === normalized);
  return match ?? '7bit';
}

export function decodeQuotedPrintable(body: string): Buffer {
  // Soft line breaks join physical lines into one logical line
  const joined = body.replace(/=\r?\n/g, '');
  const bytes: number[] = [];

  for (let i = 0; i < joined.length; i++) {
    const char = joined[i];
    if (char === '=' && /^[0-9A-Fa-f]{2}$/.test(joined.slice(i + 1, i + 3))) {
      bytes.push(parseInt(joined.slice(i + 1, i + 3), 16));
      i += 2;
    } else {
      bytes.push(joined.charCodeAt(i) & 0xff);
    }
  }

  return Buffer.from(bytes);
}

/**
 * Decode a part body into raw bytes. The body is a binary string where
 * each char holds one byte of the original file.
 */
export function decodeTransferEncoding(body: string, encoding: TransferEncoding): Buffer {
  switch (encoding) {
    case 'base64':
      return Buffer.from(body.replace(/\s+/g, ''), 'base64');
    case 'quoted-printable':
      return decodeQuotedPrintable(body);
    default:
      return Buffer.from(body, 'latin1');
  }
}

export type TextDecoding = 'utf-8' | 'latin1';

export interface DecodedText {
  text: string;
  encoding: TextDecoding;
}

export function decodeText(bytes: Buffer): DecodedText {
  try {
    const text = new TextDecoder('utf-8', { fatal: true }).decode(bytes);
    return { text, encoding: 'utf-8' };
  } catch {
    // Not valid UTF-8: every byte sequence is valid Latin-1
    return { text: iconv.decode(bytes, 'latin1'), encoding: 'latin1' };
  }
}
