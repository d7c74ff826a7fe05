/**
 * Base64 encoding/decoding using Node.js Buffer
 *
 * MIME attachment payloads arrive as line-wrapped base64 and leave the same
 * way, so both directions deal with line breaks explicitly.
 */

import { DecodeError } from '../types/errors.js';

/** Line width of the wrapped output, matching coreutils `base64` */
export const BASE64_LINE_WIDTH = 76;

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

/**
 * Encodes a string or Buffer to base64
 *
 * @param data - The data to encode (string or Buffer)
 * @returns Base64 encoded string without line breaks
 */
export function base64Encode(data: string | Buffer): string {
  const buffer = typeof data === 'string' ? Buffer.from(data, 'utf-8') : data;
  return buffer.toString('base64');
}

/**
 * Encodes binary data as base64 wrapped into fixed-width lines
 *
 * Every line, including the last, ends with `eol`. Empty input gives an
 * empty string.
 *
 * @param data - The data to encode
 * @param width - Characters per line
 * @param eol - Line terminator
 */
export function base64EncodeLines(data: Buffer, width: number = BASE64_LINE_WIDTH, eol: string = '\r\n'): string {
  const encoded = data.toString('base64');
  if (encoded.length === 0) return '';

  const lines: string[] = [];
  for (let i = 0; i < encoded.length; i += width) {
    lines.push(encoded.slice(i, i + width));
  }
  return lines.join(eol) + eol;
}

/**
 * Checks whether a string (line breaks allowed) is well-formed base64
 *
 * @param encoded - Candidate base64 text
 */
export function isBase64(encoded: string): boolean {
  const cleaned = encoded.replace(/\r?\n/g, '');
  return cleaned.length % 4 === 0 && BASE64_PATTERN.test(cleaned);
}

/**
 * Decodes line-wrapped base64 to a Buffer
 *
 * Unlike `Buffer.from(..., 'base64')`, which skips anything it does not
 * understand, this rejects characters outside the alphabet and bad padding.
 *
 * @param encoded - The base64 encoded string
 * @returns Decoded Buffer
 * @throws DecodeError if the text is not valid base64
 */
export function base64Decode(encoded: string): Buffer {
  const cleaned = encoded.replace(/\r?\n/g, '');
  if (!isBase64(cleaned)) {
    throw new DecodeError(
      `Invalid base64 payload (${cleaned.length} characters after removing line breaks)`
    );
  }
  return Buffer.from(cleaned, 'base64');
}
