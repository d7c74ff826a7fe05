/**
 * Header Rewriter
 *
 * Turns the WAV attachment head into an MP3 one by textual substitution.
 *
 * @packageDocumentation
 */

import { splitLines } from '../encoding/line-endings.js';

const PRESERVED_LINE = /^(--|content-transfer-encoding\s*:)/i;

/**
 * Rewrites a single header line
 *
 * `x-wav` becomes `mpeg` and a `.wav` extension becomes `.mp3`, both matched
 * case-insensitively. Delimiter lines and Content-Transfer-Encoding are
 * returned unchanged.
 *
 * @param line - Header line, terminator included or not
 */
export function rewriteHeaderLine(line: string): string {
  if (PRESERVED_LINE.test(line)) return line;
  return line
    .replace(/x-wav/gi, 'mpeg')
    .replace(/\.wav/gi, '.mp3');
}

/**
 * Rewrites the attachment head to declare an MP3 file
 *
 * Bytes are mapped through latin1 so anything other than the substituted
 * tokens is reproduced exactly.
 *
 * @param head - Attachment head bytes
 * @returns New buffer
 */
export function rewriteAttachmentHead(head: Buffer): Buffer {
  const rewritten = splitLines(head).map(line =>
    Buffer.from(rewriteHeaderLine(line.toString('latin1')), 'latin1')
  );
  return Buffer.concat(rewritten);
}
