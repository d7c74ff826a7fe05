/**
 * Attachment Extractor
 *
 * Decides whether a notification carries audio and separates the audio
 * part into its six-line head and its base64 body.
 *
 * @packageDocumentation
 */

import { base64Decode } from '../encoding/base64.js';
import { isBlankLine, splitLines, toLf } from '../encoding/line-endings.js';
import { DecodeError, StructuralError } from '../types/errors.js';
import type { AttachmentParts, Segment } from '../types/message.js';
import { markerSegment } from './layout.js';

/** Delimiter line, Content-Type, Content-Transfer-Encoding, Content-Description, Content-Disposition, blank */
export const ATTACHMENT_HEAD_LINES = 6;

const PLAIN_MARKER = Buffer.from('plain', 'latin1');

/**
 * Whether the message should go through the audio pipeline
 *
 * A `plain` marker in the designated segment means the notification was sent
 * without audio and must be forwarded untouched.
 *
 * @param segments - Splitter output
 */
export function hasAudioAttachment(segments: readonly Segment[]): boolean {
  return markerSegment(segments).bytes.indexOf(PLAIN_MARKER) === -1;
}

/**
 * Splits the attachment segment into head and body
 *
 * @param attachment - Segment bytes, starting at the delimiter line
 * @throws StructuralError if the head is not exactly six lines followed by a body
 */
export function splitAttachment(attachment: Buffer): AttachmentParts {
  const lines = splitLines(attachment);

  if (lines.length <= ATTACHMENT_HEAD_LINES) {
    throw new StructuralError(
      `Attachment part has ${lines.length} lines, expected a ${ATTACHMENT_HEAD_LINES}-line head and a body`
    );
  }

  const headLines = lines.slice(0, ATTACHMENT_HEAD_LINES);
  const earlyBlank = headLines.slice(0, -1).findIndex(isBlankLine);
  if (earlyBlank !== -1) {
    throw new StructuralError(
      `Attachment head ends at line ${earlyBlank + 1}, expected ${ATTACHMENT_HEAD_LINES} lines`
    );
  }
  if (!isBlankLine(headLines[ATTACHMENT_HEAD_LINES - 1])) {
    throw new StructuralError(
      `Attachment head is longer than ${ATTACHMENT_HEAD_LINES} lines`
    );
  }

  const headLength = headLines.reduce((sum, line) => sum + line.length, 0);
  return {
    head: attachment.subarray(0, headLength),
    body: attachment.subarray(headLength),
  };
}

/**
 * Decodes the attachment body
 *
 * @param body - Base64 lines (CRLF or LF)
 * @returns Raw attachment bytes
 * @throws DecodeError if the payload is not valid base64 or is empty
 */
export function decodeAttachmentBody(body: Buffer): Buffer {
  const text = toLf(body).toString('latin1');
  const decoded = base64Decode(text);
  if (decoded.length === 0) {
    throw new DecodeError('Attachment body is empty');
  }
  return decoded;
}
