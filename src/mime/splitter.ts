/**
 * MIME Splitter
 *
 * Cuts the raw message into segments at every line that contains the
 * boundary text. The matching line opens the segment that follows it, so the
 * line declaring the boundary in the headers starts segment 1 and each
 * delimiter line starts the part it introduces.
 *
 * @packageDocumentation
 */

import { splitLines } from '../encoding/line-endings.js';
import type { Segment } from '../types/message.js';

/**
 * Splits a raw message into ordered segments on lines containing `boundary`
 *
 * Segment 0 always exists (it is empty when the first line matches). When
 * the boundary is empty or never occurs, the whole message is segment 0.
 * Concatenating `bytes` of all segments gives back `raw`.
 *
 * @param raw - Raw message
 * @param boundary - Boundary token, matched literally
 * @returns Segments in split order
 */
export function splitSegments(raw: Buffer, boundary: string | undefined): Segment[] {
  if (!boundary) {
    return [makeSegment(raw, 0, 0, raw.length)];
  }

  const token = Buffer.from(boundary, 'latin1');
  const segments: Segment[] = [];
  let segmentStart = 0;
  let offset = 0;

  for (const line of splitLines(raw)) {
    if (line.indexOf(token) !== -1) {
      segments.push(makeSegment(raw, segments.length, segmentStart, offset));
      segmentStart = offset;
    }
    offset += line.length;
  }

  segments.push(makeSegment(raw, segments.length, segmentStart, raw.length));
  return segments;
}

/**
 * Concatenates segments back into one buffer
 */
export function joinSegments(segments: readonly Segment[]): Buffer {
  return Buffer.concat(segments.map(s => s.bytes));
}

function makeSegment(raw: Buffer, index: number, start: number, end: number): Segment {
  return { index, start, end, bytes: raw.subarray(start, end) };
}
