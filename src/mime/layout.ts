/**
 * Fixed segment positions of a voicemail notification
 *
 * The notification layout is positional: headers, the boundary-declaring
 * header onward, the text part, the audio part and the closing delimiter.
 * All index arithmetic lives here.
 *
 * @packageDocumentation
 */

import { StructuralError } from '../types/errors.js';
import type { Segment, SegmentLayout } from '../types/message.js';

export const SEGMENT = {
  PREAMBLE: 0,
  ENVELOPE: 1,
  BODY_TEXT: 2,
  ATTACHMENT: 3,
  TRAILER: 4,
} as const;

/** Minimum number of segments a message with an attachment splits into */
export const MIN_ATTACHMENT_SEGMENTS = SEGMENT.TRAILER + 1;

/**
 * Segment inspected for a plain-text marker
 *
 * Segment 1 normally; segment 0 when the message did not split at all.
 */
export function markerSegment(segments: readonly Segment[]): Segment {
  const segment = segments[SEGMENT.ENVELOPE] ?? segments[SEGMENT.PREAMBLE];
  if (!segment) {
    throw new StructuralError('Message produced no segments', 0);
  }
  return segment;
}

/**
 * Maps segments onto their roles
 *
 * Segments past the trailer position are folded into the trailer so that no
 * bytes are lost when the boundary text recurs after the closing delimiter.
 *
 * @param segments - Splitter output
 * @throws StructuralError if there are fewer than five segments
 */
export function voicemailLayout(segments: readonly Segment[]): SegmentLayout {
  if (segments.length < MIN_ATTACHMENT_SEGMENTS) {
    throw new StructuralError(
      `Expected at least ${MIN_ATTACHMENT_SEGMENTS} segments, message has ${segments.length}`,
      segments.length
    );
  }

  return {
    preamble: segments[SEGMENT.PREAMBLE].bytes,
    envelope: segments[SEGMENT.ENVELOPE].bytes,
    bodyText: segments[SEGMENT.BODY_TEXT].bytes,
    attachment: segments[SEGMENT.ATTACHMENT].bytes,
    trailer: Buffer.concat(segments.slice(SEGMENT.TRAILER).map(s => s.bytes)),
  };
}
