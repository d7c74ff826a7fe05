/**
 * MIME Module
 *
 * Provides the byte-level message surgery:
 * - Boundary lookup in the top-level headers
 * - Splitting into positional segments
 * - Attachment head/body separation and header rewriting
 * - Reassembly with per-section line endings
 *
 * @packageDocumentation
 */

export { findBoundary, extractBoundary, unfoldHeaders, headerBlock } from './boundary.js';
export { splitSegments, joinSegments } from './splitter.js';
export { SEGMENT, MIN_ATTACHMENT_SEGMENTS, markerSegment, voicemailLayout } from './layout.js';
export {
  ATTACHMENT_HEAD_LINES,
  hasAudioAttachment,
  splitAttachment,
  decodeAttachmentBody,
} from './attachment.js';
export { rewriteHeaderLine, rewriteAttachmentHead } from './header-rewriter.js';
export { TRANSCRIPT_SEPARATOR, transcriptBanner, assembleMessage } from './assembler.js';
