/**
 * Message types for vm2mp3
 */

/**
 * Contiguous byte range of the raw message produced by the splitter
 */
export interface Segment {
  /** Position in split order, starting at 0 */
  index: number;
  /** Byte offset of the first byte in the raw message */
  start: number;
  /** Byte offset one past the last byte */
  end: number;
  /** View onto the raw message bytes (not a copy) */
  bytes: Buffer;
}

/**
 * Named view over the fixed segment positions of a voicemail notification
 */
export interface SegmentLayout {
  /** Segment 0: message headers before the line that declares the boundary */
  preamble: Buffer;
  /** Segment 1: the boundary-declaring header line onward, up to the first delimiter */
  envelope: Buffer;
  /** Segment 2: the text body part */
  bodyText: Buffer;
  /** Segment 3: the audio attachment part */
  attachment: Buffer;
  /** Segment 4 and everything after it */
  trailer: Buffer;
}

/**
 * Attachment part split into its header block and its encoded payload
 */
export interface AttachmentParts {
  /** Delimiter line, four header lines and the blank separator line */
  head: Buffer;
  /** Base64 payload lines */
  body: Buffer;
}

/**
 * Where the transcript banner is written in the assembled message
 */
export type TranscriptPlacement = 'attachment' | 'body';

/**
 * Inputs to the message assembler
 */
export interface AssemblyInput {
  layout: SegmentLayout;
  /** Rewritten attachment head */
  head: Buffer;
  /** MP3 bytes */
  audio: Buffer;
  /** Empty when there is nothing to add */
  transcript: string;
  placement?: TranscriptPlacement;
}

/**
 * Outcome of converting one message
 */
export interface ConversionResult {
  /** Message to hand to the mail sink */
  message: Buffer;
  /** False when the message passed through unchanged */
  converted: boolean;
  /** Transcript text, empty when disabled or unavailable */
  transcript: string;
}
