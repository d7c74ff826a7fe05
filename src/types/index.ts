/**
 * Type exports for vm2mp3
 */

// Configuration types
export type { Settings, TranscriptionSettings, CodecSettings, SinkSettings } from './config.js';

// Message types
export type {
  Segment,
  SegmentLayout,
  AttachmentParts,
  TranscriptPlacement,
  AssemblyInput,
  ConversionResult
} from './message.js';

// Error types
export {
  VoicemailError,
  StructuralError,
  DecodeError,
  AudioFormatError,
  CodecError,
  TranscriptionError,
  SinkError,
  ConfigError
} from './errors.js';

export type { ErrorStage } from './errors.js';
