/**
 * Error types for vm2mp3
 */

/**
 * Pipeline stage an error was raised in
 */
export type ErrorStage =
  | 'structure'
  | 'decode'
  | 'audio'
  | 'codec'
  | 'transcription'
  | 'sink'
  | 'config';

/**
 * Base voicemail conversion error class
 */
export class VoicemailError extends Error {
  /** Error code */
  code: string;
  /** Pipeline stage */
  stage: ErrorStage;

  constructor(message: string, code: string, stage: ErrorStage, cause?: unknown) {
    super(message);
    this.name = 'VoicemailError';
    this.code = code;
    this.stage = stage;
    if (cause !== undefined) {
      this.cause = cause;
    }
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * The message does not have the multipart layout a voicemail notification has
 * (no boundary, too few segments, malformed attachment head)
 */
export class StructuralError extends VoicemailError {
  override stage: 'structure' = 'structure';
  /** Number of segments the message split into, when known */
  segmentCount?: number;

  constructor(message: string, segmentCount?: number) {
    super(message, 'STRUCTURE_ERROR', 'structure');
    this.name = 'StructuralError';
    this.segmentCount = segmentCount;
  }
}

/**
 * The attachment body is not valid base64
 */
export class DecodeError extends VoicemailError {
  override stage: 'decode' = 'decode';

  constructor(message: string) {
    super(message, 'DECODE_ERROR', 'decode');
    this.name = 'DecodeError';
  }
}

/**
 * The decoded attachment is not a RIFF/WAVE container
 */
export class AudioFormatError extends VoicemailError {
  override stage: 'audio' = 'audio';

  constructor(message: string) {
    super(message, 'AUDIO_FORMAT_ERROR', 'audio');
    this.name = 'AudioFormatError';
  }
}

/**
 * An external codec exited abnormally or produced no output
 */
export class CodecError extends VoicemailError {
  override stage: 'codec' = 'codec';
  /** Command that was run */
  command: string;
  /** Exit code, null when the process never started or was killed */
  exitCode: number | null;
  /** Captured stderr of the process */
  stderr: string;

  constructor(message: string, command: string, exitCode: number | null, stderr = '', cause?: unknown) {
    super(message, 'CODEC_ERROR', 'codec', cause);
    this.name = 'CodecError';
    this.command = command;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

/**
 * The speech-to-text request failed. Never fatal: callers downgrade it to an
 * empty transcript.
 */
export class TranscriptionError extends VoicemailError {
  override stage: 'transcription' = 'transcription';
  /** HTTP status, when a response was received */
  status?: number;

  constructor(message: string, status?: number, cause?: unknown) {
    super(message, 'TRANSCRIPTION_ERROR', 'transcription', cause);
    this.name = 'TranscriptionError';
    this.status = status;
  }
}

/**
 * The mail sink could not be started or did not accept the message
 */
export class SinkError extends VoicemailError {
  override stage: 'sink' = 'sink';
  /** Sink command */
  command: string;
  /** Exit code, null when the process never started or was killed */
  exitCode: number | null;

  constructor(message: string, command: string, exitCode: number | null, cause?: unknown) {
    super(message, 'SINK_ERROR', 'sink', cause);
    this.name = 'SinkError';
    this.command = command;
    this.exitCode = exitCode;
  }
}

/**
 * Invalid configuration value
 */
export class ConfigError extends VoicemailError {
  override stage: 'config' = 'config';
  /** Offending setting names */
  keys: string[];

  constructor(message: string, keys: string[] = []) {
    super(message, 'CONFIG_ERROR', 'config');
    this.name = 'ConfigError';
    this.keys = keys;
  }
}
