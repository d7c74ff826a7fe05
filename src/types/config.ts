/**
 * Configuration types for vm2mp3
 */

import type { TranscriptPlacement } from './message.js';

/**
 * Speech-to-text settings
 */
export interface TranscriptionSettings {
  /** Gates the transcription client */
  enabled: boolean;
  /** Password for basic authentication (username is fixed) */
  apiKey?: string;
  /** Acoustic model name passed as the `model` query parameter */
  model: string;
  /** Recognition endpoint */
  url: string;
  /** Upload ceiling in bytes per second; 0 for none */
  rateLimit: number;
  placement: TranscriptPlacement;
}

/**
 * External codec executables
 */
export interface CodecSettings {
  soxPath: string;
  lamePath: string;
}

/**
 * Mail sink command line
 */
export interface SinkSettings {
  command: string;
  args: string[];
}

/**
 * Settings for one invocation
 */
export interface Settings {
  transcription: TranscriptionSettings;
  codec: CodecSettings;
  sink: SinkSettings;
  /** Parent directory for the per-invocation workspace */
  tmpDir: string;
  /** Enables diagnostic output only */
  debug: boolean;
}
