/**
 * Speech-to-text
 *
 * @packageDocumentation
 */

import type { Logger } from '../logger.js';
import type { TranscriptionSettings } from '../types/config.js';
import { SpeechToTextClient, type FetchLike, type Transcriber } from './client.js';

export {
  SpeechToTextClient,
  extractTranscript,
  transcribeOrEmpty,
  TRANSCRIBE_USERNAME,
} from './client.js';
export type { Transcriber, FetchLike, SpeechToTextClientOptions, RecognizeResponse } from './client.js';
export { throttle } from './throttle.js';
export type { ThrottleOptions } from './throttle.js';

/**
 * Builds the transcriber the settings ask for
 *
 * @returns undefined when transcription is disabled, or enabled without an
 *   API key (logged as a warning)
 */
export function createTranscriber(settings: TranscriptionSettings, logger: Logger, fetch?: FetchLike): Transcriber | undefined {
  if (!settings.enabled) return undefined;

  if (!settings.apiKey) {
    logger.warn('ENABLE_VM_TRANSCRIBE is set but VM_TRANSCRIBE_APIKEY is missing; transcription disabled');
    return undefined;
  }

  logger.debug('Transcription enabled', {
    url: settings.url,
    model: settings.model,
    apiKey: logger.maskApiKey(settings.apiKey),
    rateLimit: settings.rateLimit,
  });

  return new SpeechToTextClient({
    apiKey: settings.apiKey,
    model: settings.model,
    url: settings.url,
    rateLimit: settings.rateLimit,
    fetch,
  });
}
