/**
 * Transcription Client
 *
 * Posts the PCM WAV to a speech-to-text recognize endpoint and reads the
 * transcript out of the JSON reply. Transcription is best effort: callers go
 * through {@link transcribeOrEmpty}, which turns every failure into an empty
 * transcript.
 */

import { z } from 'zod';
import { base64Encode } from '../encoding/base64.js';
import type { Logger } from '../logger.js';
import { TranscriptionError } from '../types/errors.js';
import { throttle } from './throttle.js';

/** Basic-auth username; the API key is the password */
export const TRANSCRIBE_USERNAME = 'apikey';

export interface Transcriber {
  /**
   * @throws TranscriptionError on any failure
   */
  transcribe(wav: Buffer): Promise<string>;
}

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface SpeechToTextClientOptions {
  apiKey: string;
  /** Acoustic model name */
  model: string;
  /** Recognize endpoint */
  url: string;
  /** Upload ceiling in bytes per second; 0 for none */
  rateLimit: number;
  fetch?: FetchLike;
  sleep?: (ms: number) => Promise<unknown>;
}

const AlternativeSchema = z.object({
  transcript: z.string().optional(),
  confidence: z.number().optional(),
});

const RecognizeResponseSchema = z.object({
  results: z.array(
    z.object({
      alternatives: z.array(AlternativeSchema).default([]),
      final: z.boolean().optional(),
    })
  ).default([]),
  result_index: z.number().optional(),
});

export type RecognizeResponse = z.infer<typeof RecognizeResponseSchema>;

/**
 * Pulls the transcript out of a recognize response
 *
 * Takes the top alternative of every result, verbatim, one per line.
 *
 * @param payload - Parsed JSON body
 * @throws TranscriptionError if the body has the wrong shape or no transcript
 */
export function extractTranscript(payload: unknown): string {
  const parsed = RecognizeResponseSchema.safeParse(payload);
  if (!parsed.success) {
    throw new TranscriptionError(`Unexpected response shape: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
  }

  const transcripts = parsed.data.results
    .map(result => result.alternatives[0]?.transcript)
    .filter((text): text is string => text !== undefined);

  if (transcripts.length === 0) {
    throw new TranscriptionError('Response contains no transcript');
  }
  return transcripts.join('\n');
}

/**
 * HTTP client for a speech-to-text recognize endpoint
 */
export class SpeechToTextClient implements Transcriber {
  private readonly apiKey: string;
  private readonly model: string;
  private readonly url: string;
  private readonly rateLimit: number;
  private readonly fetch: FetchLike;
  private readonly sleep?: (ms: number) => Promise<unknown>;

  constructor(options: SpeechToTextClientOptions) {
    this.apiKey = options.apiKey;
    this.model = options.model;
    this.url = options.url;
    this.rateLimit = options.rateLimit;
    this.fetch = options.fetch ?? ((input, init) => fetch(input, init));
    this.sleep = options.sleep;
  }

  /**
   * Endpoint with continuous recognition and the model selected
   */
  requestUrl(): string {
    const url = new URL(this.url);
    url.searchParams.set('continuous', 'true');
    url.searchParams.set('model', this.model);
    return url.toString();
  }

  async transcribe(wav: Buffer): Promise<string> {
    let response: Response;
    try {
      response = await this.fetch(this.requestUrl(), {
        method: 'POST',
        headers: {
          'Authorization': `Basic ${base64Encode(`${TRANSCRIBE_USERNAME}:${this.apiKey}`)}`,
          'Content-Type': 'audio/wav',
        },
        body: throttle(wav, this.rateLimit, { sleep: this.sleep }),
        duplex: 'half',
      });
    } catch (err) {
      throw new TranscriptionError(
        `Speech-to-text request failed: ${err instanceof Error ? err.message : String(err)}`,
        undefined,
        err
      );
    }

    if (!response.ok) {
      const body = await response.text().catch(() => '');
      throw new TranscriptionError(
        `Speech-to-text returned ${response.status}${body ? `: ${body.slice(0, 200)}` : ''}`,
        response.status
      );
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (err) {
      throw new TranscriptionError('Speech-to-text response is not JSON', response.status, err);
    }
    return extractTranscript(payload);
  }
}

/**
 * Runs a transcription, downgrading any failure to an empty transcript
 *
 * @param transcriber - Client to use
 * @param wav - Linear-PCM WAV bytes
 * @param logger - Receives a warning when transcription fails
 */
export async function transcribeOrEmpty(transcriber: Transcriber, wav: Buffer, logger: Logger): Promise<string> {
  try {
    const transcript = await transcriber.transcribe(wav);
    logger.debug('Transcription received', { characters: transcript.length });
    return transcript;
  } catch (err) {
    const status = err instanceof TranscriptionError ? err.status : undefined;
    logger.warn('Transcription failed, continuing without transcript', {
      error: err instanceof Error ? err.message : String(err),
      ...(status !== undefined && { status }),
    });
    return '';
  }
}
