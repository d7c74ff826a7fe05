/**
 * Dispatcher
 *
 * One message in, one message out. The conversion itself is pure apart from
 * the codec and transcriber it is given; {@link dispatch} adds stdin, the
 * workspace and the mail sink around it.
 */

import { convertAudio, type AudioCodec } from './audio/codec.js';
import { WAVE_FORMAT_PCM } from './audio/wav.js';
import { silentLogger, type Logger } from './logger.js';
import { assembleMessage } from './mime/assembler.js';
import { decodeAttachmentBody, hasAudioAttachment, splitAttachment } from './mime/attachment.js';
import { findBoundary } from './mime/boundary.js';
import { rewriteAttachmentHead } from './mime/header-rewriter.js';
import { voicemailLayout } from './mime/layout.js';
import { splitSegments } from './mime/splitter.js';
import type { MailSink } from './sink/sink.js';
import { transcribeOrEmpty, type Transcriber } from './transcription/client.js';
import { StructuralError } from './types/errors.js';
import type { ConversionResult, TranscriptPlacement } from './types/message.js';
import { withWorkspace, type Workspace } from './workspace.js';

export interface ConvertOptions {
  codec: AudioCodec;
  /** Omit to skip transcription */
  transcriber?: Transcriber;
  placement?: TranscriptPlacement;
  logger?: Logger;
}

/**
 * Converts a voicemail notification, or returns it untouched when it has no
 * audio attachment
 *
 * @param raw - Complete input message
 * @param options - Collaborators
 * @throws StructuralError, DecodeError, AudioFormatError, CodecError
 */
export async function convertMessage(raw: Buffer, options: ConvertOptions): Promise<ConversionResult> {
  const logger = options.logger ?? silentLogger;

  const boundary = findBoundary(raw);
  const segments = splitSegments(raw, boundary);
  logger.debug('Split message', { boundary: boundary ?? null, segments: segments.length, bytes: raw.length });

  if (!hasAudioAttachment(segments)) {
    logger.info('No audio attachment, forwarding message unchanged');
    return { message: raw, converted: false, transcript: '' };
  }

  if (!boundary) {
    throw new StructuralError('Message declares no multipart boundary', segments.length);
  }

  const layout = voicemailLayout(segments);
  const { head, body } = splitAttachment(layout.attachment);
  const wav = decodeAttachmentBody(body);

  const audio = await convertAudio(options.codec, wav);
  logger.debug('Audio converted', {
    format: audio.format.formatName,
    alreadyPcm: audio.format.formatTag === WAVE_FORMAT_PCM,
    channels: audio.format.channels,
    sampleRate: audio.format.sampleRate,
    wavBytes: wav.length,
    pcmBytes: audio.pcm.length,
    mp3Bytes: audio.mp3.length,
  });

  const transcript = options.transcriber
    ? await transcribeOrEmpty(options.transcriber, audio.pcm, logger)
    : '';

  const message = assembleMessage({
    layout,
    head: rewriteAttachmentHead(head),
    audio: audio.mp3,
    transcript,
    placement: options.placement,
  });

  logger.info('Voicemail attachment converted to MP3', {
    mp3Bytes: audio.mp3.length,
    transcript: transcript.length > 0,
  });
  return { message, converted: true, transcript };
}

/**
 * Reads a stream to the end
 */
export async function readAll(input: AsyncIterable<Buffer | Uint8Array | string>): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of input) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'latin1') : Buffer.from(chunk));
  }
  return Buffer.concat(chunks);
}

export interface DispatchOptions {
  /** Source of the raw message, usually process.stdin */
  input: AsyncIterable<Buffer | Uint8Array | string>;
  sink: MailSink;
  /** Builds the codec for this invocation's workspace */
  createCodec: (workspace: Workspace) => AudioCodec;
  transcriber?: Transcriber;
  placement?: TranscriptPlacement;
  /** Parent of the workspace directory */
  tmpDir?: string;
  logger?: Logger;
}

/**
 * Processes one message from input to sink
 *
 * The workspace is removed on every path. Nothing reaches the sink unless
 * the whole message was built.
 *
 * @returns The conversion outcome once the sink has accepted the message
 * @throws Any fatal pipeline error, or SinkError
 */
export async function dispatch(options: DispatchOptions): Promise<ConversionResult> {
  const logger = options.logger ?? silentLogger;

  return withWorkspace(options.tmpDir, async (workspace) => {
    logger.debug('Workspace created', { path: workspace.path });

    const raw = await readAll(options.input);
    const result = await convertMessage(raw, {
      codec: options.createCodec(workspace),
      transcriber: options.transcriber,
      placement: options.placement,
      logger,
    });

    await options.sink.send(result.message);
    logger.debug('Message handed to sink', { sink: options.sink.description, bytes: result.message.length });
    return result;
  });
}
