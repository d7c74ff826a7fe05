/**
 * Shared test fixtures: WAV files, voicemail notifications and in-process
 * stand-ins for the codec and the mail sink.
 */

import type { AudioCodec } from '../../src/audio/codec.js';
import type { MailSink } from '../../src/sink/sink.js';

export interface WavOptions {
  formatTag?: number;
  channels?: number;
  sampleRate?: number;
  bitsPerSample?: number;
  data?: Buffer;
  /** Chunks written before `fmt ` */
  leadingChunks?: Array<[string, Buffer]>;
}

function riffChunk(id: string, payload: Buffer): Buffer {
  const header = Buffer.alloc(8);
  header.write(id, 0, 'latin1');
  header.writeUInt32LE(payload.length, 4);
  const pad = payload.length % 2 === 1 ? Buffer.alloc(1) : Buffer.alloc(0);
  return Buffer.concat([header, payload, pad]);
}

/**
 * Builds a small but well-formed WAV file
 */
export function buildWav(options: WavOptions = {}): Buffer {
  const formatTag = options.formatTag ?? 1;
  const channels = options.channels ?? 1;
  const sampleRate = options.sampleRate ?? 8000;
  const bitsPerSample = options.bitsPerSample ?? 16;
  const blockAlign = (channels * bitsPerSample) / 8;

  const fmt = Buffer.alloc(16);
  fmt.writeUInt16LE(formatTag, 0);
  fmt.writeUInt16LE(channels, 2);
  fmt.writeUInt32LE(sampleRate, 4);
  fmt.writeUInt32LE(sampleRate * blockAlign, 8);
  fmt.writeUInt16LE(blockAlign, 12);
  fmt.writeUInt16LE(bitsPerSample, 14);

  const chunks = [
    ...(options.leadingChunks ?? []).map(([id, payload]) => riffChunk(id, payload)),
    riffChunk('fmt ', fmt),
    riffChunk('data', options.data ?? Buffer.from([0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11])),
  ];
  const body = Buffer.concat([Buffer.from('WAVE', 'latin1'), ...chunks]);

  const header = Buffer.alloc(8);
  header.write('RIFF', 0, 'latin1');
  header.writeUInt32LE(body.length, 4);
  return Buffer.concat([header, body]);
}

/** Stand-in MP3 returned by {@link FakeCodec} */
export const FAKE_MP3 = Buffer.from('ID3\x04\x00fake-mp3-frames', 'latin1');

export interface VoicemailOptions {
  boundary?: string;
  wav?: Buffer;
  /** Line ending of the text sections */
  eol?: string;
  /** Line ending of the base64 lines */
  base64Eol?: string;
  fileName?: string;
}

export interface VoicemailSections {
  preamble: string;
  envelope: string;
  bodyText: string;
  attachmentHead: string;
  attachmentBody: string;
  trailer: string;
}

/**
 * Sections of a voicemail notification with a WAV attachment, laid out the
 * way the splitter cuts them
 */
export function voicemailSections(options: VoicemailOptions = {}): VoicemailSections {
  const boundary = options.boundary ?? 'XYZ';
  const eol = options.eol ?? '\n';
  const base64Eol = options.base64Eol ?? '\r\n';
  const fileName = options.fileName ?? 'msg1234.WAV';
  const wav = options.wav ?? buildWav();
  const lines = (...l: string[]) => l.map(line => line + eol).join('');

  const encoded = wav.toString('base64').match(/.{1,76}/g) ?? [];

  return {
    preamble: lines(
      'Date: Mon, 12 Oct 2026 10:00:00 +0000',
      'From: "Voicemail" <vm@example.test>',
      'To: <user@example.test>',
      'Subject: New voicemail from 1234',
      'MIME-Version: 1.0'
    ),
    envelope: lines(
      `Content-Type: multipart/mixed; boundary="${boundary}"`,
      '',
      'This is a multi-part message in MIME format.',
      ''
    ),
    bodyText: lines(
      `--${boundary}`,
      'Content-Type: text/plain; charset=ISO-8859-1',
      'Content-Transfer-Encoding: 8bit',
      '',
      'You have a new voicemail in mailbox 1234.',
      ''
    ),
    attachmentHead: lines(
      `--${boundary}`,
      `Content-Type: audio/x-wav; name="${fileName}"`,
      'Content-Transfer-Encoding: base64',
      'Content-Description: Voicemail sound attachment.',
      `Content-Disposition: attachment; filename="${fileName}"`,
      ''
    ),
    attachmentBody: encoded.map(line => line + base64Eol).join('') + eol,
    trailer: lines(`--${boundary}--`),
  };
}

/**
 * Complete voicemail notification
 */
export function buildVoicemail(options: VoicemailOptions = {}): Buffer {
  const s = voicemailSections(options);
  return Buffer.from(
    s.preamble + s.envelope + s.bodyText + s.attachmentHead + s.attachmentBody + s.trailer,
    'latin1'
  );
}

/**
 * Notification sent without audio: a single text/plain part, no boundary
 */
export function buildPlainNotification(eol = '\n'): Buffer {
  return Buffer.from(
    [
      'From: "Voicemail" <vm@example.test>',
      'To: <user@example.test>',
      'Subject: New voicemail from 1234',
      'MIME-Version: 1.0',
      'Content-Type: text/plain; charset=ISO-8859-1',
      '',
      'You have a new voicemail in mailbox 1234.',
      '',
    ].join(eol),
    'latin1'
  );
}

/**
 * Codec that records its inputs and returns canned output
 */
export class FakeCodec implements AudioCodec {
  readonly normalized: Buffer[] = [];
  readonly encoded: Buffer[] = [];
  private readonly mp3: Buffer;

  constructor(mp3: Buffer = FAKE_MP3) {
    this.mp3 = mp3;
  }

  async normalize(wav: Buffer): Promise<Buffer> {
    this.normalized.push(wav);
    return Buffer.concat([Buffer.from('PCM:', 'latin1'), wav]);
  }

  async encodeMp3(pcm: Buffer): Promise<Buffer> {
    this.encoded.push(pcm);
    return this.mp3;
  }
}

/**
 * Sink that keeps what it is given
 */
export class CaptureSink implements MailSink {
  readonly description = 'capture';
  readonly messages: Buffer[] = [];

  async send(message: Buffer): Promise<void> {
    this.messages.push(message);
  }
}

/**
 * Returns what `fn` throws, failing if it returns normally
 */
export function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('Expected function to throw');
}

/**
 * Returns what `promise` rejects with, failing if it resolves
 */
export async function rejected(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (err) {
    return err;
  }
  throw new Error('Expected promise to reject');
}
