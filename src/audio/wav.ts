/**
 * RIFF/WAVE container inspection
 *
 * Only the container and the `fmt ` chunk are read; sample data is left to
 * the codecs.
 */

import { AudioFormatError } from '../types/errors.js';

/**
 * Format description from the `fmt ` chunk
 */
export interface WavFormat {
  /** WAVE format tag (1 = PCM, 0x31 = GSM 6.10, ...) */
  formatTag: number;
  /** Readable name of the format tag */
  formatName: string;
  channels: number;
  sampleRate: number;
  bitsPerSample: number;
}

export const WAVE_FORMAT_PCM = 0x0001;

const FORMAT_NAMES: Record<number, string> = {
  0x0001: 'pcm',
  0x0002: 'ms-adpcm',
  0x0003: 'ieee-float',
  0x0006: 'alaw',
  0x0007: 'mulaw',
  0x0011: 'ima-adpcm',
  0x0031: 'gsm610',
  0xfffe: 'extensible',
};

const RIFF_HEADER_LENGTH = 12;
const CHUNK_HEADER_LENGTH = 8;
const FMT_MIN_LENGTH = 16;

/**
 * Whether the bytes start with a RIFF/WAVE header
 */
export function isWav(bytes: Buffer): boolean {
  return bytes.length >= RIFF_HEADER_LENGTH
    && bytes.toString('latin1', 0, 4) === 'RIFF'
    && bytes.toString('latin1', 8, 12) === 'WAVE';
}

/**
 * Reads the format of a WAV file
 *
 * @param bytes - Complete WAV file
 * @throws AudioFormatError if the bytes are not a RIFF/WAVE container or
 *   carry no usable `fmt ` chunk
 */
export function inspectWav(bytes: Buffer): WavFormat {
  if (!isWav(bytes)) {
    throw new AudioFormatError('Attachment is not a RIFF/WAVE container');
  }

  let offset = RIFF_HEADER_LENGTH;
  while (offset + CHUNK_HEADER_LENGTH <= bytes.length) {
    const id = bytes.toString('latin1', offset, offset + 4);
    const size = bytes.readUInt32LE(offset + 4);
    const body = offset + CHUNK_HEADER_LENGTH;

    if (id === 'fmt ') {
      if (size < FMT_MIN_LENGTH || body + FMT_MIN_LENGTH > bytes.length) {
        throw new AudioFormatError(`Truncated fmt chunk (${size} bytes)`);
      }
      const formatTag = bytes.readUInt16LE(body);
      return {
        formatTag,
        formatName: FORMAT_NAMES[formatTag] ?? `0x${formatTag.toString(16).padStart(4, '0')}`,
        channels: bytes.readUInt16LE(body + 2),
        sampleRate: bytes.readUInt32LE(body + 4),
        bitsPerSample: bytes.readUInt16LE(body + 14),
      };
    }

    // Chunks are word aligned
    offset = body + size + (size % 2);
  }

  throw new AudioFormatError('WAV container has no fmt chunk');
}
