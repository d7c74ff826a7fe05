/**
 * Audio conversion
 *
 * @packageDocumentation
 */

export { inspectWav, isWav, WAVE_FORMAT_PCM } from './wav.js';
export type { WavFormat } from './wav.js';
export { ProcessAudioCodec, convertAudio, MP3_BITRATE_KBPS } from './codec.js';
export type { AudioCodec, ProcessAudioCodecOptions, ConvertedAudio } from './codec.js';
