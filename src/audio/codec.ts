/**
 * Audio Pipeline Adapter
 *
 * Two external converters: sox normalises any WAV encoding (GSM included) to
 * linear PCM, lame encodes that PCM to MP3. Both are black boxes reached
 * through files in the workspace.
 */

import type { Logger } from '../logger.js';
import { runProcess, type ProcessResult, type ProcessRunner } from '../process/runner.js';
import { CodecError } from '../types/errors.js';
import type { Workspace } from '../workspace.js';
import { inspectWav, type WavFormat } from './wav.js';

/**
 * MP3 bitrate in kbps. Constant bit rate rather than VBR: older phones and
 * mail clients play CBR reliably, and voice at 24 kbps mono is intelligible.
 */
export const MP3_BITRATE_KBPS = 24;

/**
 * Byte-in/byte-out codec contract
 */
export interface AudioCodec {
  /** Any supported WAV encoding to linear-PCM WAV */
  normalize(wav: Buffer): Promise<Buffer>;
  /** Linear-PCM WAV to mono CBR MP3 */
  encodeMp3(pcm: Buffer): Promise<Buffer>;
}

export interface ProcessAudioCodecOptions {
  /** sox executable */
  soxPath?: string;
  /** lame executable */
  lamePath?: string;
  runner?: ProcessRunner;
  logger?: Logger;
}

/**
 * AudioCodec backed by the sox and lame command-line tools
 */
export class ProcessAudioCodec implements AudioCodec {
  private readonly workspace: Workspace;
  private readonly soxPath: string;
  private readonly lamePath: string;
  private readonly runner: ProcessRunner;
  private readonly logger?: Logger;

  constructor(workspace: Workspace, options: ProcessAudioCodecOptions = {}) {
    this.workspace = workspace;
    this.soxPath = options.soxPath ?? 'sox';
    this.lamePath = options.lamePath ?? 'lame';
    this.runner = options.runner ?? runProcess;
    this.logger = options.logger;
  }

  async normalize(wav: Buffer): Promise<Buffer> {
    const input = await this.workspace.write('attachment.wav', wav);
    const output = 'attachment-pcm.wav';
    return this.convert(this.soxPath, [input, '-e', 'signed-integer', this.workspace.file(output)], output);
  }

  async encodeMp3(pcm: Buffer): Promise<Buffer> {
    const input = await this.workspace.write('encode-input.wav', pcm);
    const output = 'attachment.mp3';
    return this.convert(
      this.lamePath,
      ['--quiet', '-m', 'm', '-b', String(MP3_BITRATE_KBPS), '--cbr', input, this.workspace.file(output)],
      output
    );
  }

  /**
   * Runs one converter and reads back the file it wrote to `output`
   */
  private async convert(command: string, args: string[], output: string): Promise<Buffer> {
    const commandLine = [command, ...args].join(' ');
    this.logger?.debug('Running codec', { command: commandLine });

    let result: ProcessResult;
    try {
      result = await this.runner(command, args, { cwd: this.workspace.path });
    } catch (err) {
      throw new CodecError(
        `Failed to start ${command}: ${err instanceof Error ? err.message : String(err)}`,
        commandLine,
        null,
        '',
        err
      );
    }

    if (result.exitCode !== 0) {
      const status = result.exitCode === null ? `signal ${result.signal ?? 'unknown'}` : `code ${result.exitCode}`;
      throw new CodecError(`${command} exited with ${status}`, commandLine, result.exitCode, result.stderr);
    }

    let bytes: Buffer;
    try {
      bytes = await this.workspace.read(output);
    } catch (err) {
      throw new CodecError(`${command} produced no output file`, commandLine, result.exitCode, result.stderr, err);
    }
    if (bytes.length === 0) {
      throw new CodecError(`${command} produced empty output`, commandLine, result.exitCode, result.stderr);
    }
    return bytes;
  }
}

/**
 * Artifacts of one audio conversion
 */
export interface ConvertedAudio {
  /** Format of the decoded attachment */
  format: WavFormat;
  /** Linear-PCM WAV */
  pcm: Buffer;
  mp3: Buffer;
}

/**
 * Checks the container, normalises to PCM and encodes to MP3
 *
 * @param codec - Codec implementation
 * @param wav - Decoded attachment
 * @throws AudioFormatError if `wav` is not a WAV container
 * @throws CodecError if either conversion fails
 */
export async function convertAudio(codec: AudioCodec, wav: Buffer): Promise<ConvertedAudio> {
  const format = inspectWav(wav);
  const pcm = await codec.normalize(wav);
  const mp3 = await codec.encodeMp3(pcm);
  return { format, pcm, mp3 };
}
