/**
 * Message Assembler
 *
 * Line endings per section: text from the headers down to the rewritten
 * attachment head is LF, the base64 payload is CRLF, the trailer is LF.
 *
 * @packageDocumentation
 */

import { base64EncodeLines } from '../encoding/base64.js';
import { toLf } from '../encoding/line-endings.js';
import type { AssemblyInput } from '../types/message.js';

export const TRANSCRIPT_SEPARATOR = '--- Voicemail transcription ---';

/** Written between the payload and the trailer */
const PAYLOAD_TERMINATOR = Buffer.from('\n\n', 'latin1');

/**
 * Renders the transcript banner
 *
 * @param transcript - Transcript text, used verbatim
 * @returns Empty buffer when there is no transcript
 */
export function transcriptBanner(transcript: string): Buffer {
  if (transcript.trim() === '') return Buffer.alloc(0);
  const text = transcript.endsWith('\n') ? transcript : `${transcript}\n`;
  return toLf(Buffer.from(`${TRANSCRIPT_SEPARATOR}\n${text}`, 'utf-8'));
}

/**
 * Builds the outgoing message
 *
 * @param input - Layout, rewritten head, MP3 bytes and transcript
 * @returns Complete message bytes
 */
export function assembleMessage(input: AssemblyInput): Buffer {
  const { layout, head, audio, transcript } = input;
  const placement = input.placement ?? 'attachment';
  const banner = transcriptBanner(transcript);

  const sections: Buffer[] = [
    toLf(layout.preamble),
    toLf(layout.envelope),
    toLf(layout.bodyText),
  ];

  if (placement === 'body' && banner.length > 0) {
    const last = sections[sections.length - 1];
    if (last.length > 0 && last[last.length - 1] !== 0x0a) {
      sections.push(Buffer.from('\n', 'latin1'));
    }
    sections.push(banner);
  }

  sections.push(toLf(head));

  if (placement === 'attachment') {
    sections.push(banner);
  }

  sections.push(
    Buffer.from(base64EncodeLines(audio, undefined, '\r\n'), 'latin1'),
    PAYLOAD_TERMINATOR,
    toLf(layout.trailer)
  );

  return Buffer.concat(sections);
}
