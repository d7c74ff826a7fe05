/**
 * Attachment detection, head/body separation and payload decoding
 */

import { describe, it, expect } from 'vitest';
import {
  decodeAttachmentBody,
  hasAudioAttachment,
  splitAttachment,
} from '../../src/mime/attachment.js';
import { splitSegments } from '../../src/mime/splitter.js';
import { DecodeError, StructuralError } from '../../src/types/errors.js';
import {
  buildPlainNotification,
  buildVoicemail,
  buildWav,
  thrown,
  voicemailSections,
} from '../helpers/fixtures.js';

describe('hasAudioAttachment', () => {
  it('should report audio for a voicemail notification', () => {
    expect(hasAudioAttachment(splitSegments(buildVoicemail(), 'XYZ'))).toBe(true);
  });

  it('should report no audio when segment 1 carries a plain marker', () => {
    const raw = Buffer.from(
      'Subject: x\nContent-Type: multipart/mixed; boundary="B"\nX-Note: text/plain\n\n--B\na\n--B\nb\n--B--\n'
    );
    expect(hasAudioAttachment(splitSegments(raw, 'B'))).toBe(false);
  });

  it('should not look at the text part for the marker', () => {
    // The text part (segment 2) is always text/plain
    const segments = splitSegments(buildVoicemail(), 'XYZ');
    expect(segments[2].bytes.toString()).toContain('text/plain');
    expect(hasAudioAttachment(segments)).toBe(true);
  });

  it('should report no audio for a single-part plain notification', () => {
    expect(hasAudioAttachment(splitSegments(buildPlainNotification(), undefined))).toBe(false);
  });

  it('should report audio for an unsplit message without a plain marker', () => {
    const raw = Buffer.from('Subject: x\nContent-Type: text/html\n\n<p>hi</p>\n');
    expect(hasAudioAttachment(splitSegments(raw, undefined))).toBe(true);
  });
});

describe('splitAttachment', () => {
  it('should take exactly six lines as the head', () => {
    const s = voicemailSections();
    const parts = splitAttachment(Buffer.from(s.attachmentHead + s.attachmentBody, 'latin1'));

    expect(parts.head.toString('latin1')).toBe(s.attachmentHead);
    expect(parts.body.toString('latin1')).toBe(s.attachmentBody);
  });

  it('should keep CRLF head lines intact', () => {
    const s = voicemailSections({ eol: '\r\n' });
    const parts = splitAttachment(Buffer.from(s.attachmentHead + s.attachmentBody, 'latin1'));
    expect(parts.head.toString('latin1')).toBe(s.attachmentHead);
  });

  it('should reject a part with no body', () => {
    const s = voicemailSections();
    expect(() => splitAttachment(Buffer.from(s.attachmentHead, 'latin1'))).toThrow(StructuralError);
  });

  it('should reject a head shorter than six lines', () => {
    const attachment = Buffer.from('--XYZ\nContent-Type: audio/x-wav\nContent-Transfer-Encoding: base64\n\nUklGRg==\nAAAA\nAAAA\n');
    const err = thrown(() => splitAttachment(attachment));
    expect(err).toBeInstanceOf(StructuralError);
    expect(err).toMatchObject({ message: 'Attachment head ends at line 4, expected 6 lines' });
  });

  it('should reject a head longer than six lines', () => {
    const attachment = Buffer.from(
      '--XYZ\nContent-Type: audio/x-wav\nContent-Transfer-Encoding: base64\nA: 1\nB: 2\nC: 3\n\nUklGRg==\n'
    );
    const err = thrown(() => splitAttachment(attachment));
    expect(err).toBeInstanceOf(StructuralError);
    expect(err).toMatchObject({ message: 'Attachment head is longer than 6 lines' });
  });
});

describe('decodeAttachmentBody', () => {
  it('should decode CRLF-wrapped base64', () => {
    const wav = buildWav({ data: Buffer.alloc(200, 7) });
    const lines = (wav.toString('base64').match(/.{1,76}/g) ?? []).join('\r\n') + '\r\n\n';
    expect(decodeAttachmentBody(Buffer.from(lines, 'latin1')).equals(wav)).toBe(true);
  });

  it('should decode LF-wrapped base64', () => {
    expect(decodeAttachmentBody(Buffer.from('SGVs\nbG8=\n')).toString()).toBe('Hello');
  });

  it('should reject characters outside the alphabet', () => {
    expect(() => decodeAttachmentBody(Buffer.from('SGVs*bG8=\n'))).toThrow(DecodeError);
  });

  it('should reject bad padding', () => {
    expect(() => decodeAttachmentBody(Buffer.from('SGVsbG8\n'))).toThrow(DecodeError);
  });

  it('should reject an empty body', () => {
    const err = thrown(() => decodeAttachmentBody(Buffer.from('\r\n\n')));
    expect(err).toBeInstanceOf(DecodeError);
    expect(err).toMatchObject({ message: 'Attachment body is empty', code: 'DECODE_ERROR' });
  });
});
