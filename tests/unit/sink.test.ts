/**
 * Mail sinks
 */

import { describe, it, expect, vi } from 'vitest';
import { PassThrough, Writable } from 'node:stream';
import { SendmailSink, StreamSink, parseCommandLine } from '../../src/sink/sink.js';
import type { ProcessResult, ProcessRunner } from '../../src/process/runner.js';
import { SinkError } from '../../src/types/errors.js';
import { rejected } from '../helpers/fixtures.js';

function exited(exitCode: number | null, stderr = ''): ProcessResult {
  return { exitCode, signal: exitCode === null ? 'SIGTERM' : null, stdout: Buffer.alloc(0), stderr };
}

describe('SendmailSink', () => {
  it('should pipe the message into the command', async () => {
    const runner = vi.fn<ProcessRunner>(async () => exited(0));
    const sink = new SendmailSink('/usr/sbin/sendmail', ['-t', '-oi'], runner);
    const message = Buffer.from('Subject: hi\n\nbody\n');

    await sink.send(message);

    expect(runner).toHaveBeenCalledWith('/usr/sbin/sendmail', ['-t', '-oi'], { input: message });
    expect(sink.description).toBe('/usr/sbin/sendmail -t -oi');
  });

  it('should default to -t', async () => {
    const runner = vi.fn<ProcessRunner>(async () => exited(0));
    await new SendmailSink('sendmail', undefined, runner).send(Buffer.from('x'));
    expect(runner.mock.calls[0][1]).toEqual(['-t']);
  });

  it('should fail when the command exits non-zero', async () => {
    const runner = vi.fn<ProcessRunner>(async () => exited(75, 'queue directory not writable\n'));
    const sink = new SendmailSink('sendmail', ['-t'], runner);

    const err = await rejected(sink.send(Buffer.from('x')));

    expect(err).toBeInstanceOf(SinkError);
    expect(err).toMatchObject({
      message: 'sendmail exited with code 75: queue directory not writable',
      exitCode: 75,
      command: 'sendmail -t',
    });
  });

  it('should fail when the command is killed', async () => {
    const runner = vi.fn<ProcessRunner>(async () => exited(null));
    await expect(new SendmailSink('sendmail', ['-t'], runner).send(Buffer.from('x')))
      .rejects.toThrow('sendmail exited with signal SIGTERM');
  });

  it('should fail when the command cannot start', async () => {
    const runner = vi.fn<ProcessRunner>(async () => {
      throw new Error('spawn sendmail ENOENT');
    });

    const err = await rejected(new SendmailSink('sendmail', ['-t'], runner).send(Buffer.from('x')));

    expect(err).toBeInstanceOf(SinkError);
    expect(err).toMatchObject({ message: 'Failed to hand message to sendmail: spawn sendmail ENOENT', exitCode: null });
  });
});

describe('StreamSink', () => {
  it('should write the message bytes', async () => {
    const stream = new PassThrough();
    const chunks: Buffer[] = [];
    stream.on('data', (chunk: Buffer) => chunks.push(chunk));

    await new StreamSink(stream, 'stdout').send(Buffer.from([0x00, 0xff, 0x0d, 0x0a]));

    expect(Buffer.concat(chunks)).toEqual(Buffer.from([0x00, 0xff, 0x0d, 0x0a]));
  });

  it('should fail when the stream errors', async () => {
    const stream = new Writable({
      write(_chunk, _encoding, callback) {
        callback(new Error('EPIPE'));
      },
    });
    stream.on('error', () => undefined);

    const err = await rejected(new StreamSink(stream, 'stdout').send(Buffer.from('x')));

    expect(err).toBeInstanceOf(SinkError);
    expect(err).toMatchObject({ message: 'Failed to write message: EPIPE', command: 'stdout' });
  });

  it('should take the stream error event itself', async () => {
    const stream = new Writable({
      write(_chunk, _encoding, callback) {
        callback(new Error('EPIPE'));
      },
    });

    const err = await rejected(new StreamSink(stream, 'stdout').send(Buffer.from('x')));
    await new Promise(resolve => setImmediate(resolve));

    expect(err).toBeInstanceOf(SinkError);
    expect(stream.destroyed).toBe(true);
    expect(stream.listenerCount('error')).toBe(0);
  });

  it('should fail when the stream errors before the write completes', async () => {
    const stream = new Writable({
      write() {
        // never completes
      },
    });

    const pending = new StreamSink(stream, 'stdout').send(Buffer.from('x'));
    stream.destroy(new Error('stdout closed'));

    await expect(pending).rejects.toMatchObject({ message: 'Failed to write message: stdout closed' });
  });

  it('should detach its error listener after a successful write', async () => {
    const stream = new PassThrough();
    stream.resume();

    await new StreamSink(stream).send(Buffer.from('x'));

    expect(stream.listenerCount('error')).toBe(0);
  });
});

describe('parseCommandLine', () => {
  it('should split on whitespace', () => {
    expect(parseCommandLine(' /usr/sbin/sendmail  -t -oi ')).toEqual({
      command: '/usr/sbin/sendmail',
      args: ['-t', '-oi'],
    });
  });
});
