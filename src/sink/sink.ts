/**
 * Mail sinks
 *
 * A sink takes one finished RFC 2822 message. Whether the MTA later delivers
 * it is not our concern; a sink only reports whether it took the message.
 */

import type { Writable } from 'node:stream';
import { runProcess, type ProcessResult, type ProcessRunner } from '../process/runner.js';
import { SinkError } from '../types/errors.js';

export interface MailSink {
  /** Human-readable target, for logs */
  readonly description: string;
  /**
   * @throws SinkError if the message was not accepted
   */
  send(message: Buffer): Promise<void>;
}

/**
 * Pipes the message into a sendmail-compatible command
 */
export class SendmailSink implements MailSink {
  private readonly command: string;
  private readonly args: string[];
  private readonly runner: ProcessRunner;

  constructor(command: string, args: string[] = ['-t'], runner: ProcessRunner = runProcess) {
    this.command = command;
    this.args = args;
    this.runner = runner;
  }

  get description(): string {
    return [this.command, ...this.args].join(' ');
  }

  async send(message: Buffer): Promise<void> {
    let result: ProcessResult;
    try {
      result = await this.runner(this.command, this.args, { input: message });
    } catch (err) {
      throw new SinkError(
        `Failed to hand message to ${this.command}: ${err instanceof Error ? err.message : String(err)}`,
        this.description,
        null,
        err
      );
    }

    if (result.exitCode !== 0) {
      const detail = result.stderr.trim();
      throw new SinkError(
        `${this.command} exited with ${result.exitCode === null ? `signal ${result.signal ?? 'unknown'}` : `code ${result.exitCode}`}${detail ? `: ${detail}` : ''}`,
        this.description,
        result.exitCode
      );
    }
  }
}

/**
 * Writes the message to a stream (stdout for dry runs)
 */
export class StreamSink implements MailSink {
  readonly description: string;
  private readonly stream: Writable;

  constructor(stream: Writable, description = 'stream') {
    this.stream = stream;
    this.description = description;
  }

  send(message: Buffer): Promise<void> {
    return new Promise((resolve, reject) => {
      let settled = false;
      const fail = (err: Error) => {
        if (settled) return;
        settled = true;
        reject(new SinkError(`Failed to write message: ${err.message}`, this.description, null, err));
      };

      // A failed write is also emitted as 'error' on the stream, after the
      // callback; the listener stays attached on that path to take it
      this.stream.once('error', fail);
      this.stream.write(message, (err) => {
        if (err) {
          fail(err);
          return;
        }
        this.stream.removeListener('error', fail);
        settled = true;
        resolve();
      });
    });
  }
}

/**
 * Splits a configured command line such as `/usr/sbin/sendmail -t -oi`
 */
export function parseCommandLine(commandLine: string): { command: string; args: string[] } {
  const [command = '', ...args] = commandLine.trim().split(/\s+/);
  return { command, args };
}
