/**
 * Child process execution
 *
 * Wraps `spawn` in a promise that settles when the process has exited, its
 * output streams are drained and its input is either delivered or refused.
 */

import { spawn } from 'node:child_process';
import { finished } from 'node:stream/promises';

/**
 * Outcome of a finished process
 */
export interface ProcessResult {
  /** Exit code, null when terminated by a signal */
  exitCode: number | null;
  /** Terminating signal, if any */
  signal: NodeJS.Signals | null;
  stdout: Buffer;
  stderr: string;
}

export interface RunOptions {
  /** Bytes written to the process's stdin, which is then closed */
  input?: Buffer;
  /** Working directory */
  cwd?: string;
}

/**
 * Function shape used to run external commands, replaceable in tests
 */
export type ProcessRunner = (command: string, args: readonly string[], options?: RunOptions) => Promise<ProcessResult>;

/**
 * Runs a command to completion
 *
 * Resolves with the exit status whatever it is; rejects when the process
 * could not be started (for example ENOENT), or when it exited 0 without
 * taking all of its input.
 *
 * @param command - Executable name or path
 * @param args - Arguments
 * @param options - Stdin bytes and working directory
 */
export const runProcess: ProcessRunner = async (command, args, options = {}) => {
  const child = spawn(command, [...args], {
    cwd: options.cwd,
    stdio: ['pipe', 'pipe', 'pipe'],
  });

  const stdout: Buffer[] = [];
  const stderr: Buffer[] = [];
  child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
  child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));

  const exited = new Promise<[number | null, NodeJS.Signals | null]>((resolve, reject) => {
    child.once('error', reject);
    child.once('close', (exitCode, signal) => resolve([exitCode, signal]));
  });
  // Settles on 'finish' or on the write error (EPIPE when the child quits early)
  const stdinDone = finished(child.stdin, { readable: false }).then(
    () => undefined,
    (err: unknown) => err
  );
  child.stdin.end(options.input);

  const [exitCode, signal] = await exited;
  const stdinError = await stdinDone;
  if (stdinError !== undefined && exitCode === 0) {
    throw stdinError;
  }

  return {
    exitCode,
    signal,
    stdout: Buffer.concat(stdout),
    stderr: Buffer.concat(stderr).toString('utf-8'),
  };
};
