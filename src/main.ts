/**
 * Command-line entry logic
 *
 * Kept apart from the executable script so it can be driven from tests.
 */

import type { Writable } from 'node:stream';
import { ProcessAudioCodec } from './audio/codec.js';
import { loadSettings, resolveEnv, type EnvInput } from './config.js';
import { dispatch } from './dispatcher.js';
import { ConsoleLogger, type Logger } from './logger.js';
import { SendmailSink, StreamSink, type MailSink } from './sink/sink.js';
import { createTranscriber } from './transcription/index.js';
import { VoicemailError } from './types/errors.js';
import { releaseWorkspaces } from './workspace.js';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
/** EX_USAGE from sysexits.h */
export const EXIT_USAGE = 64;

/** Shell convention: 128 + signal number */
export const SIGNAL_EXIT_CODES = { SIGINT: 130, SIGTERM: 143 } as const;

export type TerminationSignal = keyof typeof SIGNAL_EXIT_CODES;

const TERMINATION_SIGNALS: readonly TerminationSignal[] = ['SIGINT', 'SIGTERM'];

export const USAGE = `Usage: vm2mp3 [options] < message.eml

Reads a voicemail notification email on stdin, converts its WAV attachment
to MP3 and passes the result to sendmail.

Options:
  -v, --debug            Print diagnostic output to stderr
      --stdout           Write the message to stdout instead of sendmail
      --env-file <path>  Read settings from an env file (also VM_ENV_FILE)
  -h, --help             Show this help
`;

export interface CliArgs {
  debug: boolean;
  stdout: boolean;
  help: boolean;
  envFile?: string;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/**
 * Parses command-line flags
 *
 * @param argv - Arguments after the script name
 * @throws UsageError on an unknown flag or a missing value
 */
export function parseCliArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = { debug: false, stdout: false, help: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '-v':
      case '--debug':
        args.debug = true;
        break;
      case '--stdout':
        args.stdout = true;
        break;
      case '-h':
      case '--help':
        args.help = true;
        break;
      case '--env-file': {
        const value = argv[i + 1];
        if (value === undefined || value.startsWith('-')) {
          throw new UsageError('--env-file requires a path');
        }
        args.envFile = value;
        i++;
        break;
      }
      default:
        if (arg.startsWith('--env-file=')) {
          args.envFile = arg.slice('--env-file='.length);
          break;
        }
        throw new UsageError(`Unknown option: ${arg}`);
    }
  }

  return args;
}

export interface RunContext {
  argv: readonly string[];
  env: EnvInput;
  stdin: AsyncIterable<Buffer | Uint8Array | string>;
  stdout: Writable;
  /** Receives log lines */
  stderr: (line: string) => void;
  /** Overrides the sink built from settings */
  sink?: MailSink;
}

/**
 * Runs one invocation and returns the process exit code
 */
export async function run(context: RunContext): Promise<number> {
  let args: CliArgs;
  try {
    args = parseCliArgs(context.argv);
  } catch (err) {
    if (err instanceof UsageError) {
      context.stderr(`${err.message}\n\n${USAGE}`);
      return EXIT_USAGE;
    }
    throw err;
  }

  if (args.help) {
    context.stdout.write(USAGE);
    return EXIT_OK;
  }

  let logger: Logger = new ConsoleLogger({ debug: args.debug, write: context.stderr });

  try {
    const env = resolveEnv(context.env, args.envFile ?? context.env.VM_ENV_FILE);
    const settings = loadSettings(env, { debug: args.debug || undefined });
    logger = new ConsoleLogger({ debug: settings.debug, write: context.stderr });

    const sink = context.sink
      ?? (args.stdout
        ? new StreamSink(context.stdout, 'stdout')
        : new SendmailSink(settings.sink.command, settings.sink.args));

    await dispatch({
      input: context.stdin,
      sink,
      createCodec: (workspace) => new ProcessAudioCodec(workspace, {
        soxPath: settings.codec.soxPath,
        lamePath: settings.codec.lamePath,
        logger,
      }),
      transcriber: createTranscriber(settings.transcription, logger),
      placement: settings.transcription.placement,
      tmpDir: settings.tmpDir,
      logger,
    });
    return EXIT_OK;
  } catch (err) {
    if (err instanceof VoicemailError) {
      logger.error(err.message, { code: err.code, stage: err.stage });
    } else {
      logger.error(err instanceof Error ? err.message : String(err));
    }
    return EXIT_FAILURE;
  }
}

/**
 * Anything that delivers termination signals; `process` in the CLI
 */
export interface SignalSource {
  once(event: TerminationSignal, listener: () => void): unknown;
  removeListener(event: TerminationSignal, listener: () => void): unknown;
}

/**
 * Removes live workspaces and exits when SIGINT or SIGTERM arrives
 *
 * @param source - Signal emitter
 * @param exit - Called with 128 + signal number after cleanup
 * @param stderr - Receives the notice line
 * @returns Function that removes the handlers
 */
export function handleTermination(
  source: SignalSource,
  exit: (code: number) => void,
  stderr: (line: string) => void = () => undefined
): () => void {
  const handlers = TERMINATION_SIGNALS.map((signal) => {
    const listener = () => {
      const removed = releaseWorkspaces();
      stderr(`[vm2mp3] WARN Received ${signal}, removed ${removed} workspace(s)`);
      exit(SIGNAL_EXIT_CODES[signal]);
    };
    source.once(signal, listener);
    return [signal, listener] as const;
  });

  return () => {
    for (const [signal, listener] of handlers) {
      source.removeListener(signal, listener);
    }
  };
}
