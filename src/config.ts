/**
 * Settings loading
 *
 * Settings come from the environment the MTA gives the filter, optionally
 * preloaded from an env file. Variables already set in the environment win
 * over the file.
 */

import { readFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import dotenv from 'dotenv';
import { z } from 'zod';
import { parseCommandLine } from './sink/sink.js';
import { ConfigError } from './types/errors.js';
import type { Settings } from './types/config.js';

export const DEFAULT_TRANSCRIBE_MODEL = 'en-US_NarrowbandModel';
export const DEFAULT_TRANSCRIBE_URL = 'https://api.us-south.speech-to-text.watson.cloud.ibm.com/v1/recognize';
export const DEFAULT_TRANSCRIBE_RATE_LIMIT = 40000;
export const DEFAULT_SENDMAIL = '/usr/sbin/sendmail -t';

const TRUE_VALUES = ['1', 'true', 'yes', 'on'];
const FALSE_VALUES = ['', '0', 'false', 'no', 'off'];

/** Treat `VAR=` like an unset variable */
function blankAsUnset<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess(
    (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
    schema
  );
}

const flag = z.string().optional().transform((value, ctx) => {
  const normalized = (value ?? '').trim().toLowerCase();
  if (TRUE_VALUES.includes(normalized)) return true;
  if (FALSE_VALUES.includes(normalized)) return false;
  ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected a boolean, got "${value}"` });
  return z.NEVER;
});

const EnvSchema = z.object({
  ENABLE_VM_TRANSCRIBE: flag,
  VM_TRANSCRIBE_APIKEY: blankAsUnset(z.string().trim().optional()),
  VM_TRANSCRIBE_MODEL: blankAsUnset(z.string().trim().default(DEFAULT_TRANSCRIBE_MODEL)),
  VM_TRANSCRIBE_URL: blankAsUnset(z.string().trim().url().default(DEFAULT_TRANSCRIBE_URL)),
  VM_TRANSCRIBE_RATE_LIMIT: blankAsUnset(z.coerce.number().int().nonnegative().default(DEFAULT_TRANSCRIBE_RATE_LIMIT)),
  VM_TRANSCRIPT_PLACEMENT: blankAsUnset(z.enum(['attachment', 'body']).default('attachment')),
  VM_SENDMAIL: blankAsUnset(z.string().trim().default(DEFAULT_SENDMAIL)),
  VM_SOX: blankAsUnset(z.string().trim().default('sox')),
  VM_LAME: blankAsUnset(z.string().trim().default('lame')),
  VM_TMPDIR: blankAsUnset(z.string().trim().optional()),
  VM_DEBUG: flag,
});

export type EnvInput = Record<string, string | undefined>;

/**
 * Reads variables from an env file
 *
 * @param path - File to read
 * @throws ConfigError if the file cannot be read
 */
export function readEnvFile(path: string): Record<string, string> {
  let content: Buffer;
  try {
    content = readFileSync(path);
  } catch (err) {
    throw new ConfigError(
      `Cannot read env file ${path}: ${err instanceof Error ? err.message : String(err)}`,
      ['VM_ENV_FILE']
    );
  }
  return dotenv.parse(content);
}

/**
 * Environment with an env file underneath it
 *
 * @param env - Real environment; its values take precedence
 * @param envFile - Optional file path
 */
export function resolveEnv(env: EnvInput, envFile?: string): EnvInput {
  if (!envFile) return env;
  return { ...readEnvFile(envFile), ...definedOnly(env) };
}

function definedOnly(env: EnvInput): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined) result[key] = value;
  }
  return result;
}

/**
 * Validates the environment into settings
 *
 * @param env - Environment variables
 * @param overrides - Values from the command line, applied last
 * @throws ConfigError naming every invalid variable
 */
export function loadSettings(env: EnvInput = process.env, overrides: { debug?: boolean } = {}): Settings {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const keys = [...new Set(parsed.error.issues.map(issue => String(issue.path[0])))];
    const details = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`, keys);
  }

  const vars = parsed.data;
  const sink = parseCommandLine(vars.VM_SENDMAIL);

  return {
    transcription: {
      enabled: vars.ENABLE_VM_TRANSCRIBE,
      apiKey: vars.VM_TRANSCRIBE_APIKEY,
      model: vars.VM_TRANSCRIBE_MODEL,
      url: vars.VM_TRANSCRIBE_URL,
      rateLimit: vars.VM_TRANSCRIBE_RATE_LIMIT,
      placement: vars.VM_TRANSCRIPT_PLACEMENT,
    },
    codec: {
      soxPath: vars.VM_SOX,
      lamePath: vars.VM_LAME,
    },
    sink,
    tmpDir: vars.VM_TMPDIR ?? tmpdir(),
    debug: overrides.debug ?? vars.VM_DEBUG,
  };
}
