/**
 * vm2mp3 - replaces voicemail WAV attachments with MP3 and optionally adds a
 * speech-to-text transcript
 *
 * @packageDocumentation
 */

// Types and errors
export * from './types/index.js';

// Encoding utilities
export * from './encoding/index.js';

// MIME surgery
export * from './mime/index.js';

// Audio conversion
export * from './audio/index.js';

// Speech-to-text
export * from './transcription/index.js';

// Mail sinks
export * from './sink/index.js';

// Process execution
export * from './process/index.js';

// Pipeline
export { convertMessage, dispatch, readAll } from './dispatcher.js';
export type { ConvertOptions, DispatchOptions } from './dispatcher.js';
export { Workspace, createWorkspace, releaseWorkspaces, withWorkspace } from './workspace.js';
export { loadSettings, readEnvFile, resolveEnv } from './config.js';
export { ConsoleLogger, silentLogger } from './logger.js';
export type { Logger, LogLevel, ConsoleLoggerOptions } from './logger.js';
export { run, parseCliArgs, handleTermination, USAGE } from './main.js';
