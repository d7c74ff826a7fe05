export { runProcess } from './runner.js';
export type { ProcessRunner, ProcessResult, RunOptions } from './runner.js';
