#!/usr/bin/env node
import { handleTermination, run } from './main.js';

const stderr = (line: string) => console.error(line);
const detach = handleTermination(process, (code) => process.exit(code), stderr);

run({
  argv: process.argv.slice(2),
  env: process.env,
  stdin: process.stdin,
  stdout: process.stdout,
  stderr,
}).then(
  (code) => {
    detach();
    process.exitCode = code;
  },
  (err: unknown) => {
    detach();
    console.error(err);
    process.exitCode = 1;
  }
);
