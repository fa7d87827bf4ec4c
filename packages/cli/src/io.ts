// packages/cli/src/io.ts
import fs from 'node:fs/promises';
import { text } from 'node:stream/consumers';

import { systemClock, type Clock } from '@txcanon/transactions';

import type { Env } from './config.js';

/** Everything a command touches outside its own arguments; tests pass fakes. */
export type CliDeps = {
  out: (line: string) => void;
  err: (line: string) => void;
  /** path, or "-" for stdin */
  readInput: (source: string) => Promise<string>;
  setExitCode: (code: number) => void;
  clock: Clock;
  env: Env;
};

export function defaultDeps(): CliDeps {
  return {
    out: (line) => console.log(line),
    err: (line) => console.error(`[txcanon] ${line}`),
    readInput: (source) => (source === '-' ? text(process.stdin) : fs.readFile(source, 'utf8')),
    setExitCode: (code) => {
      process.exitCode = code;
    },
    clock: systemClock,
    env: process.env,
  };
}

export async function readJsonInput(deps: CliDeps, source: string): Promise<unknown> {
  const raw = await deps.readInput(source);
  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new Error(`${source === '-' ? 'stdin' : source}: not valid JSON`, { cause: err });
  }
}
