// packages/cli/src/program.ts
import { Command } from 'commander';

import { registerAddressCommand } from './commands/address.js';
import { registerBytesCommand } from './commands/bytes.js';
import { registerCreateCommand } from './commands/create.js';
import { registerVerifyCommand } from './commands/verify.js';
import type { CliDeps } from './io.js';

export function createProgram(deps: CliDeps): Command {
  const program = new Command();

  program
    .name('txcanon')
    .description('Build, sign, verify and inspect canonical transactions')
    .showHelpAfterError();

  registerAddressCommand(program, deps);
  registerCreateCommand(program, deps);
  registerVerifyCommand(program, deps);
  registerBytesCommand(program, deps);

  return program;
}
