// packages/cli/src/commands/bytes.ts
import type { Command } from 'commander';

import { bytesToHex } from '@txcanon/utils';
import { Transaction } from '@txcanon/transactions';

import { readJsonInput, type CliDeps } from '../io.js';

type BytesOptions = { signature?: boolean; secondSignature?: boolean };

export function registerBytesCommand(program: Command, deps: CliDeps): Command {
  return program
    .command('bytes')
    .description('Print the canonical bytes (hex) of a transaction JSON file ("-" for stdin).')
    .argument('<file>', 'transaction JSON')
    .option('--signature', 'append the first signature', false)
    .option('--second-signature', 'append the second signature', false)
    .action(async (file: string, opts: BytesOptions) => {
      const tx = Transaction.fromJSON(await readJsonInput(deps, file));
      const bytes = tx.getBytes({
        includeSignature: !!opts.signature,
        includeSecondSignature: !!opts.secondSignature,
      });
      deps.out(bytesToHex(bytes));
    });
}
