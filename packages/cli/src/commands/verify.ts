// packages/cli/src/commands/verify.ts
import type { Command } from 'commander';

import { getRealTime, NETWORK_ENV, resolveNetwork, Transaction } from '@txcanon/transactions';

import { readJsonInput, type CliDeps } from '../io.js';

type VerifyOptions = { secondPublicKey?: string; network?: string };

type CheckResult = 'valid' | 'invalid' | 'missing';

export function registerVerifyCommand(program: Command, deps: CliDeps): Command {
  return program
    .command('verify')
    .description('Check the id and signatures of a transaction JSON file ("-" for stdin).')
    .argument('<file>', 'transaction JSON')
    .option('--second-public-key <hex>', 'registered second public key (default: sender key)')
    .option('--network <name>', 'mainnet or testnet, for the timestamp epoch')
    .action(async (file: string, opts: VerifyOptions) => {
      const network = resolveNetwork(opts.network ?? deps.env[NETWORK_ENV]);
      const tx = Transaction.fromJSON(await readJsonInput(deps, file));

      const first: CheckResult = tx.signature ? (tx.verify() ? 'valid' : 'invalid') : 'missing';
      const second: CheckResult = tx.secondSignature
        ? tx.secondVerify(opts.secondPublicKey ?? tx.senderPublicKey)
          ? 'valid'
          : 'invalid'
        : 'missing';

      deps.out(`id:               ${tx.getId()}`);
      deps.out(`signature:        ${first}`);
      deps.out(`secondSignature:  ${second}`);
      deps.out(`time:             ${new Date(getRealTime(network.epoch, tx.data.timestamp)).toISOString()}`);

      if (first !== 'valid' || second === 'invalid') {
        deps.err(first === 'missing' ? 'transaction is not signed' : 'signature check failed');
        deps.setExitCode(1);
      }
    });
}
