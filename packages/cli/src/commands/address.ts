// packages/cli/src/commands/address.ts
import type { Command } from 'commander';

import { addressFromPublicKey, derivePublicKey } from '@txcanon/crypto';
import { NETWORK_ENV, resolveNetwork } from '@txcanon/transactions';

import { requireSecret, SECRET_ENV } from '../config.js';
import type { CliDeps } from '../io.js';

type AddressOptions = { secret?: string; network?: string };

export function registerAddressCommand(program: Command, deps: CliDeps): Command {
  return program
    .command('address')
    .description('Print the address and public key for a secret.')
    .option('--secret <secret>', `passphrase (or $${SECRET_ENV})`)
    .option('--network <name>', 'mainnet or testnet')
    .action((opts: AddressOptions) => {
      const secret = requireSecret(opts.secret, SECRET_ENV, deps.env, '--secret');
      const network = resolveNetwork(opts.network ?? deps.env[NETWORK_ENV]);
      const publicKey = derivePublicKey(secret);

      deps.out(`network:    ${network.name}`);
      deps.out(`address:    ${addressFromPublicKey(publicKey, network.addressVersion)}`);
      deps.out(`publicKey:  ${publicKey}`);
    });
}
