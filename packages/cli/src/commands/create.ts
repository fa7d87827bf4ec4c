// packages/cli/src/commands/create.ts
import type { Command } from 'commander';

import { NETWORK_ENV, parseU64, resolveNetwork, TransactionBuilder } from '@txcanon/transactions';

import { requireSecret, resolveSecret, SECOND_SECRET_ENV, SECRET_ENV } from '../config.js';
import type { CliDeps } from '../io.js';

export const CREATE_TYPES = ['transfer', 'second-signature', 'delegate', 'vote', 'multisignature'] as const;
export type CreateType = (typeof CREATE_TYPES)[number];

type CreateOptions = {
  secret?: string;
  secondSecret?: string;
  network?: string;
  recipient?: string;
  amount?: string;
  fee?: string;
  vendorField?: string;
  vendorText?: string;
  requester?: string;
  timestamp?: string;
  username?: string;
  votes?: string;
  min?: string;
  lifetime?: string;
  keys?: string;
};

function isCreateType(x: string): x is CreateType {
  return CREATE_TYPES.some((t) => t === x);
}

function list(raw: string | undefined, flag: string): string[] {
  const items = String(raw ?? '')
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
  if (items.length === 0) throw new Error(`${flag} is required (comma-separated)`);
  return items;
}

function int(raw: string | undefined, flag: string): number {
  const s = String(raw ?? '').trim();
  if (!/^\d+$/.test(s)) throw new Error(`${flag} must be a non-negative integer`);
  return Number(s);
}

function required(raw: string | undefined, flag: string): string {
  const s = String(raw ?? '').trim();
  if (!s) throw new Error(`${flag} is required`);
  return s;
}

export function registerCreateCommand(program: Command, deps: CliDeps): Command {
  return program
    .command('create')
    .description('Build and sign a transaction, print it as JSON.')
    .argument('<type>', CREATE_TYPES.join(' | '))
    .option('--secret <secret>', `sender passphrase (or $${SECRET_ENV})`)
    .option('--second-secret <secret>', `second passphrase (or $${SECOND_SECRET_ENV})`)
    .option('--network <name>', 'mainnet or testnet')
    .option('--recipient <address>', 'transfer recipient')
    .option('--amount <units>', 'transfer amount in the smallest unit')
    .option('--fee <units>', 'override the network default fee')
    .option('--vendor-field <hex>', 'vendor field, hex (max 64 bytes)')
    .option('--vendor-text <text>', 'vendor field, UTF-8 text (max 64 bytes)')
    .option('--requester <publicKey>', 'requester public key (multisignature by proxy)')
    .option('--timestamp <seconds>', 'override the network timestamp')
    .option('--username <name>', 'delegate username')
    .option('--votes <list>', 'comma-separated +/-publicKey entries')
    .option('--min <n>', 'multisignature: signatures required')
    .option('--lifetime <hours>', 'multisignature: request lifetime')
    .option('--keys <list>', 'multisignature: comma-separated public keys')
    .action((type: string, opts: CreateOptions) => {
      if (!isCreateType(type)) {
        throw new Error(`unknown type "${type}" (expected one of: ${CREATE_TYPES.join(', ')})`);
      }

      const secret = requireSecret(opts.secret, SECRET_ENV, deps.env, '--secret');
      const secondSecret = resolveSecret(opts.secondSecret, SECOND_SECRET_ENV, deps.env);
      const network = resolveNetwork(opts.network ?? deps.env[NETWORK_ENV]);
      const b = new TransactionBuilder(secret, { network, clock: deps.clock });

      switch (type) {
        case 'transfer':
          b.transfer(required(opts.recipient, '--recipient'), parseU64(required(opts.amount, '--amount'), 'amount'));
          break;
        case 'second-signature':
          b.secondSignature(requireSecret(opts.secondSecret, SECOND_SECRET_ENV, deps.env, '--second-secret'));
          break;
        case 'delegate':
          b.delegate(required(opts.username, '--username'));
          break;
        case 'vote':
          b.vote(list(opts.votes, '--votes'));
          break;
        case 'multisignature':
          b.multiSignature(int(opts.min, '--min'), int(opts.lifetime, '--lifetime'), list(opts.keys, '--keys'));
          break;
      }

      if (opts.vendorField && opts.vendorText) throw new Error('choose only one: --vendor-field or --vendor-text');
      if (opts.vendorField) b.vendorField(opts.vendorField);
      if (opts.vendorText) b.vendorFieldText(opts.vendorText);
      if (opts.requester) b.requester(opts.requester);
      if (opts.fee !== undefined) b.fee(parseU64(opts.fee, 'fee'));
      if (opts.timestamp !== undefined) b.timestamp(int(opts.timestamp, '--timestamp'));

      const tx = b.build().sign(secret);
      // registering a second key is signed with the first key only
      if (secondSecret && type !== 'second-signature') tx.secondSign(secondSecret);

      deps.out(JSON.stringify(tx.toJSON(), null, 2));
    });
}
