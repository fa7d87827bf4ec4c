// packages/transactions/src/network.ts
import { TransactionType } from './types.js';

export type NetworkName = 'mainnet' | 'testnet';

export type NetworkConfig = {
  name: NetworkName;
  /** ISO-8601 instant that timestamps count from */
  epoch: string;
  /** base58check version byte for addresses */
  addressVersion: number;
  /** default fee per type, in the smallest unit */
  fees: { [K in TransactionType]: bigint };
};

const DEFAULT_FEES: NetworkConfig['fees'] = {
  [TransactionType.Transfer]: 10_000_000n,
  [TransactionType.SecondSignature]: 500_000_000n,
  [TransactionType.DelegateRegistration]: 2_500_000_000n,
  [TransactionType.Vote]: 100_000_000n,
  [TransactionType.MultiSignature]: 500_000_000n,
};

export const NETWORKS: Record<NetworkName, NetworkConfig> = {
  mainnet: {
    name: 'mainnet',
    epoch: '2017-03-21T13:00:00.000Z',
    addressVersion: 0x19,
    fees: DEFAULT_FEES,
  },
  testnet: {
    name: 'testnet',
    epoch: '2017-03-21T13:00:00.000Z',
    addressVersion: 0x52,
    fees: DEFAULT_FEES,
  },
};

export const NETWORK_ENV = 'TXCANON_NETWORK';

function isNetworkName(x: string): x is NetworkName {
  return Object.prototype.hasOwnProperty.call(NETWORKS, x);
}

/** Explicit name, then $TXCANON_NETWORK, then mainnet. */
export function resolveNetwork(name?: string): NetworkConfig {
  const n = String(name ?? process.env[NETWORK_ENV] ?? 'mainnet').trim().toLowerCase();
  if (!isNetworkName(n)) {
    throw new Error(`unknown network "${n}" (expected one of: ${Object.keys(NETWORKS).join(', ')})`);
  }
  return NETWORKS[n];
}
