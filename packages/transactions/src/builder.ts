// packages/transactions/src/builder.ts
import { bytesToHex, utf8ToBytes } from '@txcanon/utils';
import { addressFromPublicKey, derivePublicKey, validateAddress } from '@txcanon/crypto';

import { parseBody } from './assets.js';
import { InvalidAddressError } from './errors.js';
import { parseU64 } from './json.js';
import { resolveNetwork, type NetworkConfig } from './network.js';
import { getTime, systemClock, type Clock } from './slot.js';
import { Transaction } from './transaction.js';
import { TransactionType, type TransactionBody } from './types.js';

export type BuilderOptions = {
  /** preset name or a full config; defaults to resolveNetwork() */
  network?: NetworkConfig | string;
  clock?: Clock;
};

/**
 * Collects the fields of one transaction and produces a validated, unsigned
 * `Transaction`. The sender key comes from the secret; the secret itself is
 * not kept.
 */
export class TransactionBuilder {
  readonly network: NetworkConfig;
  readonly senderPublicKey: string;

  private body: TransactionBody | undefined;
  private ts: number;
  private amountValue = 0n;
  private feeValue: bigint | undefined;
  private recipientId: string | undefined;
  private vendorFieldHex: string | undefined;
  private requesterPublicKey: string | undefined;

  constructor(secret: string | Uint8Array, options: BuilderOptions = {}) {
    this.network =
      typeof options.network === 'object' ? options.network : resolveNetwork(options.network);
    this.senderPublicKey = derivePublicKey(secret);
    this.ts = getTime(this.network.epoch, (options.clock ?? systemClock)());
  }

  get senderAddress(): string {
    return addressFromPublicKey(this.senderPublicKey, this.network.addressVersion);
  }

  transfer(recipientId: string, amount: bigint | number): this {
    if (!validateAddress(recipientId, this.network.addressVersion)) {
      throw new InvalidAddressError(recipientId, `not a ${this.network.name} address`);
    }
    return this.select({ type: TransactionType.Transfer, asset: {} }, recipientId, parseU64(amount, 'amount'));
  }

  secondSignature(secondSecret: string | Uint8Array): this {
    return this.select({
      type: TransactionType.SecondSignature,
      asset: { signature: { publicKey: derivePublicKey(secondSecret) } },
    });
  }

  delegate(username: string): this {
    return this.select({
      type: TransactionType.DelegateRegistration,
      asset: { delegate: { username: username.toLowerCase(), publicKey: this.senderPublicKey } },
    });
  }

  /** Votes are sent to the voter's own address. */
  vote(votes: string[]): this {
    return this.select({ type: TransactionType.Vote, asset: { votes: [...votes] } }, this.senderAddress);
  }

  multiSignature(min: number, lifetime: number, publicKeys: string[]): this {
    const keysgroup = publicKeys.map((k) => (k.startsWith('+') ? k : `+${k}`));
    return this.select({ type: TransactionType.MultiSignature, asset: { multisignature: { min, lifetime, keysgroup } } });
  }

  private select(body: TransactionBody, recipientId?: string, amount = 0n): this {
    this.body = body;
    this.recipientId = recipientId;
    this.amountValue = amount;
    return this;
  }

  vendorField(hex: string): this {
    this.vendorFieldHex = hex;
    return this;
  }

  vendorFieldText(text: string): this {
    return this.vendorField(bytesToHex(utf8ToBytes(text)));
  }

  requester(publicKey: string): this {
    this.requesterPublicKey = publicKey;
    return this;
  }

  fee(value: bigint | number): this {
    this.feeValue = parseU64(value, 'fee');
    return this;
  }

  timestamp(value: number): this {
    this.ts = value;
    return this;
  }

  build(): Transaction {
    if (!this.body) throw new Error('TransactionBuilder: no transaction type selected');

    const body = parseBody(this.body.type, this.body.asset);

    const tx = new Transaction({
      ...body,
      timestamp: this.ts,
      senderPublicKey: this.senderPublicKey,
      requesterPublicKey: this.requesterPublicKey,
      recipientId: this.recipientId,
      vendorField: this.vendorFieldHex,
      amount: this.amountValue,
      fee: this.feeValue ?? this.network.fees[body.type],
    });

    // surfaces any remaining field error before the caller signs
    tx.getBytes();
    return tx;
  }
}
