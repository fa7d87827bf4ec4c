// packages/transactions/src/transaction.ts
import { bytesToHex, debugLog, sha256 } from '@txcanon/utils';
import { deriveKeys, signHash, verifyHash } from '@txcanon/crypto';

import { encodeTransaction } from './encoder.js';
import { InvalidTransactionError, VerificationError } from './errors.js';
import { parseTransactionJSON, toTransactionJSON } from './json.js';
import type {
  EncodeOptions,
  SignatureFields,
  TransactionData,
  TransactionJSON,
  TransactionType,
  UnsignedTransactionData,
} from './types.js';

function deepFreeze<T>(value: T): Readonly<T> {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    const children: unknown[] = Object.values(value);
    for (const v of children) deepFreeze(v);
    Object.freeze(value);
  }
  return value;
}

/**
 * A transaction whose payload is frozen at construction. Only the two
 * signature slots change afterwards:
 *
 *   unsigned --sign()--> signed --secondSign()--> second-signed
 *
 * Hash inputs:
 *   - id and first signature: bytes without either signature
 *   - second signature: bytes with the first signature, without the second
 */
export class Transaction {
  readonly data: Readonly<UnsignedTransactionData>;
  private sig: string | undefined;
  private secondSig: string | undefined;

  constructor(data: UnsignedTransactionData, signatures: SignatureFields = {}) {
    this.data = deepFreeze(structuredClone(data));
    this.sig = signatures.signature;
    this.secondSig = signatures.secondSignature;
  }

  get type(): TransactionType {
    return this.data.type;
  }

  get senderPublicKey(): string {
    return this.data.senderPublicKey;
  }

  get signature(): string | undefined {
    return this.sig;
  }

  get secondSignature(): string | undefined {
    return this.secondSig;
  }

  /** Payload plus whatever signatures are currently set. */
  snapshot(): TransactionData {
    return { ...this.data, signature: this.sig, secondSignature: this.secondSig };
  }

  getBytes(options: Partial<EncodeOptions> = {}): Uint8Array {
    return encodeTransaction(this.snapshot(), {
      includeSignature: options.includeSignature ?? false,
      includeSecondSignature: options.includeSecondSignature ?? false,
    });
  }

  getHash(skipSignature = true, skipSecondSignature = true): Uint8Array {
    return sha256(this.getBytes({ includeSignature: !skipSignature, includeSecondSignature: !skipSecondSignature }));
  }

  getId(): string {
    return bytesToHex(this.getHash(true, true));
  }

  /** Re-signing replaces the previous signature and drops any second signature built on it. */
  sign(secret: string | Uint8Array): this {
    const { privateKey } = deriveKeys(secret);
    if (this.sig !== undefined) {
      debugLog('tx', 're-signing; previous signature and second signature discarded');
      this.secondSig = undefined;
    }
    this.sig = signHash(this.getHash(true, true), privateKey);
    return this;
  }

  /** Throws MissingSignatureError when the first signature is not set yet. */
  secondSign(secret: string | Uint8Array): this {
    const { privateKey } = deriveKeys(secret);
    this.secondSig = signHash(this.getHash(false, true), privateKey);
    return this;
  }

  verify(): boolean {
    if (!this.sig) throw new VerificationError('transaction has no signature');
    return this.check(this.data.senderPublicKey, this.getHash(true, true), this.sig, 'signature');
  }

  /**
   * Second-signature check. The key defaults to the sender's; accounts that
   * registered a separate second key pass it here.
   */
  secondVerify(secondPublicKey: string = this.data.senderPublicKey): boolean {
    if (!this.secondSig) throw new VerificationError('transaction has no second signature');
    return this.check(secondPublicKey, this.getHash(false, true), this.secondSig, 'secondSignature');
  }

  private check(publicKey: string, hash: Uint8Array, signature: string, field: string): boolean {
    try {
      return verifyHash(publicKey, hash, signature);
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      throw new VerificationError(`${field}: ${detail}`, { cause: err });
    }
  }

  toJSON(): TransactionJSON {
    return toTransactionJSON(this.snapshot(), this.getId());
  }

  /** Parse a received transaction; a supplied id must match the recomputed one. */
  static fromJSON(json: unknown): Transaction {
    const parsed = parseTransactionJSON(json);
    const tx = new Transaction(parsed.data, parsed.signatures);

    if (parsed.id !== undefined) {
      const id = tx.getId();
      if (parsed.id !== id) throw new InvalidTransactionError(`id mismatch: got ${parsed.id}, computed ${id}`);
    }
    return tx;
  }
}
