// packages/transactions/src/json.ts
import { parseBody } from './assets.js';
import { InvalidTransactionError, MissingFeeError } from './errors.js';
import type { SignatureFields, TransactionData, TransactionJSON, UnsignedTransactionData } from './types.js';

export type ParsedTransaction = {
  data: UnsignedTransactionData;
  signatures: SignatureFields;
  /** id as received; the caller compares it with the recomputed one */
  id?: string;
};

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === 'object' && x !== null && !Array.isArray(x);
}

function optionalString(obj: Record<string, unknown>, key: string): string | undefined {
  const v = obj[key];
  if (v === undefined || v === null || v === '') return undefined;
  if (typeof v !== 'string') throw new InvalidTransactionError(`${key} must be a string`);
  return v;
}

function requiredString(obj: Record<string, unknown>, key: string): string {
  const v = optionalString(obj, key);
  if (v === undefined) throw new InvalidTransactionError(`${key} is required`);
  return v;
}

/** u64 from a bigint, a decimal string or a safe integer. */
export function parseU64(v: unknown, key: string): bigint {
  if (typeof v === 'bigint' && v >= 0n && v < 1n << 64n) return v;
  if (typeof v === 'number' && Number.isSafeInteger(v) && v >= 0) return BigInt(v);
  if (typeof v === 'string' && /^\d+$/.test(v)) {
    const n = BigInt(v);
    if (n < 1n << 64n) return n;
  }
  throw new InvalidTransactionError(`${key} must be an unsigned 64-bit integer`);
}

function parseTimestamp(v: unknown): number {
  if (typeof v !== 'number' || !Number.isInteger(v) || v < 0 || v > 0xffffffff) {
    throw new InvalidTransactionError('timestamp must be an unsigned 32-bit integer');
  }
  return v;
}

export function parseTransactionJSON(json: unknown): ParsedTransaction {
  if (!isRecord(json)) throw new InvalidTransactionError('transaction must be a JSON object');

  const fee = json.fee === undefined || json.fee === null ? undefined : parseU64(json.fee, 'fee');

  const data: UnsignedTransactionData = {
    ...parseBody(json.type, json.asset),
    timestamp: parseTimestamp(json.timestamp),
    senderPublicKey: requiredString(json, 'senderPublicKey'),
    requesterPublicKey: optionalString(json, 'requesterPublicKey'),
    recipientId: optionalString(json, 'recipientId'),
    vendorField: optionalString(json, 'vendorField'),
    amount: json.amount === undefined ? 0n : parseU64(json.amount, 'amount'),
    fee,
  };

  return {
    data,
    signatures: {
      signature: optionalString(json, 'signature'),
      secondSignature: optionalString(json, 'secondSignature'),
    },
    id: optionalString(json, 'id'),
  };
}

export function toTransactionJSON(tx: TransactionData, id: string): TransactionJSON {
  if (tx.fee == null) throw new MissingFeeError();

  const out: TransactionJSON = {
    id,
    type: tx.type,
    timestamp: tx.timestamp,
    senderPublicKey: tx.senderPublicKey,
    amount: tx.amount.toString(),
    fee: tx.fee.toString(),
    asset: tx.asset,
  };
  if (tx.requesterPublicKey) out.requesterPublicKey = tx.requesterPublicKey;
  if (tx.recipientId) out.recipientId = tx.recipientId;
  if (tx.vendorField) out.vendorField = tx.vendorField;
  if (tx.signature) out.signature = tx.signature;
  if (tx.secondSignature) out.secondSignature = tx.secondSignature;
  return out;
}
