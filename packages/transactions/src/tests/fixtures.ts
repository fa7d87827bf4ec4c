import { addressFromPublicKey, derivePublicKey } from '@txcanon/crypto';

import type { TransactionData, TransactionFields, UnsignedTransactionData } from '../types.js';

/** 33 bytes; the encoder does not check that a key is on the curve. */
export const FIXED_KEY = '03' + 'ab'.repeat(32);
export const REQUESTER_KEY = '02' + 'cd'.repeat(32);

export const SECRET = 'test-secret';
export const SECOND_SECRET = 'test-second-secret';

export const RECIPIENT = addressFromPublicKey(derivePublicKey('recipient-test-secret'), 0x19);

export function transferData(overrides: Partial<TransactionFields> = {}): UnsignedTransactionData {
  return {
    type: 0,
    asset: {},
    timestamp: 10000000,
    senderPublicKey: FIXED_KEY,
    amount: 100000000n,
    fee: 10000000n,
    ...overrides,
  };
}

export function signedData(signature: string, secondSignature?: string): TransactionData {
  return { ...transferData(), signature, secondSignature };
}
