// packages/transactions/src/encoder.ts
//
// Canonical byte layout (fixed order):
//   type u8 | timestamp u32le | senderPublicKey 33 | [requesterPublicKey 33]
//   | recipient 21 | vendorField 64 | amount u64le | fee u64le | asset ...
//   | [signature] | [secondSignature]
//
// The requester key is the only optional section before the asset; everything
// else has a fixed width so amount sits at the same offset for every
// transaction without one.

import { ByteBuffer, debugLog, bytesToHex } from '@txcanon/utils';

import { encodeAsset, isTransactionType } from './assets.js';
import {
  encodeAmount,
  encodeFee,
  encodePublicKey,
  encodeRecipient,
  encodeSignature,
  encodeTimestamp,
  encodeType,
  encodeVendorField,
} from './codec.js';
import { MissingSignatureError, UnrecognizedTypeError } from './errors.js';
import type { EncodeOptions, TransactionData } from './types.js';

export const UNSIGNED: EncodeOptions = { includeSignature: false, includeSecondSignature: false };

export function encodeTransaction(tx: TransactionData, options: EncodeOptions = UNSIGNED): Uint8Array {
  const type: unknown = tx.type;
  if (!isTransactionType(type)) throw new UnrecognizedTypeError(type);

  const buffer = new ByteBuffer();

  buffer.writeBytes(encodeType(tx.type));
  buffer.writeBytes(encodeTimestamp(tx.timestamp));
  buffer.writeBytes(encodePublicKey(tx.senderPublicKey));

  if (tx.requesterPublicKey) {
    buffer.writeBytes(encodePublicKey(tx.requesterPublicKey, 'requesterPublicKey'));
  }

  buffer.writeBytes(encodeRecipient(tx.recipientId));
  buffer.writeBytes(encodeVendorField(tx.vendorField));
  buffer.writeBytes(encodeAmount(tx.amount));
  buffer.writeBytes(encodeFee(tx.fee));

  const withAsset = encodeAsset(buffer, tx);

  if (options.includeSignature) {
    if (!tx.signature) throw new MissingSignatureError('signature');
    withAsset.writeBytes(encodeSignature(tx.signature, 'signature'));
  }

  if (options.includeSecondSignature) {
    if (!tx.secondSignature) throw new MissingSignatureError('secondSignature');
    withAsset.writeBytes(encodeSignature(tx.secondSignature, 'secondSignature'));
  }

  const bytes = withAsset.toBytes();
  debugLog('tx', `encoded type=${tx.type} len=${bytes.length}`, bytesToHex(bytes));
  return bytes;
}
