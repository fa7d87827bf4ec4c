// packages/transactions/src/codec.ts
// Fixed-width byte encodings for each transaction field.

import { base58checkDecode, concat, hexToBytes, uint32le, uint64le } from '@txcanon/utils';
import { COMPRESSED_PUBLIC_KEY_LENGTH, ADDRESS_LENGTH } from '@txcanon/crypto';

import {
  InvalidAddressError,
  MalformedHexError,
  MalformedKeyError,
  MissingFeeError,
  VendorFieldTooLongError,
} from './errors.js';

export const RECIPIENT_LENGTH = ADDRESS_LENGTH;
export const VENDOR_FIELD_LENGTH = 64;

export function encodeType(type: number): Uint8Array {
  if (!Number.isInteger(type) || type < 0 || type > 0xff) {
    throw new RangeError(`type ${type} does not fit in one byte`);
  }
  return Uint8Array.of(type);
}

export function encodeTimestamp(timestamp: number): Uint8Array {
  return uint32le(timestamp);
}

export function encodePublicKey(hex: string, field = 'senderPublicKey'): Uint8Array {
  let bytes: Uint8Array;
  try {
    bytes = hexToBytes(hex);
  } catch (err) {
    throw new MalformedKeyError(field, 'not a valid hex string', { cause: err });
  }
  if (bytes.length !== COMPRESSED_PUBLIC_KEY_LENGTH) {
    throw new MalformedKeyError(field, `expected ${COMPRESSED_PUBLIC_KEY_LENGTH} bytes, got ${bytes.length}`);
  }
  return bytes;
}

/** 21 raw address bytes (version + hash), or 21 zero bytes when there is no recipient. */
export function encodeRecipient(recipientId?: string): Uint8Array {
  if (!recipientId) return new Uint8Array(RECIPIENT_LENGTH);

  let decoded: { version: number; payload: Uint8Array };
  try {
    decoded = base58checkDecode(recipientId);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new InvalidAddressError(recipientId, detail, { cause: err });
  }

  const raw = concat(Uint8Array.of(decoded.version), decoded.payload);
  if (raw.length !== RECIPIENT_LENGTH) {
    throw new InvalidAddressError(recipientId, `expected ${RECIPIENT_LENGTH} bytes, got ${raw.length}`);
  }
  return raw;
}

/** Hex vendor field right-padded with zeros to 64 bytes; 64 zeros when absent. */
export function encodeVendorField(vendorField?: string): Uint8Array {
  const out = new Uint8Array(VENDOR_FIELD_LENGTH);
  if (!vendorField) return out;

  let bytes: Uint8Array;
  try {
    bytes = hexToBytes(vendorField);
  } catch (err) {
    throw new MalformedHexError('vendorField', { cause: err });
  }
  if (bytes.length > VENDOR_FIELD_LENGTH) {
    throw new VendorFieldTooLongError(bytes.length, VENDOR_FIELD_LENGTH);
  }

  out.set(bytes);
  return out;
}

export function encodeAmount(amount: bigint): Uint8Array {
  return uint64le(amount);
}

export function encodeFee(fee: bigint | undefined): Uint8Array {
  if (fee == null) throw new MissingFeeError();
  return uint64le(fee);
}

export function encodeSignature(hex: string, field: 'signature' | 'secondSignature'): Uint8Array {
  try {
    return hexToBytes(hex);
  } catch (err) {
    throw new MalformedHexError(field, { cause: err });
  }
}
