// packages/transactions/src/errors.ts

/**
 * Stable error codes. Each failure kind has exactly one code so callers and
 * the CLI can branch on `err.code` instead of message text.
 */
export enum ErrorCode {
  MalformedHex = 'malformed_hex',
  MalformedKey = 'malformed_key',
  InvalidAddress = 'invalid_address',
  VendorFieldTooLong = 'vendor_field_too_long',
  MissingFee = 'missing_fee',
  MissingSignature = 'missing_signature',
  UnrecognizedType = 'unrecognized_type',
  InvalidTransaction = 'invalid_transaction',
  Verification = 'verification_failed',
}

export class TransactionError extends Error {
  constructor(public readonly code: ErrorCode, message?: string, options?: { cause?: unknown }) {
    super(message ?? code, options);
    this.name = new.target.name;

    // Extending Error breaks the prototype chain on some targets; restore it.
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class MalformedHexError extends TransactionError {
  constructor(field: string, options?: { cause?: unknown }) {
    super(ErrorCode.MalformedHex, `${field}: not a valid hex string`, options);
  }
}

export class MalformedKeyError extends TransactionError {
  constructor(field: string, detail: string, options?: { cause?: unknown }) {
    super(ErrorCode.MalformedKey, `${field}: ${detail}`, options);
  }
}

export class InvalidAddressError extends TransactionError {
  constructor(address: string, detail: string, options?: { cause?: unknown }) {
    super(ErrorCode.InvalidAddress, `invalid address "${address}": ${detail}`, options);
  }
}

export class VendorFieldTooLongError extends TransactionError {
  constructor(length: number, max: number) {
    super(ErrorCode.VendorFieldTooLong, `vendorField is ${length} bytes, max ${max}`);
  }
}

export class MissingFeeError extends TransactionError {
  constructor() {
    super(ErrorCode.MissingFee, 'fee must be set before encoding');
  }
}

export class MissingSignatureError extends TransactionError {
  constructor(which: 'signature' | 'secondSignature') {
    super(ErrorCode.MissingSignature, `${which} requested but not present`);
  }
}

export class UnrecognizedTypeError extends TransactionError {
  constructor(type: unknown) {
    super(ErrorCode.UnrecognizedType, `unrecognized transaction type: ${String(type)}`);
  }
}

export class InvalidTransactionError extends TransactionError {
  constructor(detail: string, options?: { cause?: unknown }) {
    super(ErrorCode.InvalidTransaction, detail, options);
  }
}

export class VerificationError extends TransactionError {
  constructor(detail: string, options?: { cause?: unknown }) {
    super(ErrorCode.Verification, detail, options);
  }
}
