// packages/transactions/src/assets.ts
// Type-specific asset bytes. Each type appends to the buffer after the fee and
// before any signature; none of them may touch bytes already written.

import { ByteBuffer, utf8ToBytes } from '@txcanon/utils';

import { encodePublicKey } from './codec.js';
import { InvalidTransactionError, UnrecognizedTypeError } from './errors.js';
import { TransactionType, type TransactionBody } from './types.js';

const KNOWN_TYPES: ReadonlySet<number> = new Set(Object.values(TransactionType));

export function isTransactionType(x: unknown): x is TransactionType {
  return typeof x === 'number' && KNOWN_TYPES.has(x);
}

function unrecognized(_body: never, type: unknown): never {
  throw new UnrecognizedTypeError(type);
}

export function encodeAsset(buffer: ByteBuffer, body: TransactionBody): ByteBuffer {
  const type: unknown = body.type;

  switch (body.type) {
    case TransactionType.Transfer:
      return buffer;

    case TransactionType.SecondSignature:
      return buffer.writeBytes(encodePublicKey(body.asset.signature.publicKey, 'asset.signature.publicKey'));

    case TransactionType.DelegateRegistration:
      return buffer.writeBytes(utf8ToBytes(body.asset.delegate.username));

    case TransactionType.Vote:
      return buffer.writeBytes(utf8ToBytes(body.asset.votes.join('')));

    case TransactionType.MultiSignature: {
      const { min, lifetime, keysgroup } = body.asset.multisignature;
      return buffer.writeUint8(min).writeUint8(lifetime).writeBytes(utf8ToBytes(keysgroup.join('')));
    }

    default:
      return unrecognized(body, type);
  }
}

/* -------------------------------------------------------------------------- */
/* Shape checks for assets arriving as untyped JSON                           */
/* -------------------------------------------------------------------------- */

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === 'object' && x !== null && !Array.isArray(x);
}

function requireRecord(x: unknown, path: string): Record<string, unknown> {
  if (!isRecord(x)) throw new InvalidTransactionError(`${path} must be an object`);
  return x;
}

function requireString(x: unknown, path: string): string {
  if (typeof x !== 'string' || x.length === 0) throw new InvalidTransactionError(`${path} must be a non-empty string`);
  return x;
}

function requireStringList(x: unknown, path: string): string[] {
  if (!Array.isArray(x) || x.length === 0) throw new InvalidTransactionError(`${path} must be a non-empty array`);
  return x.map((v, i) => requireString(v, `${path}[${i}]`));
}

function requireByte(x: unknown, path: string): number {
  if (typeof x !== 'number' || !Number.isInteger(x) || x < 0 || x > 0xff) {
    throw new InvalidTransactionError(`${path} must be an integer in 0..255`);
  }
  return x;
}

const VOTE_RE = /^[+-][0-9a-fA-F]{66}$/;
const KEYSGROUP_RE = /^\+[0-9a-fA-F]{66}$/;
const USERNAME_RE = /^[a-z0-9!@$&_.]{1,20}$/;

/** Validate `asset` against the layout its `type` expects and return the typed body. */
export function parseBody(type: unknown, asset: unknown): TransactionBody {
  if (!isTransactionType(type)) throw new UnrecognizedTypeError(type);
  const a: Record<string, unknown> = asset === undefined ? {} : requireRecord(asset, 'asset');

  switch (type) {
    case TransactionType.Transfer:
      if (Object.keys(a).length > 0) throw new InvalidTransactionError('asset must be empty for a transfer');
      return { type, asset: {} };

    case TransactionType.SecondSignature: {
      const sig = requireRecord(a.signature, 'asset.signature');
      return { type, asset: { signature: { publicKey: requireString(sig.publicKey, 'asset.signature.publicKey') } } };
    }

    case TransactionType.DelegateRegistration: {
      const d = requireRecord(a.delegate, 'asset.delegate');
      const username = requireString(d.username, 'asset.delegate.username');
      if (!USERNAME_RE.test(username)) {
        throw new InvalidTransactionError('asset.delegate.username must be 1-20 chars of [a-z0-9!@$&_.]');
      }
      return { type, asset: { delegate: { username, publicKey: requireString(d.publicKey, 'asset.delegate.publicKey') } } };
    }

    case TransactionType.Vote: {
      const votes = requireStringList(a.votes, 'asset.votes');
      for (const v of votes) {
        if (!VOTE_RE.test(v)) throw new InvalidTransactionError(`asset.votes: "${v}" is not +/- followed by a public key`);
      }
      return { type, asset: { votes } };
    }

    case TransactionType.MultiSignature: {
      const m = requireRecord(a.multisignature, 'asset.multisignature');
      const keysgroup = requireStringList(m.keysgroup, 'asset.multisignature.keysgroup');
      for (const k of keysgroup) {
        if (!KEYSGROUP_RE.test(k)) throw new InvalidTransactionError(`asset.multisignature.keysgroup: "${k}" is not + followed by a public key`);
      }
      const min = requireByte(m.min, 'asset.multisignature.min');
      if (min < 1 || min > keysgroup.length) {
        throw new InvalidTransactionError(`asset.multisignature.min must be between 1 and ${keysgroup.length}`);
      }
      return {
        type,
        asset: { multisignature: { min, lifetime: requireByte(m.lifetime, 'asset.multisignature.lifetime'), keysgroup } },
      };
    }
  }
}
