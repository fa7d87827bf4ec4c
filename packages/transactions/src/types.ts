// packages/transactions/src/types.ts

export const TransactionType = {
  Transfer: 0,
  SecondSignature: 1,
  DelegateRegistration: 2,
  Vote: 3,
  MultiSignature: 4,
} as const;

export type TransactionType = (typeof TransactionType)[keyof typeof TransactionType];

export type TransferAsset = Record<string, never>;

export type SecondSignatureAsset = {
  signature: { publicKey: string };
};

export type DelegateAsset = {
  delegate: { username: string; publicKey: string };
};

/** Each vote is "+<publicKey>" or "-<publicKey>". */
export type VoteAsset = {
  votes: string[];
};

/** keysgroup entries are "+<publicKey>". lifetime is in hours. */
export type MultiSignatureAsset = {
  multisignature: { min: number; lifetime: number; keysgroup: string[] };
};

export type TransactionBody =
  | { type: typeof TransactionType.Transfer; asset: TransferAsset }
  | { type: typeof TransactionType.SecondSignature; asset: SecondSignatureAsset }
  | { type: typeof TransactionType.DelegateRegistration; asset: DelegateAsset }
  | { type: typeof TransactionType.Vote; asset: VoteAsset }
  | { type: typeof TransactionType.MultiSignature; asset: MultiSignatureAsset };

/** Fields shared by every transaction type, in canonical byte order. */
export type TransactionFields = {
  timestamp: number;
  senderPublicKey: string;
  requesterPublicKey?: string;
  recipientId?: string;
  vendorField?: string;
  amount: bigint;
  fee?: bigint;
};

export type UnsignedTransactionData = TransactionFields & TransactionBody;

export type SignatureFields = {
  signature?: string;
  secondSignature?: string;
};

export type TransactionData = UnsignedTransactionData & SignatureFields;

export type EncodeOptions = {
  includeSignature: boolean;
  includeSecondSignature: boolean;
};

/** Transport/display projection. Amounts are decimal strings (u64 does not fit a JSON number). */
export type TransactionJSON = {
  id: string;
  type: TransactionType;
  timestamp: number;
  senderPublicKey: string;
  requesterPublicKey?: string;
  recipientId?: string;
  vendorField?: string;
  amount: string;
  fee: string;
  asset: TransactionBody['asset'];
  signature?: string;
  secondSignature?: string;
};
