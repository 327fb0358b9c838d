export interface TxReceipt {
  txHash: string;
  blockNumber: number;
  reverted: boolean;
}

/** Unsigned legacy (type 0) transaction, ready to sign. */
export interface TransactionIntent {
  to: string;
  data: string;
  value: bigint;
  nonce: number;
  gasLimit: bigint;
  gasPrice: bigint;
  chainId: number;
}

export interface SignedPayload {
  raw: string;
  txHash: string;
  nonce: number;
}

export interface TxFees {
  nonce: number;
  gasPrice: bigint;
}

/** `failed` is a mined but reverted transaction. */
export type Inclusion = "confirmed" | "unconfirmed" | "failed";

export interface SubmissionResult {
  txHash: string;
  inclusion: Inclusion;
}
