export type WorkerStatus = "INIT" | "RUNNING" | "DONE" | "FAILED";

/** Group (oracle) id to the market addresses under it, in caller order. */
export type TargetMap = ReadonlyMap<string, readonly string[]>;

export type ApprovalNonceAdvance = "on-send" | "on-confirmed-success";

export interface BuyParams {
  /** Investment in the token's smallest unit. */
  investment: bigint;
  outcomeIndex: number;
  minOutcomeTokens: bigint;
}

export interface FeatureToggles {
  approve: boolean;
  buy: boolean;
  checkAllowance: boolean;
  useMaxAllowance: boolean;
}

export interface PacingConfig {
  sendRetries: number;
  retryDelayMs: number;
  approveReceiptTimeoutMs: number;
  approveReceiptPollMs: number;
  thinkTimeMs: number;
  thinkJitterMs: number;
  failurePauseMs: number;
}

export interface WorkerResult {
  address: string;
  status: Extract<WorkerStatus, "DONE" | "FAILED">;
  approvalsSent: number;
  buysSent: number;
  approvalsSkipped: number;
}

export interface BatchSummary {
  accounts: number;
  failedAccounts: number;
  totalApprovals: number;
  totalBuys: number;
  totalSkipped: number;
  results: WorkerResult[];
}
