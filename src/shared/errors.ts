export type RunnerErrorCode =
  | "connectivity"
  | "nonce-fetch"
  | "allowance-query"
  | "submission"
  | "receipt-timeout"
  | "contract-call"
  | "invalid-input";

/**
 * Base class for every failure the runner classifies. `cause` keeps the
 * underlying RPC or library error.
 */
export abstract class RunnerError extends Error {
  abstract readonly code: RunnerErrorCode;

  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
  }
}

/** RPC endpoint unreachable while setting up an account's client. */
export class ConnectivityError extends RunnerError {
  readonly code = "connectivity";

  constructor(readonly proxy: string, cause?: unknown) {
    super(`rpc-unreachable: proxy=${proxy}: ${describeCause(cause)}`, cause);
  }
}

export class NonceFetchError extends RunnerError {
  readonly code = "nonce-fetch";

  constructor(readonly address: string, cause?: unknown) {
    super(`nonce-fetch-failed: ${address}`, cause);
  }
}

export class AllowanceQueryError extends RunnerError {
  readonly code = "allowance-query";

  constructor(readonly owner: string, readonly spender: string, cause?: unknown) {
    super(`allowance-query-failed: owner=${owner} spender=${spender}`, cause);
  }
}

export class SubmissionError extends RunnerError {
  readonly code = "submission";

  constructor(readonly attempts: number, cause?: unknown) {
    super(`submission-failed after ${attempts} attempt(s): ${describeCause(cause)}`, cause);
  }
}

export class ReceiptTimeoutError extends RunnerError {
  readonly code = "receipt-timeout";

  constructor(readonly txHash: string, readonly timeoutMs: number) {
    super(`receipt-timeout: ${txHash} not mined within ${timeoutMs}ms`);
  }
}

export class ContractCallError extends RunnerError {
  readonly code = "contract-call";

  constructor(readonly method: string, readonly contract: string, cause?: unknown) {
    super(`contract-call-failed: ${method} on ${contract}: ${describeCause(cause)}`, cause);
  }
}

export class InvalidInputError extends RunnerError {
  readonly code = "invalid-input";
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  if (cause === undefined) {
    return "unknown-error";
  }
  return String(cause);
}
