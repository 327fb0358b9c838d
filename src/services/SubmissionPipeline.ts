import {isError} from "ethers";
import {IChainClient} from "../interfaces/IChainClient";
import {Clock, RandomSource, systemClock} from "../shared/clock";
import {ReceiptTimeoutError, SubmissionError, describeCause} from "../shared/errors";
import {Logger, createLogger} from "../shared/logger";
import {SignedPayload, TxReceipt} from "../types/chain.types";

export interface SubmissionPipelineConfig {
  sendRetries: number;
  retryDelayMs: number;
  /** Upper bound (exclusive) of the random delay added to each backoff. */
  retryJitterMs: number;
}

export type SendOutcome =
  | {ok: true; txHash: string; attempts: number}
  | {ok: false; error: SubmissionError; attempts: number; nonceConflict: boolean};

export type InclusionOutcome =
  | {kind: "included"; receipt: TxReceipt}
  | {kind: "timeout"; error: ReceiptTimeoutError};

/** The node already holds this exact transaction in its pool. */
export function isAlreadyKnown(error: unknown): boolean {
  return /already known|known transaction/i.test(describeCause(error));
}

/** The nonce is taken, by this payload or by another transaction. */
export function isNonceConflict(error: unknown): boolean {
  if (isError(error, "NONCE_EXPIRED") || isError(error, "REPLACEMENT_UNDERPRICED")) {
    return true;
  }
  return /nonce too low|nonce has already been used|replacement transaction underpriced/i.test(describeCause(error));
}

export class SubmissionPipeline {
  constructor(
    private readonly chain: IChainClient,
    private readonly config: SubmissionPipelineConfig,
    private readonly clock: Clock = systemClock,
    private readonly random: RandomSource = Math.random,
    private readonly logger: Logger = createLogger("submission")
  ) {}

  /**
   * Broadcasts the same signed payload up to `sendRetries` times. Backoff
   * after attempt n is `n * retryDelayMs + jitter`; none after the last one.
   *
   * An earlier attempt may have reached the node even though its response was
   * lost. A later refusal naming this exact transaction, or a nonce conflict
   * while the payload's own receipt exists, counts as accepted. Any other
   * nonce conflict ends the send at once, since resending cannot succeed.
   */
  async sendWithRetry(payload: SignedPayload): Promise<SendOutcome> {
    const maxAttempts = Math.max(1, this.config.sendRetries);
    let lastError: unknown;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        const txHash = await this.chain.sendRawTransaction(payload.raw);
        return {ok: true, txHash, attempts: attempt};
      } catch (error) {
        lastError = error;
        if (isAlreadyKnown(error)) {
          this.logger.warn("send-already-known", {attempt, nonce: payload.nonce, txHash: payload.txHash});
          return {ok: true, txHash: payload.txHash, attempts: attempt};
        }
        if (isNonceConflict(error)) {
          if (attempt > 1 && (await this.landed(payload))) {
            this.logger.warn("send-already-mined", {attempt, nonce: payload.nonce, txHash: payload.txHash});
            return {ok: true, txHash: payload.txHash, attempts: attempt};
          }
          return {ok: false, error: new SubmissionError(attempt, error), attempts: attempt, nonceConflict: true};
        }
        if (attempt === maxAttempts) {
          break;
        }
        const waitMs = attempt * this.config.retryDelayMs + Math.floor(this.random() * this.config.retryJitterMs);
        this.logger.warn("send-failed-retrying", {
          attempt,
          maxAttempts,
          nonce: payload.nonce,
          waitMs,
          error
        });
        await this.clock.sleep(waitMs);
      }
    }

    return {
      ok: false,
      error: new SubmissionError(maxAttempts, lastError),
      attempts: maxAttempts,
      nonceConflict: false
    };
  }

  async waitForInclusion(txHash: string, timeoutMs: number, pollIntervalMs: number): Promise<InclusionOutcome> {
    const deadline = this.clock.now() + timeoutMs;

    while (true) {
      try {
        const receipt = await this.chain.getReceipt(txHash);
        if (receipt) {
          return {kind: "included", receipt};
        }
      } catch (error) {
        this.logger.warn("receipt-poll-failed", {txHash, error});
      }

      const remaining = deadline - this.clock.now();
      if (remaining <= 0) {
        return {kind: "timeout", error: new ReceiptTimeoutError(txHash, timeoutMs)};
      }
      await this.clock.sleep(Math.max(1, Math.min(pollIntervalMs, remaining)));
    }
  }

  private async landed(payload: SignedPayload): Promise<boolean> {
    try {
      return (await this.chain.getReceipt(payload.txHash)) !== null;
    } catch (error) {
      this.logger.warn("receipt-check-failed", {txHash: payload.txHash, error});
      return false;
    }
  }
}
