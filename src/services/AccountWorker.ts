import {MaxUint256, Wallet} from "ethers";
import {IChainClient} from "../interfaces/IChainClient";
import {Clock, RandomSource, systemClock} from "../shared/clock";
import {ContractCallError, InvalidInputError, NonceFetchError, RunnerError} from "../shared/errors";
import {Logger, createLogger} from "../shared/logger";
import {SignedPayload, SubmissionResult, TransactionIntent, TxFees} from "../types/chain.types";
import {
  ApprovalNonceAdvance,
  BuyParams,
  FeatureToggles,
  PacingConfig,
  TargetMap,
  WorkerResult,
  WorkerStatus
} from "../types/worker.types";
import {fromSmallestUnit} from "../worker/units";
import {AllowanceOracle} from "./AllowanceOracle";
import {SubmissionPipeline} from "./SubmissionPipeline";
import {TransactionBuilder} from "./TransactionBuilder";

export interface AccountWorkerConfig {
  token: string;
  tokenDecimals: number;
  toggles: FeatureToggles;
  pacing: PacingConfig;
  approvalNonceAdvance: ApprovalNonceAdvance;
  allowanceThreshold: bigint;
  retryJitterMs: number;
  buy: BuyParams;
}

export interface AccountWorkerDeps {
  chain: IChainClient;
  builder: TransactionBuilder;
  clock?: Clock;
  random?: RandomSource;
  logger?: Logger;
}

type BalanceGate =
  | {kind: "ok"}
  | {kind: "insufficient"; balance: bigint}
  | {kind: "error"; error: ContractCallError};

type ApprovalOutcome =
  | {kind: "skipped"}
  | {kind: "not-sent"; error: RunnerError}
  | {kind: "sent"; result: SubmissionResult};

type Submission =
  | {ok: true; txHash: string; nonce: number}
  | {ok: false; error: RunnerError};

/**
 * Runs approve -> buy over every target for one account. Sequential by
 * construction: this instance is the only writer of `nonce`, and each
 * transaction is signed with the value current at that moment.
 */
export class AccountWorker {
  readonly address: string;
  private state: WorkerStatus = "INIT";
  private nonce = 0;
  private approvalsSent = 0;
  private buysSent = 0;
  private approvalsSkipped = 0;

  private readonly wallet: Wallet;
  private readonly chain: IChainClient;
  private readonly builder: TransactionBuilder;
  private readonly oracle: AllowanceOracle;
  private readonly pipeline: SubmissionPipeline;
  private readonly clock: Clock;
  private readonly random: RandomSource;
  private readonly logger: Logger;

  constructor(
    privateKey: string,
    private readonly config: AccountWorkerConfig,
    deps: AccountWorkerDeps
  ) {
    this.wallet = new Wallet(privateKey);
    this.address = this.wallet.address;
    this.chain = deps.chain;
    this.builder = deps.builder;
    this.clock = deps.clock ?? systemClock;
    this.random = deps.random ?? Math.random;
    this.logger = (deps.logger ?? createLogger("worker")).child({account: this.address});
    this.oracle = new AllowanceOracle(this.chain, config.token, config.allowanceThreshold, this.logger);
    this.pipeline = new SubmissionPipeline(
      this.chain,
      {
        sendRetries: config.pacing.sendRetries,
        retryDelayMs: config.pacing.retryDelayMs,
        retryJitterMs: config.retryJitterMs
      },
      this.clock,
      this.random,
      this.logger
    );
  }

  get status(): WorkerStatus {
    return this.state;
  }

  async run(targets: TargetMap): Promise<WorkerResult> {
    if (this.state !== "INIT") {
      throw new InvalidInputError(`worker-already-started: ${this.address}`);
    }

    try {
      this.nonce = await this.chain.getPendingNonce(this.address);
    } catch (cause) {
      const error = new NonceFetchError(this.address, cause);
      this.logger.error("nonce-fetch-failed", {error});
      this.state = "FAILED";
      return this.result();
    }

    this.state = "RUNNING";
    this.logger.info("worker-started", {nonce: this.nonce});

    for (const [group, markets] of targets) {
      for (const market of markets) {
        await this.processTarget(group, market);
      }
    }

    this.state = "DONE";
    const result = this.result();
    this.logger.info("worker-done", {
      approvalsSent: result.approvalsSent,
      buysSent: result.buysSent,
      approvalsSkipped: result.approvalsSkipped
    });
    return result;
  }

  private async processTarget(group: string, market: string): Promise<void> {
    const gate = await this.checkBalance();
    if (gate.kind === "error") {
      this.logger.error("balance-read-failed", {group, target: market, error: gate.error});
      return;
    }
    if (gate.kind === "insufficient") {
      this.logger.warn("balance-insufficient", {
        group,
        target: market,
        balance: fromSmallestUnit(gate.balance, this.config.tokenDecimals),
        required: fromSmallestUnit(this.config.buy.investment, this.config.tokenDecimals)
      });
      return;
    }

    if (this.config.toggles.approve) {
      const outcome = await this.approve(market);
      this.logger.debug("approve-step-finished", {
        group,
        target: market,
        outcome: outcome.kind,
        ...(outcome.kind === "sent" ? outcome.result : {})
      });
    }

    if (this.config.toggles.buy) {
      await this.buy(market);
    }
  }

  private async checkBalance(): Promise<BalanceGate> {
    try {
      const balance = await this.chain.getTokenBalance(this.config.token, this.address);
      return balance < this.config.buy.investment ? {kind: "insufficient", balance} : {kind: "ok"};
    } catch (cause) {
      return {kind: "error", error: new ContractCallError("balanceOf", this.config.token, cause)};
    }
  }

  private async approve(market: string): Promise<ApprovalOutcome> {
    if (this.config.toggles.checkAllowance && (await this.oracle.sufficient(this.address, market))) {
      this.approvalsSkipped += 1;
      this.logger.info("approve-skipped", {target: market});
      return {kind: "skipped"};
    }

    const amount = this.config.toggles.useMaxAllowance ? MaxUint256 : this.config.allowanceThreshold;
    const submission = await this.submit((fees) => this.builder.buildApprove(market, amount, fees));
    if (!submission.ok) {
      this.logger.error("approve-failed", {target: market, error: submission.error});
      await this.clock.sleep(this.config.pacing.failurePauseMs);
      return {kind: "not-sent", error: submission.error};
    }

    const {txHash, nonce} = submission;
    this.logger.info("approve-sent", {target: market, txHash, nonce});
    if (this.config.approvalNonceAdvance === "on-send") {
      this.nonce = nonce + 1;
    }

    const inclusion = await this.pipeline.waitForInclusion(
      txHash,
      this.config.pacing.approveReceiptTimeoutMs,
      this.config.pacing.approveReceiptPollMs
    );
    if (inclusion.kind === "timeout") {
      this.logger.warn("approve-unconfirmed", {target: market, txHash, nonce, error: inclusion.error});
      return {kind: "sent", result: {txHash, inclusion: "unconfirmed"}};
    }
    if (inclusion.receipt.reverted) {
      this.logger.error("approve-reverted", {target: market, txHash, nonce});
      return {kind: "sent", result: {txHash, inclusion: "failed"}};
    }

    if (this.config.approvalNonceAdvance === "on-confirmed-success") {
      this.nonce = nonce + 1;
    }
    this.approvalsSent += 1;
    this.logger.info("approve-confirmed", {target: market, txHash, nonce, blockNumber: inclusion.receipt.blockNumber});
    return {kind: "sent", result: {txHash, inclusion: "confirmed"}};
  }

  private async buy(market: string): Promise<void> {
    const {investment, outcomeIndex, minOutcomeTokens} = this.config.buy;
    const submission = await this.submit((fees) =>
      this.builder.buildBuy(market, investment, outcomeIndex, minOutcomeTokens, fees)
    );
    if (!submission.ok) {
      this.logger.error("buy-failed", {target: market, error: submission.error});
      await this.clock.sleep(this.config.pacing.failurePauseMs);
      return;
    }

    // Fire-and-forget: the nonce moves on as soon as the endpoint accepts the buy.
    this.nonce = submission.nonce + 1;
    this.buysSent += 1;
    this.logger.info("buy-sent", {
      target: market,
      txHash: submission.txHash,
      nonce: submission.nonce,
      outcomeIndex,
      investment
    });

    const thinkMs = this.config.pacing.thinkTimeMs + Math.floor(this.random() * this.config.pacing.thinkJitterMs);
    await this.clock.sleep(thinkMs);
  }

  private async submit(build: (fees: TxFees) => TransactionIntent): Promise<Submission> {
    let gasPrice: bigint;
    try {
      gasPrice = await this.chain.getGasPrice();
    } catch (cause) {
      return {ok: false, error: new ContractCallError("eth_gasPrice", "rpc", cause)};
    }

    let payload: SignedPayload;
    try {
      payload = this.builder.sign(build({nonce: this.nonce, gasPrice}), this.wallet);
    } catch (cause) {
      return {ok: false, error: new InvalidInputError(`intent-build-failed: nonce=${this.nonce}`, cause)};
    }

    const sent = await this.pipeline.sendWithRetry(payload);
    if (!sent.ok) {
      if (sent.nonceConflict) {
        await this.resyncNonce();
      }
      return {ok: false, error: sent.error};
    }
    return {ok: true, txHash: sent.txHash, nonce: payload.nonce};
  }

  /** The node's pending count only ever moves the local nonce forward. */
  private async resyncNonce(): Promise<void> {
    try {
      const pending = await this.chain.getPendingNonce(this.address);
      if (pending > this.nonce) {
        this.logger.warn("nonce-resynced", {from: this.nonce, to: pending});
        this.nonce = pending;
      }
    } catch (cause) {
      this.logger.warn("nonce-resync-failed", {error: new NonceFetchError(this.address, cause)});
    }
  }

  private result(): WorkerResult {
    return {
      address: this.address,
      status: this.state === "FAILED" ? "FAILED" : "DONE",
      approvalsSent: this.approvalsSent,
      buysSent: this.buysSent,
      approvalsSkipped: this.approvalsSkipped
    };
  }
}
