import {RunConfig} from "../config/runConfig";
import {AccountWorker} from "../services/AccountWorker";
import {TransactionBuilder} from "../services/TransactionBuilder";
import {Clock, RandomSource, systemClock} from "../shared/clock";
import {Logger, createLogger} from "../shared/logger";
import {BatchSummary, BuyParams, TargetMap, WorkerResult} from "../types/worker.types";
import {ChainClientFactory, connectChainClient, createEthersChainClient, proxyLabel} from "./chain";
import {runPool} from "./pool";

export interface BatchInput {
  privateKeys: readonly string[];
  proxies: readonly string[];
  targets: TargetMap;
  buy: BuyParams;
}

export interface BatchDeps {
  createClient?: ChainClientFactory;
  clock?: Clock;
  random?: RandomSource;
  logger?: Logger;
}

/** Round-robin by 1-based account position: account i gets proxies[(i - 1) % n]. */
export function proxyForIndex(proxies: readonly string[], position: number): string | null {
  if (proxies.length === 0) {
    return null;
  }
  return proxies[(position - 1) % proxies.length];
}

export function summarize(results: readonly WorkerResult[], failedTasks: number): BatchSummary {
  let totalApprovals = 0;
  let totalBuys = 0;
  let totalSkipped = 0;
  for (const result of results) {
    totalApprovals += result.approvalsSent;
    totalBuys += result.buysSent;
    totalSkipped += result.approvalsSkipped;
  }

  return {
    accounts: results.length,
    failedAccounts: failedTasks + results.filter((result) => result.status === "FAILED").length,
    totalApprovals,
    totalBuys,
    totalSkipped,
    results: [...results]
  };
}

/**
 * One AccountWorker per private key on a pool of `config.maxWorkers`.
 * A task that throws (unreachable RPC, bad key) is logged and left out of
 * the totals; the rest of the batch carries on.
 */
export async function runBatch(config: RunConfig, input: BatchInput, deps: BatchDeps = {}): Promise<BatchSummary> {
  const logger = deps.logger ?? createLogger("orchestrator");
  const createClient = deps.createClient ?? createEthersChainClient;
  const builder = new TransactionBuilder({
    chainId: config.chainId,
    token: config.token,
    approveGasLimit: config.approveGasLimit,
    buyGasLimit: config.buyGasLimit
  });

  logger.info("batch-started", {
    accounts: input.privateKeys.length,
    maxWorkers: config.maxWorkers,
    proxies: input.proxies.length,
    groups: input.targets.size
  });

  const settled = await runPool(input.privateKeys, config.maxWorkers, async (privateKey, index) => {
    const proxyUrl = proxyForIndex(input.proxies, index + 1);
    const chain = await connectChainClient(
      {rpcUrl: config.rpcUrl, chainId: config.chainId, requestTimeoutMs: config.requestTimeoutMs, proxyUrl},
      createClient
    );
    const worker = new AccountWorker(
      privateKey,
      {
        token: config.token,
        tokenDecimals: config.tokenDecimals,
        toggles: config.toggles,
        pacing: config.pacing,
        approvalNonceAdvance: config.approvalNonceAdvance,
        allowanceThreshold: config.allowanceThreshold,
        retryJitterMs: config.retryJitterMs,
        buy: input.buy
      },
      {
        chain,
        builder,
        clock: deps.clock ?? systemClock,
        random: deps.random,
        logger: logger.child({position: index + 1, proxy: proxyLabel(proxyUrl)})
      }
    );
    return worker.run(input.targets);
  });

  const results: WorkerResult[] = [];
  let failedTasks = 0;
  for (const outcome of settled) {
    if (outcome.status === "fulfilled") {
      results.push(outcome.value);
      continue;
    }
    failedTasks += 1;
    logger.error("account-task-failed", {position: outcome.index + 1, error: outcome.reason});
  }

  const summary = summarize(results, failedTasks);
  logger.info("batch-finished", {
    accounts: summary.accounts,
    failedAccounts: summary.failedAccounts,
    totalApprovals: summary.totalApprovals,
    totalBuys: summary.totalBuys,
    totalSkipped: summary.totalSkipped
  });
  return summary;
}
