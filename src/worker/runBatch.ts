#!/usr/bin/env node
import {loadRunConfig} from "../config/runConfig";
import {InvalidInputError} from "../shared/errors";
import {createLogger} from "../shared/logger";
import {TargetMap} from "../types/worker.types";
import {loadPrivateKeys, loadProxies, targetsFromMarkets} from "./inputs";
import {createHttpMarketFetcher, discoverTargets} from "./markets";
import {runBatch} from "./orchestrator";
import {toSmallestUnit} from "./units";

const logger = createLogger("runBatch");

function splitList(value: string | undefined): string[] {
  return (value ?? "")
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

async function resolveTargets(marketsApiUrl: string): Promise<TargetMap> {
  const markets = splitList(process.env.MARKET_ADDRESSES);
  if (markets.length > 0) {
    return targetsFromMarkets(markets);
  }

  const oracleIds = splitList(process.env.ORACLE_IDS);
  if (oracleIds.length > 0) {
    return discoverTargets(oracleIds, createHttpMarketFetcher(marketsApiUrl));
  }

  throw new InvalidInputError("missing-env:MARKET_ADDRESSES or ORACLE_IDS");
}

async function main() {
  const config = loadRunConfig();
  const privateKeys = loadPrivateKeys(config.privateKeysFile);
  if (privateKeys.length === 0) {
    throw new InvalidInputError(`no-private-keys-in:${config.privateKeysFile}`);
  }
  const proxies = loadProxies(config.proxiesFile);
  const targets = await resolveTargets(config.marketsApiUrl);
  if ([...targets.values()].every((markets) => markets.length === 0)) {
    throw new InvalidInputError("no-targets-resolved");
  }

  const buy = {
    investment: toSmallestUnit(config.buy.investment, config.tokenDecimals),
    outcomeIndex: config.buy.outcomeIndex,
    minOutcomeTokens: config.buy.minOutcomeTokens
  };
  logger.info("buy-parameters", {
    investment: buy.investment,
    decimals: config.tokenDecimals,
    outcomeIndex: buy.outcomeIndex,
    minOutcomeTokens: buy.minOutcomeTokens,
    targets: Object.fromEntries(targets)
  });

  const summary = await runBatch(config, {privateKeys, proxies, targets, buy});
  process.stdout.write(
    `${JSON.stringify({
      accounts: summary.accounts,
      failedAccounts: summary.failedAccounts,
      totalApprovals: summary.totalApprovals,
      totalBuys: summary.totalBuys,
      totalSkipped: summary.totalSkipped
    })}\n`
  );
}

main().catch((error) => {
  logger.error("batch-process-failed", {error});
  process.exitCode = 1;
});
