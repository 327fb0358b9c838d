import {Clock, systemClock} from "../shared/clock";
import {createLogger} from "../shared/logger";
import {TargetMap} from "../types/worker.types";
import {normalizeAddresses} from "./inputs";

export type MarketFetcher = (groupId: string) => Promise<string>;

export interface DiscoveryOptions {
  attempts?: number;
  backoffMs?: number;
  clock?: Clock;
}

function readMarketAddress(body: unknown): string | null {
  if (typeof body !== "object" || body === null || !("market" in body)) {
    return null;
  }
  const market = body.market;
  if (typeof market !== "object" || market === null || !("address" in market)) {
    return null;
  }
  return typeof market.address === "string" ? market.address : null;
}

const logger = createLogger("markets");

/**
 * Fetcher for the hourly prophet-market endpoint:
 * GET {baseUrl}/markets/prophet?priceOracleId={id}&frequency=hourly
 */
export function createHttpMarketFetcher(baseUrl: string, timeoutMs = 3_000): MarketFetcher {
  return async (groupId) => {
    const url = new URL("/markets/prophet", baseUrl);
    url.searchParams.set("priceOracleId", groupId);
    url.searchParams.set("frequency", "hourly");

    const response = await fetch(url, {signal: AbortSignal.timeout(timeoutMs)});
    if (!response.ok) {
      throw new Error(`markets-http-${response.status}`);
    }
    const address = readMarketAddress(await response.json());
    if (address === null) {
      throw new Error("markets-response-missing-address");
    }
    return address;
  };
}

/**
 * Resolves each group id to its current market. Groups whose lookup keeps
 * failing are logged and left out; the returned map keeps `groupIds` order.
 */
export async function discoverTargets(
  groupIds: readonly string[],
  fetchMarket: MarketFetcher,
  options: DiscoveryOptions = {}
): Promise<TargetMap> {
  const attempts = options.attempts ?? 3;
  const backoffMs = options.backoffMs ?? 1_000;
  const clock = options.clock ?? systemClock;

  const resolved = await Promise.all(
    groupIds.map(async (groupId) => {
      for (let attempt = 1; attempt <= attempts; attempt++) {
        try {
          return await fetchMarket(groupId);
        } catch (error) {
          if (attempt === attempts) {
            logger.warn("market-discovery-failed", {groupId, attempts, error});
            return null;
          }
          await clock.sleep(backoffMs * attempt);
        }
      }
      return null;
    })
  );

  const targets = new Map<string, readonly string[]>();
  groupIds.forEach((groupId, index) => {
    const address = resolved[index];
    if (address === null) {
      return;
    }
    const markets = normalizeAddresses([address]);
    if (markets.length > 0) {
      targets.set(groupId, markets);
    }
  });
  return targets;
}
