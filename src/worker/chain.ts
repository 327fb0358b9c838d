import {EthersChainClient} from "../infrastructure/EthersChainClient";
import {IChainClient} from "../interfaces/IChainClient";
import {ConnectivityError} from "../shared/errors";
import {createLogger} from "../shared/logger";

export interface ChainConnectOptions {
  rpcUrl: string;
  chainId: number;
  requestTimeoutMs: number;
  proxyUrl: string | null;
}

export type ChainClientFactory = (options: ChainConnectOptions) => IChainClient;

const logger = createLogger("chain");

export const createEthersChainClient: ChainClientFactory = (options) =>
  new EthersChainClient({
    rpcUrl: options.rpcUrl,
    chainId: options.chainId,
    requestTimeoutMs: options.requestTimeoutMs,
    proxyUrl: options.proxyUrl
  });

/**
 * Builds a client for one account's egress and probes it once with
 * eth_blockNumber. No retry: the caller decides what an unreachable
 * endpoint means.
 */
export async function connectChainClient(
  options: ChainConnectOptions,
  createClient: ChainClientFactory = createEthersChainClient
): Promise<IChainClient> {
  const client = createClient(options);
  try {
    const blockNumber = await client.getBlockNumber();
    logger.debug("rpc-connected", {proxy: proxyLabel(options.proxyUrl), blockNumber});
  } catch (error) {
    throw new ConnectivityError(proxyLabel(options.proxyUrl), error);
  }
  return client;
}

export function proxyLabel(proxyUrl: string | null): string {
  if (!proxyUrl) {
    return "DIRECT";
  }
  // Keep proxy credentials out of the logs.
  try {
    const url = new URL(proxyUrl);
    return `${url.protocol}//${url.host}`;
  } catch {
    return "PROXY";
  }
}
