import {Contract, FetchRequest, JsonRpcProvider, Network} from "ethers";
import {HttpsProxyAgent} from "https-proxy-agent";
import {IChainClient} from "../interfaces/IChainClient";
import {TxReceipt} from "../types/chain.types";
import {TOKEN_ABI} from "./abis";

export interface EthersChainClientConfig {
  rpcUrl: string;
  chainId: number;
  requestTimeoutMs: number;
  proxyUrl?: string | null;
}

export function createProvider(config: EthersChainClientConfig): JsonRpcProvider {
  const request = new FetchRequest(config.rpcUrl);
  request.timeout = config.requestTimeoutMs;
  if (config.proxyUrl) {
    request.getUrlFunc = FetchRequest.createGetUrlFunc({agent: new HttpsProxyAgent(config.proxyUrl)});
  }

  // The chain id is known up front; a static network skips eth_chainId polling.
  const network = Network.from(config.chainId);
  return new JsonRpcProvider(request, network, {staticNetwork: network, batchMaxCount: 1});
}

export class EthersChainClient implements IChainClient {
  private readonly provider: JsonRpcProvider;
  private readonly tokens = new Map<string, Contract>();

  constructor(config: EthersChainClientConfig, provider: JsonRpcProvider = createProvider(config)) {
    this.provider = provider;
  }

  async getBlockNumber(): Promise<number> {
    return this.provider.getBlockNumber();
  }

  async getPendingNonce(address: string): Promise<number> {
    return this.provider.getTransactionCount(address, "pending");
  }

  /** Legacy gas price from a single eth_gasPrice call. */
  async getGasPrice(): Promise<bigint> {
    const result: unknown = await this.provider.send("eth_gasPrice", []);
    if (typeof result !== "string" || !/^0x[0-9a-f]+$/i.test(result)) {
      throw new Error(`gas-price-unavailable: ${String(result)}`);
    }
    return BigInt(result);
  }

  async getTokenBalance(token: string, owner: string): Promise<bigint> {
    const balance = await this.token(token).balanceOf(owner);
    return BigInt(balance);
  }

  async getAllowance(token: string, owner: string, spender: string): Promise<bigint> {
    const allowance = await this.token(token).allowance(owner, spender);
    return BigInt(allowance);
  }

  async sendRawTransaction(raw: string): Promise<string> {
    const response = await this.provider.broadcastTransaction(raw);
    return response.hash;
  }

  async getReceipt(txHash: string): Promise<TxReceipt | null> {
    const receipt = await this.provider.getTransactionReceipt(txHash);
    if (!receipt) {
      return null;
    }

    return {
      txHash,
      blockNumber: receipt.blockNumber,
      reverted: receipt.status === 0 // 0 = reverted, 1 = success
    };
  }

  private token(address: string): Contract {
    let contract = this.tokens.get(address);
    if (!contract) {
      contract = new Contract(address, TOKEN_ABI, this.provider);
      this.tokens.set(address, contract);
    }
    return contract;
  }
}
