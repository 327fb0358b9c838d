import {TxReceipt} from "../types/chain.types";

/**
 * Interface for blockchain interaction, one instance per account.
 * Implementations: FakeChainClient (tests), EthersChainClient (production)
 */
export interface IChainClient {
  getBlockNumber(): Promise<number>;

  /**
   * Transaction count including the pending pool
   * @param address - Account address
   */
  getPendingNonce(address: string): Promise<number>;

  getGasPrice(): Promise<bigint>;

  getTokenBalance(token: string, owner: string): Promise<bigint>;

  getAllowance(token: string, owner: string, spender: string): Promise<bigint>;

  /**
   * Broadcast a signed transaction
   * @param raw - Serialized signed transaction
   * @returns Transaction hash
   */
  sendRawTransaction(raw: string): Promise<string>;

  /**
   * Get transaction receipt
   * @param txHash - Transaction hash
   * @returns Receipt or null if not mined yet
   */
  getReceipt(txHash: string): Promise<TxReceipt | null>;
}
