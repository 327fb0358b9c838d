import {Transaction} from "ethers";
import {IChainClient} from "../interfaces/IChainClient";
import {TxReceipt} from "../types/chain.types";
import {MARKET_INTERFACE, TOKEN_INTERFACE} from "./abis";

export type ReceiptMode = "success" | "reverted" | "pending";

export interface SentTransaction {
  txHash: string;
  from: string;
  to: string;
  nonce: number;
  kind: "approve" | "buy" | "other";
  /** Approve: [value]. Buy: [investmentAmount, outcomeIndex, minOutcomeTokensToBuy]. */
  args: bigint[];
  spender?: string;
}

export interface FakeChainOptions {
  pendingNonce?: number;
  gasPrice?: bigint;
  balance?: bigint;
  allowance?: bigint;
  /** Receipt given to approvals; buys always get a successful one. */
  approveReceipt?: ReceiptMode;
}

function key(...parts: string[]): string {
  return parts.map((part) => part.toLowerCase()).join(":");
}

/**
 * In-memory chain for one token. Decodes every raw transaction it accepts,
 * refuses a taken nonce with the error a node would give, and applies
 * successful approvals to its allowance table.
 */
export class FakeChainClient implements IChainClient {
  readonly sent: SentTransaction[] = [];
  sendAttempts = 0;
  allowanceReads = 0;
  failNextSends = 0;
  /** Accepts the next N transactions, then fails as if the response never arrived. */
  loseNextResponses = 0;
  failBlockNumber = false;
  failNonce = false;
  failAllowance = false;
  failBalance = false;
  failGasPrice = false;
  approveReceipt: ReceiptMode;

  private readonly pendingNonce: number;
  private readonly gasPrice: bigint;
  private readonly defaultBalance: bigint;
  private readonly defaultAllowance: bigint;
  private readonly balances = new Map<string, bigint>();
  private readonly allowances = new Map<string, bigint>();
  private readonly receipts = new Map<string, TxReceipt>();
  private readonly nonceHolders = new Map<string, string>();
  private readonly nextNonces = new Map<string, number>();
  private blockNumber = 100;

  constructor(options: FakeChainOptions = {}) {
    this.pendingNonce = options.pendingNonce ?? 0;
    this.gasPrice = options.gasPrice ?? 1_000_000_000n;
    this.defaultBalance = options.balance ?? 0n;
    this.defaultAllowance = options.allowance ?? 0n;
    this.approveReceipt = options.approveReceipt ?? "success";
  }

  async getBlockNumber(): Promise<number> {
    if (this.failBlockNumber) {
      throw new Error("connect ECONNREFUSED");
    }
    return this.blockNumber;
  }

  async getPendingNonce(address: string): Promise<number> {
    if (this.failNonce) {
      throw new Error("429 Too Many Requests");
    }
    return Math.max(this.pendingNonce, this.nextNonces.get(key(address)) ?? 0);
  }

  async getGasPrice(): Promise<bigint> {
    if (this.failGasPrice) {
      throw new Error("gas-price-unavailable");
    }
    return this.gasPrice;
  }

  async getTokenBalance(_token: string, owner: string): Promise<bigint> {
    if (this.failBalance) {
      throw new Error("execution reverted");
    }
    return this.balances.get(key(owner)) ?? this.defaultBalance;
  }

  async getAllowance(_token: string, owner: string, spender: string): Promise<bigint> {
    this.allowanceReads += 1;
    if (this.failAllowance) {
      throw new Error("429 Too Many Requests");
    }
    return this.allowances.get(key(owner, spender)) ?? this.defaultAllowance;
  }

  async sendRawTransaction(raw: string): Promise<string> {
    this.sendAttempts += 1;
    if (this.failNextSends > 0) {
      this.failNextSends -= 1;
      throw new Error("503 Service Unavailable");
    }

    const tx = Transaction.from(raw);
    if (!tx.hash || !tx.from || !tx.to) {
      throw new Error("invalid-raw-transaction");
    }
    const holder = this.nonceHolders.get(key(tx.from, String(tx.nonce)));
    if (holder !== undefined) {
      if (this.receipts.has(holder)) {
        throw new Error("nonce too low");
      }
      throw new Error(holder === tx.hash ? "already known" : "replacement transaction underpriced");
    }
    this.holdNonce(tx.from, tx.nonce, tx.hash);

    const sent = this.decode(tx.hash, tx.from, tx.to, tx.nonce, tx.data);
    this.sent.push(sent);
    this.mine(sent);
    if (this.loseNextResponses > 0) {
      this.loseNextResponses -= 1;
      throw new Error("request timeout");
    }
    return tx.hash;
  }

  async getReceipt(txHash: string): Promise<TxReceipt | null> {
    return this.receipts.get(txHash) ?? null;
  }

  setBalance(owner: string, balance: bigint): void {
    this.balances.set(key(owner), balance);
  }

  setAllowance(owner: string, spender: string, allowance: bigint): void {
    this.allowances.set(key(owner, spender), allowance);
  }

  /** Marks `nonce` as spent by a mined transaction sent from elsewhere. */
  spendNonceExternally(owner: string, nonce: number): void {
    const txHash = `0xexternal:${key(owner)}:${nonce}`;
    this.holdNonce(owner, nonce, txHash);
    this.blockNumber += 1;
    this.receipts.set(txHash, {txHash, blockNumber: this.blockNumber, reverted: false});
  }

  /**
   * Test helper: transactions of one kind, in submission order
   */
  sentOf(kind: SentTransaction["kind"]): SentTransaction[] {
    return this.sent.filter((tx) => tx.kind === kind);
  }

  private holdNonce(owner: string, nonce: number, txHash: string): void {
    this.nonceHolders.set(key(owner, String(nonce)), txHash);
    this.nextNonces.set(key(owner), Math.max(nonce + 1, this.nextNonces.get(key(owner)) ?? 0));
  }

  private decode(txHash: string, from: string, to: string, nonce: number, data: string): SentTransaction {
    const base = {txHash, from, to, nonce};
    const approve = TOKEN_INTERFACE.parseTransaction({data});
    if (approve?.name === "approve") {
      return {...base, kind: "approve", spender: String(approve.args[0]), args: [BigInt(approve.args[1])]};
    }
    const buy = MARKET_INTERFACE.parseTransaction({data});
    if (buy?.name === "buy") {
      return {...base, kind: "buy", args: [BigInt(buy.args[0]), BigInt(buy.args[1]), BigInt(buy.args[2])]};
    }
    return {...base, kind: "other", args: []};
  }

  private mine(tx: SentTransaction): void {
    const mode = tx.kind === "approve" ? this.approveReceipt : "success";
    if (mode === "pending") {
      return;
    }

    this.blockNumber += 1;
    this.receipts.set(tx.txHash, {txHash: tx.txHash, blockNumber: this.blockNumber, reverted: mode === "reverted"});
    if (tx.spender && mode === "success") {
      this.setAllowance(tx.from, tx.spender, tx.args[0]);
    }
  }
}
