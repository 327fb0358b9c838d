import {Wallet} from "ethers";
import {RunConfig} from "../src/config/runConfig";
import {AccountWorkerConfig} from "../src/services/AccountWorker";
import {DEFAULT_ALLOWANCE_THRESHOLD} from "../src/services/AllowanceOracle";
import {TransactionBuilder} from "../src/services/TransactionBuilder";
import {Clock} from "../src/shared/clock";
import {LogContext, LogLevel, Logger} from "../src/shared/logger";

export const TOKEN = "0x00000000000000000000000000000000000000c0";
export const MARKET_A = "0x00000000000000000000000000000000000000a1";
export const MARKET_B = "0x00000000000000000000000000000000000000a2";
export const MARKET_C = "0x00000000000000000000000000000000000000a3";
export const CHAIN_ID = 8453;

export const KEY_1 = `0x${"11".repeat(32)}`;
export const KEY_2 = `0x${"22".repeat(32)}`;
export const KEY_3 = `0x${"33".repeat(32)}`;

export function addressOf(privateKey: string): string {
  return new Wallet(privateKey).address;
}

/** Time only moves when something sleeps. */
export class ManualClock implements Clock {
  current = 0;
  readonly sleeps: number[] = [];

  now(): number {
    return this.current;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.current += ms;
  }
}

export function testBuilder(): TransactionBuilder {
  return new TransactionBuilder({
    chainId: CHAIN_ID,
    token: TOKEN,
    approveGasLimit: 120_000n,
    buyGasLimit: 250_000n
  });
}

export function workerConfig(overrides: Partial<AccountWorkerConfig> = {}): AccountWorkerConfig {
  return {
    token: TOKEN,
    tokenDecimals: 6,
    toggles: {approve: true, buy: true, checkAllowance: false, useMaxAllowance: true},
    pacing: {
      sendRetries: 2,
      retryDelayMs: 5_000,
      approveReceiptTimeoutMs: 5_000,
      approveReceiptPollMs: 3_000,
      thinkTimeMs: 800,
      thinkJitterMs: 400,
      failurePauseMs: 500
    },
    approvalNonceAdvance: "on-send",
    allowanceThreshold: DEFAULT_ALLOWANCE_THRESHOLD,
    retryJitterMs: 1_000,
    buy: {investment: 100_000n, outcomeIndex: 0, minOutcomeTokens: 0n},
    ...overrides
  };
}

export function runConfig(overrides: Partial<RunConfig> = {}): RunConfig {
  const worker = workerConfig();
  return {
    rpcUrl: "http://127.0.0.1:8545",
    chainId: CHAIN_ID,
    requestTimeoutMs: 1_000,
    token: TOKEN,
    tokenDecimals: 6,
    approveGasLimit: 120_000n,
    buyGasLimit: 250_000n,
    toggles: worker.toggles,
    approvalNonceAdvance: "on-send",
    allowanceThreshold: DEFAULT_ALLOWANCE_THRESHOLD,
    pacing: worker.pacing,
    retryJitterMs: 1_000,
    maxWorkers: 2,
    buy: {investment: "0.1", outcomeIndex: 0, minOutcomeTokens: 0n},
    privateKeysFile: "private_keys.txt",
    proxiesFile: "proxies.txt",
    marketsApiUrl: "http://127.0.0.1:9999",
    ...overrides
  };
}

export interface RecordedEntry {
  level: LogLevel;
  message: string;
  context: LogContext;
}

/** Keeps entries in memory; children share the parent's entry list. */
export class RecordingLogger implements Logger {
  constructor(
    readonly entries: RecordedEntry[] = [],
    private readonly bound: LogContext = {}
  ) {}

  debug(message: string, context?: LogContext): void {
    this.record("debug", message, context);
  }

  info(message: string, context?: LogContext): void {
    this.record("info", message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.record("warn", message, context);
  }

  error(message: string, context?: LogContext): void {
    this.record("error", message, context);
  }

  child(bound: LogContext): Logger {
    return new RecordingLogger(this.entries, {...this.bound, ...bound});
  }

  messages(): string[] {
    return this.entries.map((entry) => entry.message);
  }

  private record(level: LogLevel, message: string, context?: LogContext): void {
    this.entries.push({level, message, context: {...this.bound, ...context}});
  }
}
