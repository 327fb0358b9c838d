import {isAddress} from "ethers";
import defaults from "../../config/defaults.json";
import {DEFAULT_ALLOWANCE_THRESHOLD} from "../services/AllowanceOracle";
import {InvalidInputError} from "../shared/errors";
import {ApprovalNonceAdvance, FeatureToggles, PacingConfig} from "../types/worker.types";

export type Env = Record<string, string | undefined>;

export interface RunConfig {
  rpcUrl: string;
  chainId: number;
  requestTimeoutMs: number;
  token: string;
  tokenDecimals: number;
  approveGasLimit: bigint;
  buyGasLimit: bigint;
  toggles: FeatureToggles;
  approvalNonceAdvance: ApprovalNonceAdvance;
  allowanceThreshold: bigint;
  pacing: PacingConfig;
  retryJitterMs: number;
  maxWorkers: number;
  buy: {
    /** Human-readable amount, converted with `tokenDecimals` at run time. */
    investment: string;
    outcomeIndex: number;
    minOutcomeTokens: bigint;
  };
  privateKeysFile: string;
  proxiesFile: string;
  marketsApiUrl: string;
}

function invalid(name: string, value: string): never {
  throw new InvalidInputError(`invalid-env:${name}=${value}`);
}

function readString(env: Env, name: string, fallback: string): string {
  const value = env[name]?.trim();
  return value ? value : fallback;
}

function readInt(env: Env, name: string, fallback: number, min: number): number {
  const raw = env[name]?.trim();
  if (!raw) {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    invalid(name, raw);
  }
  return value;
}

function readBool(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name]?.trim().toLowerCase();
  if (!raw) {
    return fallback;
  }
  if (raw === "1" || raw === "true" || raw === "yes") {
    return true;
  }
  if (raw === "0" || raw === "false" || raw === "no") {
    return false;
  }
  return invalid(name, raw);
}

function readBigInt(env: Env, name: string, fallback: string): bigint {
  const raw = readString(env, name, fallback);
  if (!/^\d+$/.test(raw)) {
    invalid(name, raw);
  }
  return BigInt(raw);
}

function parseNonceAdvance(name: string, raw: string): ApprovalNonceAdvance {
  if (raw === "on-send" || raw === "on-confirmed-success") {
    return raw;
  }
  return invalid(name, raw);
}

/**
 * Overlays environment variables on config/defaults.json. Throws
 * InvalidInputError naming the first variable that does not parse.
 */
export function loadRunConfig(env: Env = process.env): RunConfig {
  const token = readString(env, "TOKEN_ADDRESS", defaults.token.address);
  if (!isAddress(token)) {
    invalid("TOKEN_ADDRESS", token);
  }

  return {
    rpcUrl: readString(env, "CHAIN_RPC_URL", defaults.chain.rpcUrl),
    chainId: readInt(env, "CHAIN_ID", defaults.chain.chainId, 1),
    requestTimeoutMs: readInt(env, "RPC_TIMEOUT_MS", defaults.chain.requestTimeoutMs, 1),
    token,
    tokenDecimals: readInt(env, "TOKEN_DECIMALS", defaults.token.decimals, 0),
    approveGasLimit: readBigInt(env, "GAS_LIMIT_APPROVE", defaults.gas.approveLimit),
    buyGasLimit: readBigInt(env, "GAS_LIMIT_BUY", defaults.gas.buyLimit),
    toggles: {
      approve: readBool(env, "DO_APPROVE", defaults.features.approve),
      buy: readBool(env, "DO_BUY", defaults.features.buy),
      checkAllowance: readBool(env, "CHECK_ALLOWANCE", defaults.features.checkAllowance),
      useMaxAllowance: readBool(env, "USE_MAX_ALLOWANCE", defaults.features.useMaxAllowance)
    },
    approvalNonceAdvance: parseNonceAdvance(
      "APPROVAL_NONCE_ADVANCE",
      readString(env, "APPROVAL_NONCE_ADVANCE", defaults.approvalNonceAdvance)
    ),
    allowanceThreshold: DEFAULT_ALLOWANCE_THRESHOLD,
    pacing: {
      sendRetries: readInt(env, "SEND_RETRIES", defaults.pacing.sendRetries, 1),
      retryDelayMs: readInt(env, "RETRY_DELAY_MS", defaults.pacing.retryDelayMs, 0),
      approveReceiptTimeoutMs: defaults.pacing.approveReceiptTimeoutMs,
      approveReceiptPollMs: defaults.pacing.approveReceiptPollMs,
      thinkTimeMs: readInt(env, "THINK_TIME_MS", defaults.pacing.thinkTimeMs, 0),
      thinkJitterMs: defaults.pacing.thinkJitterMs,
      failurePauseMs: defaults.pacing.failurePauseMs
    },
    retryJitterMs: defaults.pacing.retryJitterMs,
    maxWorkers: readInt(env, "MAX_WORKERS", defaults.maxWorkers, 1),
    buy: {
      investment: readString(env, "BUY_INVESTMENT", defaults.buy.investment),
      outcomeIndex: readInt(env, "BUY_OUTCOME_INDEX", defaults.buy.outcomeIndex, 0),
      minOutcomeTokens: readBigInt(env, "BUY_MIN_OUTCOME_TOKENS", defaults.buy.minOutcomeTokens)
    },
    privateKeysFile: readString(env, "PRIVATE_KEYS_FILE", defaults.files.privateKeys),
    proxiesFile: readString(env, "PROXIES_FILE", defaults.files.proxies),
    marketsApiUrl: readString(env, "MARKETS_API_URL", defaults.marketsApiUrl)
  };
}
