import {existsSync, readFileSync} from "node:fs";
import {getAddress} from "ethers";
import {InvalidInputError} from "../shared/errors";
import {createLogger} from "../shared/logger";
import {TargetMap} from "../types/worker.types";
import {proxyLabel} from "./chain";

const logger = createLogger("inputs");

function readLines(path: string): string[] {
  return readFileSync(path, "utf8")
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

/** One hex key per line; a missing 0x prefix is added. */
export function loadPrivateKeys(path: string): string[] {
  if (!existsSync(path)) {
    throw new InvalidInputError(`private-keys-file-not-found: ${path}`);
  }
  return readLines(path).map((line) => (line.startsWith("0x") ? line : `0x${line}`));
}

function isHttpProxy(line: string): boolean {
  try {
    const {protocol} = new URL(line);
    return protocol === "http:" || protocol === "https:";
  } catch {
    return false;
  }
}

/**
 * Optional file: absent means direct connections. `#` starts a comment line.
 * Only http:// and https:// proxies (HTTP CONNECT) are usable; other entries
 * are dropped with a warning.
 */
export function loadProxies(path: string): string[] {
  if (!existsSync(path)) {
    return [];
  }
  return readLines(path)
    .filter((line) => !line.startsWith("#"))
    .filter((line) => {
      if (isHttpProxy(line)) {
        return true;
      }
      logger.warn("unsupported-proxy-skipped", {proxy: proxyLabel(line)});
      return false;
    });
}

/**
 * Checksums every address, dropping malformed ones, and removes duplicates
 * while keeping first-seen order.
 */
export function normalizeAddresses(addresses: Iterable<string>): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const raw of addresses) {
    let address: string;
    try {
      address = getAddress(raw.trim());
    } catch (error) {
      logger.warn("invalid-address-skipped", {address: raw, error});
      continue;
    }
    if (!seen.has(address)) {
      seen.add(address);
      result.push(address);
    }
  }
  return result;
}

/** Flat market list under a single placeholder group "0". */
export function targetsFromMarkets(addresses: Iterable<string>): TargetMap {
  return new Map([["0", normalizeAddresses(addresses)]]);
}
