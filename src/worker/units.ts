import {formatUnits, parseUnits} from "ethers";
import {InvalidInputError} from "../shared/errors";

/**
 * Converts a human amount ("0.1", 0.1) to the token's smallest unit.
 * Decimal strings are parsed exactly, so 0.1 with 6 decimals is 100000n.
 */
export function toSmallestUnit(amount: string | number, decimals: number): bigint {
  if (!Number.isInteger(decimals) || decimals < 0) {
    throw new InvalidInputError(`invalid-decimals: ${decimals}`);
  }
  if (typeof amount === "number" && !Number.isFinite(amount)) {
    throw new InvalidInputError(`invalid-amount: ${amount}`);
  }

  const text = typeof amount === "number" ? amount.toString() : amount.trim();
  let value: bigint;
  try {
    value = parseUnits(text, decimals);
  } catch (error) {
    throw new InvalidInputError(`invalid-amount: ${text}`, error);
  }

  if (value < 0n) {
    throw new InvalidInputError(`invalid-amount: ${text}`);
  }
  return value;
}

export function fromSmallestUnit(value: bigint, decimals: number): string {
  return formatUnits(value, decimals);
}
