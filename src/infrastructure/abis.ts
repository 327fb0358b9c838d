import {Interface} from "ethers";

export const TOKEN_ABI = [
  "function approve(address spender, uint256 value) returns (bool)",
  "function allowance(address owner, address spender) view returns (uint256)",
  "function balanceOf(address owner) view returns (uint256)"
] as const;

// Only `buy` is called, so only `buy` is declared.
export const MARKET_ABI = [
  "function buy(uint256 investmentAmount, uint256 outcomeIndex, uint256 minOutcomeTokensToBuy)"
] as const;

export const TOKEN_INTERFACE = new Interface(TOKEN_ABI);
export const MARKET_INTERFACE = new Interface(MARKET_ABI);
