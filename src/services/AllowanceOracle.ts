import {MaxUint256} from "ethers";
import {IChainClient} from "../interfaces/IChainClient";
import {AllowanceQueryError} from "../shared/errors";
import {Logger, createLogger} from "../shared/logger";

export const DEFAULT_ALLOWANCE_THRESHOLD = MaxUint256 / 2n;

export type AllowanceCheck =
  | {kind: "sufficient"; allowance: bigint}
  | {kind: "insufficient"; allowance: bigint}
  | {kind: "error"; error: AllowanceQueryError};

/**
 * Best-effort shortcut around re-approving: a failed read counts as
 * insufficient, which only costs an extra approval.
 */
export class AllowanceOracle {
  constructor(
    private readonly chain: IChainClient,
    private readonly token: string,
    private readonly threshold: bigint = DEFAULT_ALLOWANCE_THRESHOLD,
    private readonly logger: Logger = createLogger("allowance")
  ) {}

  async check(owner: string, spender: string): Promise<AllowanceCheck> {
    let allowance: bigint;
    try {
      allowance = await this.chain.getAllowance(this.token, owner, spender);
    } catch (cause) {
      const error = new AllowanceQueryError(owner, spender, cause);
      this.logger.warn("allowance-query-failed", {owner, spender, error});
      return {kind: "error", error};
    }

    return allowance >= this.threshold ? {kind: "sufficient", allowance} : {kind: "insufficient", allowance};
  }

  async sufficient(owner: string, spender: string): Promise<boolean> {
    const result = await this.check(owner, spender);
    return result.kind === "sufficient";
  }
}
