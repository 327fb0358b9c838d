import {expect} from "chai";
import {MaxUint256} from "ethers";
import {loadRunConfig} from "../src/config/runConfig";
import {InvalidInputError} from "../src/shared/errors";

describe("loadRunConfig", function () {
  it("uses the bundled defaults with an empty environment", function () {
    const config = loadRunConfig({});

    expect(config.chainId).to.equal(8453);
    expect(config.tokenDecimals).to.equal(6);
    expect(config.maxWorkers).to.equal(24);
    expect(config.approveGasLimit).to.equal(120_000n);
    expect(config.buyGasLimit).to.equal(250_000n);
    expect(config.toggles).to.deep.equal({approve: true, buy: true, checkAllowance: true, useMaxAllowance: true});
    expect(config.approvalNonceAdvance).to.equal("on-send");
    expect(config.allowanceThreshold).to.equal(MaxUint256 / 2n);
    expect(config.pacing.sendRetries).to.equal(2);
    expect(config.pacing.retryDelayMs).to.equal(5_000);
    expect(config.buy).to.deep.equal({investment: "0.1", outcomeIndex: 0, minOutcomeTokens: 0n});
  });

  it("applies environment overrides", function () {
    const config = loadRunConfig({
      CHAIN_RPC_URL: "http://127.0.0.1:8545",
      CHAIN_ID: "31337",
      TOKEN_DECIMALS: "18",
      MAX_WORKERS: "4",
      DO_APPROVE: "false",
      CHECK_ALLOWANCE: "0",
      APPROVAL_NONCE_ADVANCE: "on-confirmed-success",
      BUY_INVESTMENT: "2.5",
      BUY_OUTCOME_INDEX: "1",
      BUY_MIN_OUTCOME_TOKENS: "7",
      PROXIES_FILE: "/tmp/proxies.txt"
    });

    expect(config.rpcUrl).to.equal("http://127.0.0.1:8545");
    expect(config.chainId).to.equal(31337);
    expect(config.tokenDecimals).to.equal(18);
    expect(config.maxWorkers).to.equal(4);
    expect(config.toggles.approve).to.equal(false);
    expect(config.toggles.checkAllowance).to.equal(false);
    expect(config.toggles.buy).to.equal(true);
    expect(config.approvalNonceAdvance).to.equal("on-confirmed-success");
    expect(config.buy).to.deep.equal({investment: "2.5", outcomeIndex: 1, minOutcomeTokens: 7n});
    expect(config.proxiesFile).to.equal("/tmp/proxies.txt");
  });

  it("names the variable that fails to parse", function () {
    expect(() => loadRunConfig({MAX_WORKERS: "0"})).to.throw(InvalidInputError, "invalid-env:MAX_WORKERS=0");
    expect(() => loadRunConfig({DO_BUY: "maybe"})).to.throw(InvalidInputError, "invalid-env:DO_BUY=maybe");
    expect(() => loadRunConfig({APPROVAL_NONCE_ADVANCE: "never"})).to.throw(
      InvalidInputError,
      "invalid-env:APPROVAL_NONCE_ADVANCE=never"
    );
    expect(() => loadRunConfig({TOKEN_ADDRESS: "0x123"})).to.throw(InvalidInputError, "invalid-env:TOKEN_ADDRESS=0x123");
    expect(() => loadRunConfig({BUY_MIN_OUTCOME_TOKENS: "-1"})).to.throw(InvalidInputError);
  });
});
