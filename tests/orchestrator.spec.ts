import {expect} from "chai";
import {FakeChainClient} from "../src/infrastructure/FakeChainClient";
import {BuyParams, TargetMap, WorkerResult} from "../src/types/worker.types";
import {ChainConnectOptions} from "../src/worker/chain";
import {proxyForIndex, runBatch, summarize} from "../src/worker/orchestrator";
import {KEY_1, KEY_2, KEY_3, MARKET_A, ManualClock, RecordingLogger, addressOf, runConfig} from "./helpers";

const TARGETS: TargetMap = new Map([["59", [MARKET_A]]]);
const BUY: BuyParams = {investment: 100_000n, outcomeIndex: 0, minOutcomeTokens: 0n};

describe("proxyForIndex", function () {
  it("assigns proxies round-robin by 1-based account position", function () {
    const proxies = ["http://p0:8080", "http://p1:8080"];
    const assigned = [1, 2, 3, 4, 5].map((position) => proxyForIndex(proxies, position));

    expect(assigned).to.deep.equal([
      "http://p0:8080",
      "http://p1:8080",
      "http://p0:8080",
      "http://p1:8080",
      "http://p0:8080"
    ]);
  });

  it("returns null without a proxy list", function () {
    expect(proxyForIndex([], 3)).to.equal(null);
  });
});

describe("summarize", function () {
  it("sums counts and counts failed accounts", function () {
    const results: WorkerResult[] = [
      {address: "0x1", status: "DONE", approvalsSent: 1, buysSent: 2, approvalsSkipped: 0},
      {address: "0x2", status: "DONE", approvalsSent: 0, buysSent: 1, approvalsSkipped: 1},
      {address: "0x3", status: "FAILED", approvalsSent: 0, buysSent: 0, approvalsSkipped: 0}
    ];

    const summary = summarize(results, 2);

    expect(summary).to.deep.include({
      accounts: 3,
      failedAccounts: 3,
      totalApprovals: 1,
      totalBuys: 3,
      totalSkipped: 1
    });
  });
});

describe("runBatch", function () {
  it("runs every account to completion on a pool of width 2", async function () {
    const connections: ChainConnectOptions[] = [];
    const summary = await runBatch(
      runConfig({maxWorkers: 2}),
      {privateKeys: [KEY_1, KEY_2, KEY_3], proxies: [], targets: TARGETS, buy: BUY},
      {
        createClient: (options) => {
          connections.push(options);
          return new FakeChainClient({balance: 1_000_000n});
        },
        clock: new ManualClock(),
        random: () => 0
      }
    );

    expect(connections).to.have.length(3);
    expect(connections.every((options) => options.proxyUrl === null)).to.equal(true);
    expect(summary.accounts).to.equal(3);
    expect(summary.failedAccounts).to.equal(0);
    expect(summary.totalApprovals).to.equal(3);
    expect(summary.totalBuys).to.equal(3);
    expect(summary.totalSkipped).to.equal(0);
    expect(summary.results.map((result) => result.address).sort()).to.deep.equal(
      [addressOf(KEY_1), addressOf(KEY_2), addressOf(KEY_3)].sort()
    );
  });

  it("hands each account its proxy in input order", async function () {
    const proxiesSeen: Array<string | null> = [];
    await runBatch(
      runConfig({maxWorkers: 1}),
      {
        privateKeys: [KEY_1, KEY_2, KEY_3],
        proxies: ["http://p0:8080", "http://p1:8080"],
        targets: TARGETS,
        buy: BUY
      },
      {
        createClient: (options) => {
          proxiesSeen.push(options.proxyUrl);
          return new FakeChainClient({balance: 1_000_000n});
        },
        clock: new ManualClock()
      }
    );

    expect(proxiesSeen).to.deep.equal(["http://p0:8080", "http://p1:8080", "http://p0:8080"]);
  });

  it("excludes an account whose endpoint is unreachable and finishes the rest", async function () {
    const summary = await runBatch(
      runConfig({maxWorkers: 3}),
      {
        privateKeys: [KEY_1, KEY_2, KEY_3],
        proxies: ["http://good:8080", "http://bad:8080"],
        targets: TARGETS,
        buy: BUY
      },
      {
        createClient: (options) => {
          const chain = new FakeChainClient({balance: 1_000_000n});
          chain.failBlockNumber = options.proxyUrl === "http://bad:8080";
          return chain;
        },
        clock: new ManualClock()
      }
    );

    expect(summary.accounts).to.equal(2);
    expect(summary.failedAccounts).to.equal(1);
    expect(summary.totalBuys).to.equal(2);
    expect(summary.results.map((result) => result.address).sort()).to.deep.equal(
      [addressOf(KEY_1), addressOf(KEY_3)].sort()
    );
  });

  it("excludes an account with an unusable key", async function () {
    const summary = await runBatch(
      runConfig(),
      {privateKeys: [KEY_1, "0x1234"], proxies: [], targets: TARGETS, buy: BUY},
      {createClient: () => new FakeChainClient({balance: 1_000_000n}), clock: new ManualClock()}
    );

    expect(summary.accounts).to.equal(1);
    expect(summary.failedAccounts).to.equal(1);
    expect(summary.results[0].address).to.equal(addressOf(KEY_1));
  });

  it("counts an account whose nonce read fails as failed with no effect", async function () {
    const summary = await runBatch(
      runConfig(),
      {privateKeys: [KEY_1, KEY_2], proxies: [], targets: TARGETS, buy: BUY},
      {
        createClient: () => {
          const chain = new FakeChainClient({balance: 1_000_000n});
          chain.failNonce = true;
          return chain;
        },
        clock: new ManualClock()
      }
    );

    expect(summary.accounts).to.equal(2);
    expect(summary.failedAccounts).to.equal(2);
    expect(summary.totalBuys).to.equal(0);
    expect(summary.results.every((result) => result.status === "FAILED")).to.equal(true);
  });

  it("routes per-account step logs through the injected logger", async function () {
    const logger = new RecordingLogger();
    await runBatch(
      runConfig(),
      {privateKeys: [KEY_1], proxies: ["http://user:secret@p0:8080"], targets: TARGETS, buy: BUY},
      {createClient: () => new FakeChainClient({balance: 1_000_000n}), clock: new ManualClock(), logger}
    );

    const buySent = logger.entries.find((entry) => entry.message === "buy-sent");
    expect(buySent?.context).to.deep.include({position: 1, proxy: "http://p0:8080", account: addressOf(KEY_1)});
    expect(logger.messages()[0]).to.equal("batch-started");
    expect(logger.messages()).to.include("worker-done");
  });
});
