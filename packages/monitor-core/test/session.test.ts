import { afterEach, describe, expect, it, vi } from "vitest";
import { jsonString } from "@blocktop/rpc-sdk";
import { emptyNav } from "../src/result.js";
import { MonitorSession, isValidQuery } from "../src/session.js";
import { FakeDaemon, blockStats, fixture } from "./fake_daemon.js";

const BLOCK_HASH = "0000000000000000000320283a032748cef8227873ff4872689bf23f1cda83a5";

function searchDaemon(): FakeDaemon {
  return new FakeDaemon()
    .on("getblockhash", jsonString(BLOCK_HASH))
    .on("getblock", fixture("block"))
    .on("getrawtransaction", fixture("coinbase_tx"));
}

let session: MonitorSession | null = null;

afterEach(async () => {
  await session?.shutdown();
  session = null;
});

describe("isValidQuery", () => {
  it("accepts heights of up to eight digits and 64-character hex hashes", () => {
    expect(isValidQuery("840000")).toBe(true);
    expect(isValidQuery(BLOCK_HASH)).toBe(true);
    expect(isValidQuery("123456789")).toBe(false);
    expect(isValidQuery("abc")).toBe(false);
    expect(isValidQuery(`${BLOCK_HASH.slice(1)}g`)).toBe(false);
  });
});

describe("MonitorSession", () => {
  it("polls in the background and signals redraws", async () => {
    const rpc = new FakeDaemon().withCoreMetrics().on("getblockstats", blockStats);
    session = new MonitorSession({ rpc, refreshMs: 60_000, now: () => 1234 });
    let redraws = 0;
    session.subscribe(() => redraws++);

    session.start();
    session.start();
    expect(rpc.count("getblockchaininfo")).toBe(1);

    const current = session;
    await vi.waitFor(() => expect(current.readSnapshot().blocksFetchedAt).toBe(840000));
    const snapshot = current.readSnapshot();
    expect(snapshot.status.connected).toBe(true);
    expect(snapshot.recentBlocks).toHaveLength(20);
    await vi.waitFor(() => expect(redraws).toBeGreaterThan(0));
  });

  it("hands out copies of the snapshot", () => {
    session = new MonitorSession({ rpc: new FakeDaemon() });
    session.readSnapshot().chain.blocks = 5;
    expect(session.readSnapshot().chain.blocks).toBe(0);
  });

  it("validates, trims and resolves a submitted query on the search client", async () => {
    const rpc = new FakeDaemon();
    const searchRpc = searchDaemon();
    session = new MonitorSession({ rpc, searchRpc });

    expect(session.dispatch({ type: "submit-query", query: "abc" })).toBe(false);
    expect(session.dispatch({ type: "submit-query", query: " 840000 " })).toBe(true);
    expect(session.searching).toBe(true);
    expect(session.readSearch().current?.outcome.kind).toBe("searching");

    const current = session;
    await vi.waitFor(() => expect(current.searching).toBe(false));
    const result = current.readSearch().current;
    expect(result?.query).toBe("840000");
    expect(result?.outcome).toMatchObject({ kind: "block", block: { height: 840000, miner: "Foundry USA Pool #dropgo" } });
    expect(searchRpc.count("getblockhash")).toBe(1);
    expect(rpc.calls).toEqual([]);
  });

  it("backs out of a result with escape, then asks to quit", async () => {
    session = new MonitorSession({ rpc: searchDaemon() });
    session.dispatch({ type: "submit-query", query: "840000" });
    const current = session;
    await vi.waitFor(() => expect(current.searching).toBe(false));

    expect(current.dispatch({ type: "navigate", delta: 1 })).toBe(false);
    expect(current.dispatch({ type: "close" })).toBe(false);
    expect(current.dispatch({ type: "back" })).toBe(false);
    expect(current.escape()).toBe(true);
    expect(current.readSearch()).toEqual({ current: null, history: [] });
    expect(current.escape()).toBe(false);
    expect(current.dispatch({ type: "dismiss" })).toBe(false);
  });

  it("records a crashed lookup as the last error", async () => {
    session = new MonitorSession({
      rpc: new FakeDaemon(),
      resolve: async () => {
        throw new Error("worker crashed");
      },
    });
    session.dispatch({ type: "submit-query", query: "840000" });

    const current = session;
    await vi.waitFor(() => expect(current.readSnapshot().status.lastError).toBe("search: worker crashed"));
    expect(current.readSearch().current?.outcome).toEqual({ kind: "error", message: "worker crashed" });
  });

  it("waits for a running lookup on shutdown and stores its result without a redraw", async () => {
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const current = new MonitorSession({
      rpc: new FakeDaemon(),
      resolve: async (_api, query) => {
        await gate;
        return { query, outcome: { kind: "error", message: "late" }, nav: emptyNav() };
      },
    });
    session = current;
    let redraws = 0;
    current.subscribe(() => redraws++);

    expect(current.dispatch({ type: "submit-query", query: "840000" })).toBe(true);
    let stopped = false;
    const stopping = current.shutdown().then(() => {
      stopped = true;
    });
    const redrawsAtShutdown = redraws;

    await new Promise((resolve) => setTimeout(resolve, 20));
    expect(stopped).toBe(false);

    release();
    await stopping;
    await new Promise((resolve) => setImmediate(resolve));

    expect(current.searching).toBe(false);
    expect(current.readSearch().current?.outcome).toEqual({ kind: "error", message: "late" });
    expect(redraws).toBe(redrawsAtShutdown);
  });

  it("stops polling and refuses lookups after shutdown", async () => {
    const rpc = new FakeDaemon().withCoreMetrics().on("getblockstats", blockStats);
    const current = new MonitorSession({ rpc, refreshMs: 5 });
    current.start();
    await current.shutdown();

    const polls = rpc.count("getblockchaininfo");
    expect(current.dispatch({ type: "submit-query", query: "840000" })).toBe(false);
    await new Promise((resolve) => setTimeout(resolve, 30));
    expect(rpc.count("getblockchaininfo")).toBe(polls);
  });
});
