import { describe, expect, it, vi } from "vitest";
import { DaemonApi } from "@blocktop/rpc-sdk";
import { emptyNav, type SearchOutcome, type SearchResult } from "../src/result.js";
import { MAX_HISTORY, SearchController, type Resolver } from "../src/search.js";
import { RedrawSignal } from "../src/signal.js";
import { TaskSupervisor } from "../src/task.js";
import { FakeDaemon } from "./fake_daemon.js";

const TXID = "1".repeat(64);
const PREV_TXID = "2".repeat(64);
const BLOCK_HASH = "b".repeat(64);

type Pending = { query: string; isHeight: boolean; tip: number; settle: (outcome: SearchOutcome) => void };

function deferredResolver(): { pending: Pending[]; resolve: Resolver } {
  const pending: Pending[] = [];
  const resolve: Resolver = (_api, query, isHeight, tip) =>
    new Promise<SearchResult>((done) => {
      pending.push({ query, isHeight, tip, settle: (outcome) => done({ query, outcome, nav: emptyNav() }) });
    });
  return { pending, resolve };
}

function confirmedOutcome(): SearchOutcome {
  return {
    kind: "confirmed",
    tx: {
      vsize: 144,
      weight: 573,
      blockHash: BLOCK_HASH,
      blockHeight: 839998,
      confirmations: 3,
      blockTime: 1713570000,
      inputs: [{ kind: "prevout", txid: PREV_TXID, vout: 1 }],
      outputs: [{ value: 0.25, address: "bc1qexample", type: "witness_v0_keyhash" }],
      totalOutput: 0.25,
    },
  };
}

/** Every txid resolves to a confirmed transaction, everything else to an error. */
const instantResolver: Resolver = async (_api, query) => ({
  query,
  outcome: query.length === 64 ? confirmedOutcome() : { kind: "error", message: "Block not found" },
  nav: emptyNav(),
});

function setup(resolve: Resolver) {
  const failures: Array<[string, unknown]> = [];
  const supervisor = new TaskSupervisor((name, error) => failures.push([name, error]));
  const controller = new SearchController({
    api: new DaemonApi(new FakeDaemon()),
    supervisor,
    redraw: new RedrawSignal(),
    tip: () => 840000,
    resolve,
  });
  return { controller, supervisor, failures };
}

async function settled(controller: SearchController): Promise<void> {
  await vi.waitFor(() => expect(controller.busy).toBe(false), { interval: 1 });
}

describe("SearchController.submit", () => {
  it("shows a searching placeholder, then the resolved result", async () => {
    const { pending, resolve } = deferredResolver();
    const { controller } = setup(resolve);

    expect(controller.submit("840000", "top-level")).toBe(true);
    expect(controller.busy).toBe(true);
    expect(controller.read().current).toEqual({ query: "840000", outcome: { kind: "searching" }, nav: emptyNav() });

    await vi.waitFor(() => expect(pending).toHaveLength(1));
    expect(pending[0]).toMatchObject({ query: "840000", isHeight: true, tip: 840000 });
    pending[0]?.settle({ kind: "error", message: "Block height out of range" });
    await settled(controller);

    expect(controller.read().current?.outcome).toEqual({ kind: "error", message: "Block height out of range" });
  });

  it("refuses a second lookup while one is in flight", async () => {
    const { pending, resolve } = deferredResolver();
    const { controller } = setup(resolve);
    controller.submit(TXID, "top-level");

    expect(controller.submit("840000", "top-level")).toBe(false);
    expect(controller.read().current?.query).toBe(TXID);

    await vi.waitFor(() => expect(pending).toHaveLength(1));
    pending[0]?.settle(confirmedOutcome());
    await settled(controller);
    expect(pending).toHaveLength(1);
    expect(pending[0]?.isHeight).toBe(false);
  });

  it("starts a fresh history for a top-level lookup", async () => {
    const { controller } = setup(instantResolver);
    controller.submit(TXID, "top-level");
    await settled(controller);
    controller.submit(PREV_TXID, "drill-down");
    await settled(controller);
    expect(controller.read().history).toHaveLength(1);

    controller.submit("840000", "top-level");
    await settled(controller);
    expect(controller.read().history).toEqual([]);
  });

  it("keeps at most the most recent results in history", async () => {
    const { controller } = setup(instantResolver);
    controller.submit("q0", "top-level");
    await settled(controller);
    for (let i = 1; i <= MAX_HISTORY + 2; i++) {
      expect(controller.submit(`q${i}`, "drill-down")).toBe(true);
      await settled(controller);
    }

    const { current, history } = controller.read();
    expect(history).toHaveLength(MAX_HISTORY);
    expect(history[0]?.query).toBe("q2");
    expect(history[MAX_HISTORY - 1]?.query).toBe(`q${MAX_HISTORY + 1}`);
    expect(current?.query).toBe(`q${MAX_HISTORY + 2}`);
  });

  it("refuses lookups after shutdown", async () => {
    const { controller, supervisor } = setup(instantResolver);
    await supervisor.shutdown();
    expect(controller.submit(TXID, "top-level")).toBe(false);
    expect(controller.read().current).toBeNull();
  });

  it("shows a resolver failure and reports it to the supervisor", async () => {
    const { controller, failures } = setup(async () => {
      throw new Error("worker crashed");
    });
    controller.submit(TXID, "top-level");
    await settled(controller);

    expect(controller.read().current?.outcome).toEqual({ kind: "error", message: "worker crashed" });
    await vi.waitFor(() => expect(failures.map(([name]) => name)).toEqual(["search"]));
  });
});

describe("SearchController navigation", () => {
  it("drills into the containing block and comes back", async () => {
    const { controller } = setup(instantResolver);
    controller.submit(TXID, "top-level");
    await settled(controller);

    expect(controller.navigate(1)).toBe(true);
    expect(controller.read().current?.nav.selected).toBe(0);
    expect(controller.activate()).toBe(true);
    expect(controller.read().current?.query).toBe(BLOCK_HASH);
    await settled(controller);

    expect(controller.read().history.map((r) => r.query)).toEqual([TXID]);
    expect(controller.back()).toBe(true);
    expect(controller.read().current?.query).toBe(TXID);
    expect(controller.read().current?.nav.selected).toBe(0);
    expect(controller.back()).toBe(false);
  });

  it("follows an input from its overlay", async () => {
    const { controller } = setup(instantResolver);
    controller.submit(TXID, "top-level");
    await settled(controller);

    controller.navigate(1);
    controller.navigate(1);
    expect(controller.activate()).toBe(true);
    expect(controller.read().current?.nav.inputs.open).toBe(true);
    controller.navigate(1);
    expect(controller.activate()).toBe(true);
    await settled(controller);

    expect(controller.read().current?.query).toBe(PREV_TXID);
  });

  it("navigates only a confirmed transaction", async () => {
    const { controller } = setup(instantResolver);
    expect(controller.navigate(1)).toBe(false);
    controller.submit("840000", "top-level");
    await settled(controller);
    expect(controller.navigate(1)).toBe(false);
    expect(controller.activate()).toBe(false);
  });

  it("escapes by closing the overlay, then going back, then dismissing", async () => {
    const { controller } = setup(instantResolver);
    controller.submit(TXID, "top-level");
    await settled(controller);
    controller.submit(PREV_TXID, "drill-down");
    await settled(controller);
    controller.navigate(1);
    controller.navigate(1);
    controller.activate();
    expect(controller.read().current?.nav.inputs.open).toBe(true);

    expect(controller.escape()).toBe(true);
    expect(controller.read().current).toMatchObject({ query: PREV_TXID, nav: { inputs: { open: false } } });
    expect(controller.escape()).toBe(true);
    expect(controller.read().current?.query).toBe(TXID);
    expect(controller.escape()).toBe(true);
    expect(controller.read()).toEqual({ current: null, history: [] });
    expect(controller.escape()).toBe(false);
  });

  it("dismisses the result and its history at once", async () => {
    const { controller } = setup(instantResolver);
    controller.submit(TXID, "top-level");
    await settled(controller);
    controller.submit(PREV_TXID, "drill-down");
    await settled(controller);

    expect(controller.dismiss()).toBe(true);
    expect(controller.read()).toEqual({ current: null, history: [] });
    expect(controller.dismiss()).toBe(false);
  });
});
