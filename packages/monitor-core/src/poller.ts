import { errorMessage, itemsOf, at, isNumber, getAs, valueOr, type DaemonApi, type JsonValue } from "@blocktop/rpc-sdk";
import { DEFAULT_MAX_MEMPOOL, MAX_RECENT_BLOCKS, type BlockStat, type PeerRecord, type Snapshot, type SnapshotStore } from "./snapshot.js";
import type { RedrawSignal } from "./signal.js";
import { sleep } from "./task.js";

export const DEFAULT_REFRESH_MS = 5_000;

/**
 * Expected hashes per second at the given difficulty: one block per 600 s, 2^32 hashes per
 * unit of difficulty.
 */
export function hashRateFromDifficulty(difficulty: number): number {
  return (difficulty * 4294967296) / 600;
}

export function readPeer(p: JsonValue): PeerRecord {
  const ping = at(p, "pingtime");
  return {
    id: valueOr(p, "id", 0),
    addr: valueOr(p, "addr", ""),
    network: valueOr(p, "network", ""),
    subver: valueOr(p, "subver", ""),
    inbound: valueOr(p, "inbound", false),
    bytesSent: valueOr(p, "bytessent", 0),
    bytesRecv: valueOr(p, "bytesrecv", 0),
    pingMs: isNumber(ping) ? getAs(ping, "number") * 1000 : null,
    version: valueOr(p, "version", 0),
    syncedBlocks: valueOr(p, "synced_blocks", 0),
  };
}

export function readBlockStat(bs: JsonValue): BlockStat {
  return {
    height: valueOr(bs, "height", 0),
    txs: valueOr(bs, "txs", 0),
    totalSize: valueOr(bs, "total_size", 0),
    totalWeight: valueOr(bs, "total_weight", 0),
    time: valueOr(bs, "time", 0),
  };
}

function commitCore(s: Snapshot, bc: JsonValue, net: JsonValue, mp: JsonValue, peers: JsonValue, nowMs: number): void {
  s.chain = {
    chain: valueOr(bc, "chain", "—"),
    blocks: valueOr(bc, "blocks", 0),
    headers: valueOr(bc, "headers", 0),
    difficulty: valueOr(bc, "difficulty", 0),
    verificationProgress: valueOr(bc, "verificationprogress", 0),
    pruned: valueOr(bc, "pruned", false),
    ibd: valueOr(bc, "initialblockdownload", false),
    bestBlockHash: valueOr(bc, "bestblockhash", ""),
  };
  s.network = {
    connections: valueOr(net, "connections", 0),
    connectionsIn: valueOr(net, "connections_in", 0),
    connectionsOut: valueOr(net, "connections_out", 0),
    subversion: valueOr(net, "subversion", ""),
    protocolVersion: valueOr(net, "protocolversion", 0),
    networkActive: valueOr(net, "networkactive", true),
    relayFee: valueOr(net, "relayfee", 0),
  };
  s.mempool = {
    size: valueOr(mp, "size", 0),
    bytes: valueOr(mp, "bytes", 0),
    usage: valueOr(mp, "usage", 0),
    maxMempool: valueOr(mp, "maxmempool", DEFAULT_MAX_MEMPOOL),
    minFee: valueOr(mp, "mempoolminfee", 0),
    totalFee: valueOr(mp, "total_fee", 0),
  };
  s.networkHashPs = hashRateFromDifficulty(s.chain.difficulty);
  s.peers = itemsOf(peers).map(readPeer);
  s.status.connected = true;
  s.status.lastError = null;
  s.status.lastUpdateMs = nowMs;
}

export type PollDeps = {
  api: DaemonApi;
  store: SnapshotStore;
  redraw: RedrawSignal;
  now?: () => number;
};

export type PollOutcome =
  | { ok: false; error: string }
  | { ok: true; tip: number; blocksFetched: number | null };

/**
 * One poll cycle. Phase 1 fetches the core metrics and commits them at once; Phase 2 refreshes
 * the recent-block list, only when the tip moved since the last list was fetched.
 */
export async function pollOnce(deps: PollDeps): Promise<PollOutcome> {
  const { api, store, redraw } = deps;
  const now = deps.now ?? Date.now;
  const cachedTip = store.select((s) => s.blocksFetchedAt);

  let tip: number;
  try {
    const bc = await api.getBlockchainInfo();
    const net = await api.getNetworkInfo();
    const mp = await api.getMempoolInfo();
    const peers = await api.getPeerInfo();
    tip = valueOr(bc, "blocks", 0);
    store.update((s) => commitCore(s, bc, net, mp, peers, now()));
  } catch (e) {
    const error = errorMessage(e);
    store.update((s) => {
      s.status.connected = false;
      s.status.lastError = error;
      s.status.lastUpdateMs = now();
    });
    return { ok: false, error };
  }
  redraw.notify();

  if (tip === cachedTip || tip <= 0) return { ok: true, tip, blocksFetched: null };

  const fresh: BlockStat[] = [];
  for (let i = 0; i < MAX_RECENT_BLOCKS && tip - i >= 0; i++) {
    try {
      fresh.push(readBlockStat(await api.getBlockStats(tip - i)));
    } catch {
      // keep what we have; the next tip change retries
      break;
    }
  }

  store.update((s) => {
    if (s.recentBlocks.length > 0 && fresh.length > 0) {
      s.animation = { active: true, frame: 0, previousBlocks: s.recentBlocks };
    }
    s.recentBlocks = fresh;
    s.blocksFetchedAt = tip;
  });
  return { ok: true, tip, blocksFetched: fresh.length };
}

function setRefreshing(store: SnapshotStore, refreshing: boolean): void {
  store.update((s) => {
    s.status.refreshing = refreshing;
  });
}

/** Polls immediately, then once per interval until cancelled. */
export class MetricsPoller {
  constructor(
    private readonly deps: PollDeps,
    private readonly intervalMs: number = DEFAULT_REFRESH_MS,
  ) {}

  async run(signal: AbortSignal): Promise<void> {
    do {
      setRefreshing(this.deps.store, true);
      this.deps.redraw.notify();
      await pollOnce(this.deps);
      setRefreshing(this.deps.store, false);
      this.deps.redraw.notify();
    } while (await sleep(this.intervalMs, signal));
  }
}
