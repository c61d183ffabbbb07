export type BlockStat = {
  height: number;
  txs: number;
  totalSize: number;
  totalWeight: number;
  time: number;
};

export type PeerRecord = {
  id: number;
  addr: string;
  network: string;
  subver: string;
  inbound: boolean;
  bytesSent: number;
  bytesRecv: number;
  /** Null until the peer has answered a ping. */
  pingMs: number | null;
  version: number;
  syncedBlocks: number;
};

export type ChainState = {
  chain: string;
  blocks: number;
  headers: number;
  difficulty: number;
  verificationProgress: number;
  pruned: boolean;
  ibd: boolean;
  bestBlockHash: string;
};

export type NetworkState = {
  connections: number;
  connectionsIn: number;
  connectionsOut: number;
  subversion: string;
  protocolVersion: number;
  networkActive: boolean;
  /** BTC/kvB */
  relayFee: number;
};

export type MempoolState = {
  size: number;
  bytes: number;
  usage: number;
  maxMempool: number;
  /** BTC/kvB */
  minFee: number;
  /** BTC */
  totalFee: number;
};

export type BlockAnimation = {
  active: boolean;
  frame: number;
  /** Block list as it was before the new tip arrived, rendered sliding out. */
  previousBlocks: BlockStat[];
};

export type SnapshotStatus = {
  connected: boolean;
  lastError: string | null;
  lastUpdateMs: number | null;
  refreshing: boolean;
};

export type Snapshot = {
  chain: ChainState;
  network: NetworkState;
  mempool: MempoolState;
  networkHashPs: number;
  peers: PeerRecord[];
  /** Newest first. */
  recentBlocks: BlockStat[];
  /** Tip height the block list was fetched at; -1 before the first fetch. */
  blocksFetchedAt: number;
  animation: BlockAnimation;
  status: SnapshotStatus;
};

export const MAX_RECENT_BLOCKS = 20;
export const DEFAULT_MAX_MEMPOOL = 300_000_000;

export function createInitialSnapshot(): Snapshot {
  return {
    chain: {
      chain: "—",
      blocks: 0,
      headers: 0,
      difficulty: 0,
      verificationProgress: 0,
      pruned: false,
      ibd: false,
      bestBlockHash: "",
    },
    network: {
      connections: 0,
      connectionsIn: 0,
      connectionsOut: 0,
      subversion: "",
      protocolVersion: 0,
      networkActive: true,
      relayFee: 0,
    },
    mempool: { size: 0, bytes: 0, usage: 0, maxMempool: DEFAULT_MAX_MEMPOOL, minFee: 0, totalFee: 0 },
    networkHashPs: 0,
    peers: [],
    recentBlocks: [],
    blocksFetchedAt: -1,
    animation: { active: false, frame: 0, previousBlocks: [] },
    status: { connected: false, lastError: null, lastUpdateMs: null, refreshing: false },
  };
}

/**
 * Owner of the one mutable {@link Snapshot}. Writers go through {@link update}, whose mutator
 * runs synchronously and so cannot interleave with another writer or a reader. Readers get a
 * detached copy.
 */
export class SnapshotStore {
  private readonly state: Snapshot;

  constructor(initial: Snapshot = createInitialSnapshot()) {
    this.state = initial;
  }

  read(): Snapshot {
    return structuredClone(this.state);
  }

  /** Reads one derived value without copying the whole snapshot. */
  select<R>(selector: (state: Readonly<Snapshot>) => R): R {
    return selector(this.state);
  }

  update<R>(mutator: (draft: Snapshot) => R): R {
    return mutator(this.state);
  }
}
