export type TxInput = { kind: "coinbase" } | { kind: "prevout"; txid: string; vout: number };

export type TxOutput = {
  /** BTC */
  value: number;
  address: string | null;
  /** scriptPubKey type, e.g. `witness_v0_keyhash`. */
  type: string;
};

export type BlockDetails = {
  hash: string;
  height: number;
  time: number;
  txCount: number;
  size: number;
  weight: number;
  difficulty: number;
  confirmations: number;
  miner: string;
};

export type MempoolTx = {
  vsize: number;
  weight: number;
  /** BTC */
  fee: number;
  /** sat/vB */
  feeRate: number;
  ancestors: number;
  descendants: number;
  entryTime: number;
};

export type ConfirmedTx = {
  vsize: number;
  weight: number;
  blockHash: string;
  /** Derived from the tip at query time; null when unknown. */
  blockHeight: number | null;
  confirmations: number;
  blockTime: number;
  inputs: TxInput[];
  outputs: TxOutput[];
  /** BTC */
  totalOutput: number;
};

export type SearchOutcome =
  | { kind: "searching" }
  | { kind: "block"; block: BlockDetails }
  | { kind: "mempool"; tx: MempoolTx }
  | { kind: "confirmed"; tx: ConfirmedTx }
  | { kind: "error"; message: string };

export type ResultKind = SearchOutcome["kind"];

export type OverlayState = {
  open: boolean;
  /** -1 = nothing highlighted */
  selected: number;
};

export type NavState = {
  /** Row cursor over block / inputs / outputs; -1 = none. */
  selected: number;
  inputs: OverlayState;
  outputs: OverlayState;
};

export type SearchResult = {
  query: string;
  outcome: SearchOutcome;
  nav: NavState;
};

export function emptyNav(): NavState {
  return {
    selected: -1,
    inputs: { open: false, selected: -1 },
    outputs: { open: false, selected: -1 },
  };
}

export function searchingResult(query: string): SearchResult {
  return { query, outcome: { kind: "searching" }, nav: emptyNav() };
}

export function classifyResult(result: SearchResult): ResultKind {
  return result.outcome.kind;
}
