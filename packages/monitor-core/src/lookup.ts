import {
  at,
  errorMessage,
  getAs,
  hasKey,
  itemsOf,
  valueOr,
  type DaemonApi,
  type JsonValue,
} from "@blocktop/rpc-sdk";
import { MINER_PLACEHOLDER, extractMinerTag } from "./miner.js";
import {
  emptyNav,
  type BlockDetails,
  type ConfirmedTx,
  type MempoolTx,
  type SearchOutcome,
  type SearchResult,
  type TxInput,
  type TxOutput,
} from "./result.js";

async function fetchBlock(api: DaemonApi, hash: string): Promise<BlockDetails> {
  const blk = await api.getBlock(hash, 1);
  const block: BlockDetails = {
    hash: valueOr(blk, "hash", hash),
    height: valueOr(blk, "height", 0),
    time: valueOr(blk, "time", 0),
    txCount: valueOr(blk, "nTx", 0),
    size: valueOr(blk, "size", 0),
    weight: valueOr(blk, "weight", 0),
    difficulty: valueOr(blk, "difficulty", 0),
    confirmations: valueOr(blk, "confirmations", 0),
    miner: MINER_PLACEHOLDER,
  };
  const coinbaseTxid = at(at(blk, "tx"), 0);
  if (coinbaseTxid.kind === "string") {
    try {
      const coinbase = await api.getRawTransaction(coinbaseTxid.value, true);
      block.miner = extractMinerTag(valueOr(at(at(coinbase, "vin"), 0), "coinbase", ""));
    } catch {
      // miner tag is cosmetic; the block itself resolved
      block.miner = MINER_PLACEHOLDER;
    }
  }
  return block;
}

export function readMempoolEntry(entry: JsonValue): MempoolTx {
  const fees = at(entry, "fees");
  const fee = fees.kind === "object" ? valueOr(fees, "base", 0) : valueOr(entry, "fee", 0);
  const vsize = valueOr(entry, "vsize", 0);
  return {
    vsize,
    weight: valueOr(entry, "weight", 0),
    fee,
    feeRate: vsize > 0 ? (fee * 1e8) / vsize : 0,
    ancestors: valueOr(entry, "ancestorcount", 0),
    descendants: valueOr(entry, "descendantcount", 0),
    entryTime: valueOr(entry, "time", 0),
  };
}

function readInput(inp: JsonValue): TxInput {
  if (hasKey(inp, "coinbase")) return { kind: "coinbase" };
  return { kind: "prevout", txid: valueOr(inp, "txid", ""), vout: valueOr(inp, "vout", 0) };
}

function readOutput(out: JsonValue): TxOutput {
  const spk = at(out, "scriptPubKey");
  const address = valueOr(spk, "address", "");
  return {
    value: valueOr(out, "value", 0),
    address: address === "" ? null : address,
    type: valueOr(spk, "type", ""),
  };
}

export function readConfirmedTx(tx: JsonValue, tip: number): ConfirmedTx {
  const confirmations = valueOr(tx, "confirmations", 0);
  const outputs = itemsOf(at(tx, "vout")).map(readOutput);
  return {
    vsize: valueOr(tx, "vsize", 0),
    weight: valueOr(tx, "weight", 0),
    blockHash: valueOr(tx, "blockhash", ""),
    blockHeight: tip > 0 && confirmations > 0 ? tip - confirmations + 1 : null,
    confirmations,
    blockTime: valueOr(tx, "blocktime", 0),
    inputs: itemsOf(at(tx, "vin")).map(readInput),
    outputs,
    totalOutput: outputs.reduce((sum, o) => sum + o.value, 0),
  };
}

async function lookup(api: DaemonApi, query: string, isHeightQuery: boolean, tip: number): Promise<SearchOutcome> {
  if (isHeightQuery) {
    const hash = getAs(await api.getBlockHash(Number(query)), "string");
    return { kind: "block", block: await fetchBlock(api, hash) };
  }
  try {
    return { kind: "mempool", tx: readMempoolEntry(await api.getMempoolEntry(query)) };
  } catch {
    // not in the mempool
  }
  try {
    return { kind: "confirmed", tx: readConfirmedTx(await api.getRawTransaction(query, true), tip) };
  } catch {
    // unknown to the tx index, or not a transaction at all
  }
  return { kind: "block", block: await fetchBlock(api, query) };
}

/**
 * Resolves a height, txid or block hash: height -> block; otherwise mempool entry, then
 * confirmed transaction, then block hash. Only the last step's failure surfaces, as an
 * `error` outcome. Never throws and touches no shared state.
 */
export async function resolveQuery(
  api: DaemonApi,
  query: string,
  isHeightQuery: boolean,
  tip: number,
): Promise<SearchResult> {
  let outcome: SearchOutcome;
  try {
    outcome = await lookup(api, query, isHeightQuery, tip);
  } catch (e) {
    outcome = { kind: "error", message: errorMessage(e) };
  }
  return { query, outcome, nav: emptyNav() };
}
