import { jsonArray, jsonBool, jsonInt, jsonString, type JsonValue } from "./json.js";
import type { RpcCaller } from "./rpc.js";

export const BLOCK_STATS_FIELDS = ["height", "txs", "total_size", "total_weight", "time"] as const;

/** The daemon calls the dashboard uses, each returning the envelope's `result`. */
export class DaemonApi {
  constructor(private readonly rpc: RpcCaller) {}

  async getBlockchainInfo(): Promise<JsonValue> {
    return await this.rpc.call("getblockchaininfo");
  }

  async getNetworkInfo(): Promise<JsonValue> {
    return await this.rpc.call("getnetworkinfo");
  }

  async getMempoolInfo(): Promise<JsonValue> {
    return await this.rpc.call("getmempoolinfo");
  }

  async getPeerInfo(): Promise<JsonValue> {
    return await this.rpc.call("getpeerinfo");
  }

  async getBlockHash(height: number): Promise<JsonValue> {
    return await this.rpc.call("getblockhash", [jsonInt(height)]);
  }

  async getBlock(hash: string, verbosity = 1): Promise<JsonValue> {
    return await this.rpc.call("getblock", [jsonString(hash), jsonInt(verbosity)]);
  }

  /** Confirmed lookups need `txindex=1` on the daemon (or the tx still in the mempool). */
  async getRawTransaction(txid: string, verbose = true): Promise<JsonValue> {
    return await this.rpc.call("getrawtransaction", [jsonString(txid), jsonBool(verbose)]);
  }

  async getMempoolEntry(txid: string): Promise<JsonValue> {
    return await this.rpc.call("getmempoolentry", [jsonString(txid)]);
  }

  async getBlockStats(height: number, fields: readonly string[] = BLOCK_STATS_FIELDS): Promise<JsonValue> {
    return await this.rpc.call("getblockstats", [jsonInt(height), jsonArray(fields.map((f) => jsonString(f)))]);
  }
}
