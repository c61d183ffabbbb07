import { readFileSync } from "node:fs";
import {
  JSON_NULL,
  RpcError,
  getAs,
  jsonInt,
  parseJson,
  setKey,
  toJsonValue,
  type JsonValue,
  type RpcCaller,
} from "@blocktop/rpc-sdk";

export function fixture(name: string): JsonValue {
  return parseJson(readFileSync(new URL(`./fixtures/${name}.json`, import.meta.url), "utf8"));
}

type Handler = (params: JsonValue[]) => JsonValue | Promise<JsonValue>;

export type RecordedCall = { method: string; params: JsonValue[] };

/** In-process daemon: answers from registered handlers, -32601 for anything else. */
export class FakeDaemon implements RpcCaller {
  readonly calls: RecordedCall[] = [];
  private readonly handlers = new Map<string, Handler>();

  on(method: string, answer: Handler | JsonValue): this {
    this.handlers.set(method, typeof answer === "function" ? answer : () => answer);
    return this;
  }

  /** Registers the four calls behind one poll's core metrics. */
  withCoreMetrics(blocks = 840000): this {
    const bc = fixture("blockchaininfo");
    setKey(bc, "blocks", jsonInt(blocks));
    return this.on("getblockchaininfo", bc)
      .on("getnetworkinfo", fixture("networkinfo"))
      .on("getmempoolinfo", fixture("mempoolinfo"))
      .on("getpeerinfo", fixture("peerinfo"));
  }

  count(method: string): number {
    return this.calls.filter((c) => c.method === method).length;
  }

  async call(method: string, params: JsonValue[] = []): Promise<JsonValue> {
    this.calls.push({ method, params });
    const handler = this.handlers.get(method);
    if (!handler) throw new RpcError("Method not found", -32601);
    return await handler(params);
  }
}

export function notFound(): never {
  throw new RpcError("No such mempool or blockchain transaction", -5);
}

/** getblockstats for any height, one block every ten minutes back from 840000. */
export function blockStats(params: JsonValue[]): JsonValue {
  const height = getAs(params[0] ?? JSON_NULL, "number");
  return toJsonValue({
    height,
    txs: 3000,
    total_size: 1_500_000,
    total_weight: 3_990_000,
    time: 1713571767 - (840000 - height) * 600,
  });
}
