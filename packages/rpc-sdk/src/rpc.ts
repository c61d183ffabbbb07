import net from "node:net";
import {
  JsonParseError,
  at,
  jsonArray,
  jsonInt,
  jsonObject,
  jsonString,
  parseJson,
  serializeJson,
  valueOr,
  type JsonValue,
} from "./json.js";
import { buildHttpRequest, parseHttpResponse, type HttpResponse } from "./http.js";
import { RpcAuthError, RpcError, RpcHttpError, RpcProtocolError, RpcTimeoutError, RpcTransportError } from "./errors.js";
import { DEFAULT_RPC_HOST, DEFAULT_RPC_TIMEOUT_MS } from "./network.js";

export type RpcConfig = {
  host: string;
  port: number;
  user: string;
  password: string;
  /** Socket timeout, applied to connect and to each read/write. */
  timeoutMs: number;
};

/** Anything that can answer a daemon call with the envelope's `result`. */
export interface RpcCaller {
  call(method: string, params?: JsonValue[]): Promise<JsonValue>;
}

export function defaultRpcConfig(port: number): RpcConfig {
  return { host: DEFAULT_RPC_HOST, port, user: "", password: "", timeoutMs: DEFAULT_RPC_TIMEOUT_MS };
}

/**
 * Maps an HTTP reply to a JSON-RPC envelope. The daemon reports RPC-level errors with
 * status 500 and the envelope still in the body.
 */
export function decodeEnvelope(res: HttpResponse): JsonValue {
  if (res.status === 401) throw new RpcAuthError();
  if (res.status !== 200 && res.status !== 500) throw new RpcHttpError(`HTTP ${res.status}`, res.status);
  let envelope: JsonValue;
  try {
    envelope = parseJson(res.body);
  } catch (e) {
    if (e instanceof JsonParseError) throw new RpcProtocolError(`JSON parse error: ${e.message}`);
    throw e;
  }
  const err = at(envelope, "error");
  if (err.kind !== "null") {
    throw new RpcError(valueOr(err, "message", "RPC error"), valueOr(err, "code", 0));
  }
  return envelope;
}

/**
 * JSON-RPC 1.1 client speaking raw HTTP/1.0 over a fresh TCP connection per call.
 * No pooling or pipelining; concurrent calls each own their socket.
 */
export class NodeRpcClient implements RpcCaller {
  private nextId = 1;

  constructor(private readonly config: RpcConfig) {
    if (!config.host.trim()) throw new Error("RPC host required");
    if (!Number.isInteger(config.port) || config.port <= 0 || config.port > 65535) {
      throw new Error(`invalid RPC port: ${config.port}`);
    }
  }

  get endpoint(): string {
    return `${this.config.host}:${this.config.port}`;
  }

  /** Sends one call and returns the whole decoded envelope. */
  async request(method: string, params: JsonValue[] = []): Promise<JsonValue> {
    const envelope = jsonObject([
      ["jsonrpc", jsonString("1.1")],
      ["id", jsonInt(this.nextId++)],
      ["method", jsonString(method)],
      ["params", jsonArray(params)],
    ]);
    const raw = await this.exchange(
      buildHttpRequest({
        host: this.config.host,
        user: this.config.user,
        password: this.config.password,
        body: serializeJson(envelope),
      }),
    );
    return decodeEnvelope(parseHttpResponse(raw));
  }

  async call(method: string, params: JsonValue[] = []): Promise<JsonValue> {
    return at(await this.request(method, params), "result");
  }

  private exchange(payload: Uint8Array): Promise<Uint8Array> {
    const { host, port, timeoutMs } = this.config;
    return new Promise<Uint8Array>((resolve, reject) => {
      const chunks: Buffer[] = [];
      let connected = false;
      const socket = net.connect({ host, port });
      socket.setTimeout(timeoutMs);
      socket.once("connect", () => {
        connected = true;
        socket.write(payload);
      });
      socket.on("data", (chunk: Buffer) => chunks.push(chunk));
      socket.once("timeout", () => {
        socket.destroy(new RpcTimeoutError(`RPC timeout after ${timeoutMs}ms`));
      });
      socket.once("error", (err: Error) => {
        if (err instanceof RpcTransportError) reject(err);
        else if (!connected) reject(new RpcTransportError(`connect to ${host}:${port} failed: ${err.message}`));
        else reject(new RpcTransportError(`connection to ${host}:${port} failed: ${err.message}`));
      });
      // Reply is complete once the daemon closes its side.
      socket.once("close", (hadError: boolean) => {
        if (!hadError) resolve(Buffer.concat(chunks));
      });
    });
  }
}
