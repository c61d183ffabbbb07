import {
  DEFAULT_RPC_HOST,
  DEFAULT_RPC_TIMEOUT_MS,
  NETWORKS,
  cookiePath,
  readCookieFile,
  type ChainName,
  type CookieCredentials,
  type RpcConfig,
} from "@blocktop/rpc-sdk";
import { DEFAULT_REFRESH_MS } from "@blocktop/monitor-core";
import type { CliOptions } from "./cli.js";

export const SEARCH_TIMEOUT_MS = 5_000;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export type AuthSource = "password" | "cookie" | "none";

export type AppConfig = {
  network: ChainName;
  rpc: RpcConfig;
  /** Same endpoint and credentials as `rpc`, shorter timeout. */
  searchRpc: RpcConfig;
  refreshMs: number;
  auth: AuthSource;
  /** Cookie file consulted, whether or not it could be read. */
  cookiePath: string | null;
};

export type Env = Readonly<Record<string, string | undefined>>;

export type ConfigDeps = {
  readCookie: (file: string) => Promise<CookieCredentials>;
};

function envPort(raw: string | undefined): number | undefined {
  if (raw === undefined || raw === "") return undefined;
  const n = Number(raw);
  if (!/^\d+$/.test(raw) || n < 1 || n > 65535) throw new ConfigError(`invalid BLOCKTOP_RPC_PORT: ${raw}`);
  return n;
}

function nonEmpty(raw: string | undefined): string | undefined {
  return raw === undefined || raw === "" ? undefined : raw;
}

/**
 * Merges flags over environment over network presets, then settles credentials: an explicit
 * user or password wins; otherwise the cookie file. An unreadable cookie is fatal only when its
 * path was given explicitly; an auto-detected one is skipped and the daemon's 401 surfaces in
 * the dashboard instead.
 */
export async function resolveConfig(
  opts: CliOptions,
  env: Env = process.env,
  deps: ConfigDeps = { readCookie: readCookieFile },
): Promise<AppConfig> {
  const preset = NETWORKS[opts.network];
  const host = opts.host ?? nonEmpty(env.BLOCKTOP_RPC_HOST) ?? DEFAULT_RPC_HOST;
  if (!host.trim()) throw new ConfigError("RPC host must not be empty");
  const port = opts.port ?? envPort(env.BLOCKTOP_RPC_PORT) ?? preset.defaultPort;
  const refreshMs = opts.refresh === undefined ? DEFAULT_REFRESH_MS : Math.round(opts.refresh * 1000);
  if (!(refreshMs > 0)) throw new ConfigError(`invalid refresh interval: ${String(opts.refresh)}`);

  let user = opts.user ?? nonEmpty(env.BLOCKTOP_RPC_USER);
  let password = opts.password ?? nonEmpty(env.BLOCKTOP_RPC_PASSWORD);
  let auth: AuthSource = "password";
  let cookieFile: string | null = null;

  if (user === undefined && password === undefined) {
    const explicit = opts.cookie ?? nonEmpty(env.BLOCKTOP_COOKIE);
    auth = "none";
    try {
      cookieFile = explicit ?? cookiePath(preset, opts.datadir);
      const creds = await deps.readCookie(cookieFile);
      user = creds.user;
      password = creds.password;
      auth = "cookie";
    } catch (e) {
      if (explicit !== undefined) throw e;
      // auto-detected cookie missing: connect without credentials
      auth = "none";
    }
  }

  const rpc: RpcConfig = {
    host,
    port,
    user: user ?? "",
    password: password ?? "",
    timeoutMs: DEFAULT_RPC_TIMEOUT_MS,
  };
  return {
    network: opts.network,
    rpc,
    searchRpc: { ...rpc, timeoutMs: SEARCH_TIMEOUT_MS },
    refreshMs,
    auth,
    cookiePath: cookieFile,
  };
}
