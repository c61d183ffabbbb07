import { readFile } from "node:fs/promises";
import { homedir } from "node:os";
import path from "node:path";
import { CookieError, errorMessage } from "./errors.js";
import type { DaemonNetworkConfig } from "./network.js";

export type CookieCredentials = {
  user: string;
  password: string;
};

export function defaultDataDir(platform: NodeJS.Platform = process.platform, home: string = homedir()): string {
  if (!home) throw new CookieError("HOME not set; use --datadir or --cookie to locate .cookie");
  return platform === "darwin"
    ? path.join(home, "Library", "Application Support", "Bitcoin")
    : path.join(home, ".bitcoin");
}

export function cookiePath(network: DaemonNetworkConfig, dataDir?: string): string {
  const base = dataDir ?? defaultDataDir();
  return path.join(base, network.cookieSubdir, ".cookie");
}

/** Parses the first line of a cookie file: `name:secret`. */
export function parseCookie(text: string, source: string): CookieCredentials {
  const line = (text.split("\n", 1)[0] ?? "").replace(/\r$/, "");
  if (!line) throw new CookieError(`Cookie file is empty: ${source}`);
  const colon = line.indexOf(":");
  if (colon < 0) throw new CookieError(`Invalid cookie file (no ':' found): ${source}`);
  return { user: line.slice(0, colon), password: line.slice(colon + 1) };
}

export async function readCookieFile(file: string): Promise<CookieCredentials> {
  let text: string;
  try {
    text = await readFile(file, "utf8");
  } catch (e) {
    throw new CookieError(`Cannot open cookie file: ${file} (${errorMessage(e)})`);
  }
  return parseCookie(text, file);
}
