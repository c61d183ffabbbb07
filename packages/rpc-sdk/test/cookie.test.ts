import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { cookiePath, defaultDataDir, parseCookie, readCookieFile } from "../src/cookie.js";
import { CookieError } from "../src/errors.js";
import { NETWORKS } from "../src/network.js";

describe("parseCookie", () => {
  it("splits the first line at the first colon", () => {
    expect(parseCookie("__cookie__:test-secret\r\nignored\n", "c")).toEqual({
      user: "__cookie__",
      password: "test-secret",
    });
    expect(parseCookie("user:pa:ss", "c")).toEqual({ user: "user", password: "pa:ss" });
  });

  it("rejects empty and separator-less cookies", () => {
    expect(() => parseCookie("\n", "/tmp/x")).toThrow(new CookieError("Cookie file is empty: /tmp/x"));
    expect(() => parseCookie("nocolon", "/tmp/x")).toThrow("Invalid cookie file (no ':' found): /tmp/x");
  });
});

describe("cookie locations", () => {
  it("uses the platform's default data directory", () => {
    expect(defaultDataDir("linux", "/home/sam")).toBe(path.join("/home/sam", ".bitcoin"));
    expect(defaultDataDir("darwin", "/Users/sam")).toBe(
      path.join("/Users/sam", "Library", "Application Support", "Bitcoin"),
    );
    expect(() => defaultDataDir("linux", "")).toThrow(CookieError);
  });

  it("puts each network's cookie in its own subdirectory", () => {
    expect(cookiePath(NETWORKS.main, "/data")).toBe(path.join("/data", ".cookie"));
    expect(cookiePath(NETWORKS.testnet, "/data")).toBe(path.join("/data", "testnet3", ".cookie"));
    expect(cookiePath(NETWORKS.signet, "/data")).toBe(path.join("/data", "signet", ".cookie"));
    expect(cookiePath(NETWORKS.regtest, "/data")).toBe(path.join("/data", "regtest", ".cookie"));
  });
});

describe("readCookieFile", () => {
  let dir = "";

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "blocktop-cookie-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("reads credentials from disk", async () => {
    const file = path.join(dir, ".cookie");
    await writeFile(file, "__cookie__:test-secret");
    expect(await readCookieFile(file)).toEqual({ user: "__cookie__", password: "test-secret" });
  });

  it("wraps a missing file in CookieError", async () => {
    const file = path.join(dir, "missing");
    const err = await readCookieFile(file).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(CookieError);
    expect(err).toMatchObject({ message: expect.stringContaining(`Cannot open cookie file: ${file}`) });
  });
});
