import { Command, CommanderError, InvalidArgumentError } from "commander";
import type { ChainName } from "@blocktop/rpc-sdk";
import { ConfigError } from "./config.js";

export const VERSION = "0.1.0";

export type CliOptions = {
  host?: string;
  port?: number;
  user?: string;
  password?: string;
  cookie?: string;
  datadir?: string;
  /** Last of --testnet/--signet/--regtest given; main when none. */
  network: ChainName;
  /** Seconds between polls. */
  refresh?: number;
};

export type CliResult = { kind: "run"; options: CliOptions } | { kind: "exit"; code: number };

export type CliOutput = {
  writeOut: (s: string) => void;
  writeErr: (s: string) => void;
};

const KEYS_HELP = `
Keyboard:
  Tab / Left / Right     Switch tabs
  /                      Search a txid, block hash or height
  Up / Down              Move through a transaction's block, inputs and outputs
  Enter                  Submit search / open row
  Escape                 Close / back / dismiss result / quit
  q                      Quit
`;

export function parsePort(raw: string): number {
  const n = Number(raw);
  if (!/^\d+$/.test(raw) || !Number.isInteger(n) || n < 1 || n > 65535) {
    throw new InvalidArgumentError(`invalid port: ${raw}`);
  }
  return n;
}

export function parseRefresh(raw: string): number {
  const n = Number(raw);
  if (!Number.isFinite(n) || n <= 0) throw new InvalidArgumentError(`invalid refresh interval: ${raw}`);
  return n;
}

/**
 * Parses `argv` (without node and script). `--help` and `--version` print and return an exit
 * result instead of exiting; bad arguments throw {@link ConfigError}.
 */
export function parseCli(argv: string[], output: CliOutput): CliResult {
  let network: ChainName = "main";
  const program = new Command()
    .name("blocktop")
    .description("Live terminal dashboard for a Bitcoin-style node's JSON-RPC service.")
    .helpOption("--help", "display help and exit")
    .version(`blocktop ${VERSION}`, "-v, --version", "print version and exit")
    .option("-h, --host <host>", "RPC host (default: 127.0.0.1)")
    .option("-p, --port <port>", "RPC port (default: network preset)", parsePort)
    .option("-u, --user <user>", "RPC username (disables cookie auth)")
    .option("-P, --password <pass>", "RPC password (disables cookie auth)")
    .option("-c, --cookie <path>", "path to .cookie file (auto-detected if omitted)")
    .option("-d, --datadir <path>", "data directory for cookie lookup")
    .option("--testnet", "testnet3 port and cookie subdir")
    .option("--signet", "signet port and cookie subdir")
    .option("--regtest", "regtest port and cookie subdir")
    .option("-r, --refresh <secs>", "refresh interval in seconds (default: 5)", parseRefresh)
    .addHelpText("after", KEYS_HELP)
    .exitOverride()
    .configureOutput({
      writeOut: output.writeOut,
      writeErr: output.writeErr,
      outputError: () => {},
    });

  for (const chain of ["testnet", "signet", "regtest"] as const) {
    program.on(`option:${chain}`, () => {
      network = chain;
    });
  }

  try {
    program.parse(argv, { from: "user" });
  } catch (e) {
    if (e instanceof CommanderError) {
      if (e.code === "commander.helpDisplayed" || e.code === "commander.version") {
        return { kind: "exit", code: 0 };
      }
      throw new ConfigError(e.message.replace(/^error: /, ""));
    }
    throw e;
  }

  const o = program.opts<{
    host?: string;
    port?: number;
    user?: string;
    password?: string;
    cookie?: string;
    datadir?: string;
    refresh?: number;
  }>();
  return {
    kind: "run",
    options: {
      host: o.host,
      port: o.port,
      user: o.user,
      password: o.password,
      cookie: o.cookie,
      datadir: o.datadir,
      network,
      refresh: o.refresh,
    },
  };
}
