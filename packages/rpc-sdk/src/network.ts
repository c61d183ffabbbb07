export type ChainName = "main" | "testnet" | "signet" | "regtest";

export type DaemonNetworkConfig = {
  chain: ChainName;
  defaultPort: number;
  /**
   * Subdirectory of the data directory holding this network's `.cookie`.
   * Empty for mainnet, which keeps it at the top level.
   */
  cookieSubdir: string;
};

export const NETWORKS: Readonly<Record<ChainName, DaemonNetworkConfig>> = {
  main: { chain: "main", defaultPort: 8332, cookieSubdir: "" },
  testnet: { chain: "testnet", defaultPort: 18332, cookieSubdir: "testnet3" },
  signet: { chain: "signet", defaultPort: 38332, cookieSubdir: "signet" },
  regtest: { chain: "regtest", defaultPort: 18443, cookieSubdir: "regtest" },
};

export const DEFAULT_RPC_HOST = "127.0.0.1";
export const DEFAULT_RPC_TIMEOUT_MS = 10_000;
