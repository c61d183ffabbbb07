import { render } from "ink";
import { NodeRpcClient, errorMessage } from "@blocktop/rpc-sdk";
import { MonitorSession } from "@blocktop/monitor-core";
import { parseCli } from "./cli.js";
import { resolveConfig } from "./config.js";
import { App } from "./ui/App.js";

async function main(argv: string[]): Promise<number> {
  const parsed = parseCli(argv, {
    writeOut: (s) => process.stdout.write(s),
    writeErr: (s) => process.stderr.write(s),
  });
  if (parsed.kind === "exit") return parsed.code;

  const config = await resolveConfig(parsed.options);
  const rpc = new NodeRpcClient(config.rpc);
  const session = new MonitorSession({
    rpc,
    searchRpc: new NodeRpcClient(config.searchRpc),
    refreshMs: config.refreshMs,
  });

  session.start();
  const app = render(<App session={session} endpoint={rpc.endpoint} refreshSecs={config.refreshMs / 1000} />);
  try {
    await app.waitUntilExit();
  } finally {
    await session.shutdown();
  }
  return 0;
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (e: unknown) => {
    console.error(`blocktop: ${errorMessage(e)}`);
    process.exitCode = 1;
  },
);
