import { useState, type ReactNode } from "react";
import { Box, Text, useApp, useInput, useStdout } from "ink";
import { formatClock, nowSeconds, type MonitorSession, type Snapshot } from "@blocktop/monitor-core";
import { BlocksStrip } from "./BlocksStrip.js";
import { keyHints, resolveKey } from "./keymap.js";
import { MEMPOOL_TAB, TAB_LABELS, cycleTab, promptWindow, type TabIndex } from "./layout.js";
import { SearchPanel } from "./SearchPanel.js";
import { DashboardTab, MempoolStats, NetworkTab, PeersTab } from "./tabs.js";
import { useSessionView } from "./useSessionView.js";

const PROMPT_WIDTH = 46;

function StatusLeft({ snapshot: s }: { snapshot: Snapshot }) {
  const { status } = s;
  if (!status.connected && status.lastError) {
    return (
      <Box>
        <Text backgroundColor="red" color="white" bold>
          {" ERROR "}
        </Text>
        <Text color="red">{` ${status.lastError}`}</Text>
      </Box>
    );
  }
  return (
    <Box>
      {status.connected ? (
        <Text color="green" bold>
          {" ● CONNECTED"}
        </Text>
      ) : (
        <Text color="yellow" bold>
          {" ○ CONNECTING…"}
        </Text>
      )}
      <Text color="gray">{`  Last update: ${status.lastUpdateMs === null ? "—" : formatClock(status.lastUpdateMs)}`}</Text>
    </Box>
  );
}

function ChainBadge({ chain }: { chain: string }) {
  if (!chain || chain === "—") return null;
  const main = chain === "main";
  return (
    <Text bold backgroundColor={main ? "green" : "yellow"} color={main ? "white" : "black"}>
      {` ${chain} `}
    </Text>
  );
}

export function App({ session, endpoint, refreshSecs }: { session: MonitorSession; endpoint: string; refreshSecs: number }) {
  const { exit } = useApp();
  const { stdout } = useStdout();
  const { snapshot, search } = useSessionView(session);
  const [tab, setTab] = useState<TabIndex>(0);
  const [prompt, setPrompt] = useState<string | null>(null);

  const width = stdout.columns ?? 80;
  const now = nowSeconds();
  const ctx = { promptActive: prompt !== null, current: search.current };

  useInput((input, key) => {
    const cmd = resolveKey(ctx, input, key);
    switch (cmd.type) {
      case "prompt-open":
        setPrompt("");
        return;
      case "prompt-cancel":
        setPrompt(null);
        return;
      case "prompt-backspace":
        setPrompt((p) => (p === null ? p : p.slice(0, -1)));
        return;
      case "prompt-type":
        setPrompt((p) => (p ?? "") + cmd.text);
        return;
      case "prompt-submit": {
        const query = prompt ?? "";
        setPrompt(null);
        if (session.dispatch({ type: "submit-query", query })) setTab(MEMPOOL_TAB);
        return;
      }
      case "switch-tab":
        setTab((t) => cycleTab(t, cmd.delta));
        return;
      case "session":
        session.dispatch(cmd.event);
        return;
      case "escape":
        if (!session.escape()) exit();
        return;
      case "quit":
        exit();
        return;
      case "ignore":
        return;
    }
  });

  let content: ReactNode = null;
  switch (tab) {
    case 0:
      content = <DashboardTab snapshot={snapshot} />;
      break;
    case 1:
      content = search.current ? (
        <SearchPanel result={search.current} now={now} />
      ) : (
        <Box flexDirection="column" flexGrow={1}>
          <MempoolStats snapshot={snapshot} />
          <BlocksStrip snapshot={snapshot} width={width} now={now} />
        </Box>
      );
      break;
    case 2:
      content = <NetworkTab snapshot={snapshot} />;
      break;
    case 3:
      content = <PeersTab snapshot={snapshot} />;
      break;
  }

  const refresh = snapshot.status.refreshing ? (
    <Text color="yellow">{" ↻ refreshing"}</Text>
  ) : (
    <Text color="gray">{` ↻ every ${refreshSecs}s`}</Text>
  );
  const hints = keyHints(ctx);
  const idle = prompt === null && search.current === null;

  return (
    <Box flexDirection="column" width={width}>
      <Box borderStyle="round" justifyContent="space-between">
        <Box>
          <Text bold color="yellowBright">
            {" ₿ blocktop "}
          </Text>
          <Text color="gray">{` ${endpoint} `}</Text>
        </Box>
        <ChainBadge chain={snapshot.chain.chain} />
      </Box>

      <Box borderStyle="round" justifyContent="space-between">
        <Box>
          {TAB_LABELS.map((label, i) => (
            <Text key={label} bold={i === tab} inverse={i === tab} dimColor={i !== tab}>
              {i > 0 ? "│" : ""}
              {` ${label} `}
            </Text>
          ))}
        </Box>
        <Box width={PROMPT_WIDTH}>
          {prompt === null ? (
            <Text color="gray">{" / search "}</Text>
          ) : (
            <Text color="white">{` ${promptWindow(prompt, PROMPT_WIDTH - 3)}│`}</Text>
          )}
        </Box>
      </Box>

      <Box flexGrow={1}>{content}</Box>

      <Box borderStyle="round" justifyContent="space-between">
        <StatusLeft snapshot={snapshot} />
        <Box>
          {idle ? refresh : null}
          <Text color={idle ? "gray" : "yellow"}>{`  ${hints} `}</Text>
        </Box>
      </Box>
    </Box>
  );
}
