import { Box, Text } from "ink";
import {
  formatBtc,
  formatBytes,
  formatDifficulty,
  formatHashRate,
  formatHeight,
  formatInt,
  formatSatPerVb,
  type PeerRecord,
  type Snapshot,
} from "@blocktop/monitor-core";
import { usageColor } from "./layout.js";
import { Gauge, LabelValue, Section } from "./widgets.js";

function yesNo(v: boolean): string {
  return v ? "yes" : "no";
}

function usageFraction(s: Snapshot): number {
  return s.mempool.maxMempool > 0 ? s.mempool.usage / s.mempool.maxMempool : 0;
}

export function DashboardTab({ snapshot: s }: { snapshot: Snapshot }) {
  const { chain, network, mempool } = s;
  const isMain = chain.chain === "main";
  const usage = usageFraction(s);
  return (
    <Box flexDirection="column" flexGrow={1}>
      <Box>
        <Section title="Blockchain" grow>
          <LabelValue label="  Chain       : " value={isMain ? "mainnet" : chain.chain} color={isMain ? "green" : "yellow"} />
          <LabelValue label="  Height      : " value={formatHeight(chain.blocks)} />
          <LabelValue label="  Headers     : " value={formatHeight(chain.headers)} />
          <LabelValue label="  Difficulty  : " value={formatDifficulty(chain.difficulty)} />
          <LabelValue label="  Hash Rate   : " value={formatHashRate(s.networkHashPs)} />
          <Gauge
            label="  Sync        : "
            fraction={chain.verificationProgress}
            color={chain.verificationProgress >= 1 ? "green" : "yellow"}
            suffix={`${Math.floor(chain.verificationProgress * 100)}%`}
          />
          <LabelValue label="  IBD         : " value={yesNo(chain.ibd)} color={chain.ibd ? "yellow" : "green"} />
          <LabelValue label="  Pruned      : " value={yesNo(chain.pruned)} />
        </Section>
        <Section title="Network" grow>
          <LabelValue
            label="  Active      : "
            value={yesNo(network.networkActive)}
            color={network.networkActive ? "green" : "red"}
          />
          <LabelValue label="  Connections : " value={String(network.connections)} />
          <LabelValue label="    In        : " value={String(network.connectionsIn)} />
          <LabelValue label="    Out       : " value={String(network.connectionsOut)} />
          <LabelValue label="  Client      : " value={network.subversion} />
          <LabelValue label="  Protocol    : " value={String(network.protocolVersion)} />
          <LabelValue label="  Relay fee   : " value={formatSatPerVb(network.relayFee)} />
        </Section>
      </Box>
      <Section title="Mempool">
        <LabelValue label="  Transactions: " value={formatInt(mempool.size)} />
        <LabelValue label="  Size        : " value={formatBytes(mempool.bytes)} />
        <LabelValue label="  Total fee   : " value={formatBtc(mempool.totalFee, 4)} />
        <LabelValue label="  Min fee     : " value={formatSatPerVb(mempool.minFee)} />
        <Gauge
          label="  Memory      : "
          fraction={usage}
          color={usage > 0.8 ? "red" : "cyan"}
          suffix={`${formatBytes(mempool.usage)} / ${formatBytes(mempool.maxMempool)}`}
        />
      </Section>
    </Box>
  );
}

export function MempoolStats({ snapshot: s }: { snapshot: Snapshot }) {
  const { mempool } = s;
  const usage = usageFraction(s);
  return (
    <Section title="Mempool">
      <LabelValue label="  Transactions    : " value={formatInt(mempool.size)} />
      <LabelValue label="  Virtual size    : " value={formatBytes(mempool.bytes)} />
      <LabelValue label="  Total fees      : " value={formatBtc(mempool.totalFee)} />
      <LabelValue label="  Min relay fee   : " value={formatSatPerVb(mempool.minFee)} />
      <Text color="gray">{"  Memory usage"}</Text>
      <Gauge label="  " fraction={usage} color={usageColor(usage)} suffix="" width={48} />
      <Box>
        <Text color="gray">{"  Used : "}</Text>
        <Text bold>{formatBytes(mempool.usage)}</Text>
        <Text color="gray">{"  /  Max : "}</Text>
        <Text bold>{formatBytes(mempool.maxMempool)}</Text>
      </Box>
    </Section>
  );
}

export function NetworkTab({ snapshot: s }: { snapshot: Snapshot }) {
  const { network } = s;
  return (
    <Box flexDirection="column" flexGrow={1}>
      <Section title="Network Status">
        <LabelValue
          label="  Network active : "
          value={yesNo(network.networkActive)}
          color={network.networkActive ? "green" : "red"}
        />
        <LabelValue label="  Total peers    : " value={String(network.connections)} />
        <LabelValue label="  Inbound        : " value={String(network.connectionsIn)} />
        <LabelValue label="  Outbound       : " value={String(network.connectionsOut)} />
      </Section>
      <Section title="Node">
        <LabelValue label="  Client version : " value={network.subversion} />
        <LabelValue label="  Protocol       : " value={String(network.protocolVersion)} />
        <LabelValue label="  Relay fee      : " value={formatSatPerVb(network.relayFee)} />
      </Section>
    </Box>
  );
}

export function peerRow(p: PeerRecord): string[] {
  return [
    String(p.id),
    p.addr,
    p.network ? p.network.slice(0, 4) : "?",
    p.inbound ? "in" : "out",
    p.pingMs === null ? "—" : p.pingMs.toFixed(1),
    formatBytes(p.bytesRecv),
    formatBytes(p.bytesSent),
    formatHeight(p.syncedBlocks),
  ];
}

const PEER_COLUMNS: ReadonlyArray<{ title: string; width?: number; right?: boolean }> = [
  { title: "ID", width: 5 },
  { title: "Address" },
  { title: "Net", width: 5 },
  { title: "I/O", width: 4 },
  { title: "Ping ms", width: 8, right: true },
  { title: "Recv", width: 10, right: true },
  { title: "Sent", width: 10, right: true },
  { title: "Height", width: 9, right: true },
];

function Cell({ text, col, color, bold }: { text: string; col: number; color?: string; bold?: boolean }) {
  const column = PEER_COLUMNS[col];
  return (
    <Box
      width={column?.width}
      flexGrow={column?.width === undefined ? 1 : 0}
      justifyContent={column?.right ? "flex-end" : "flex-start"}
    >
      <Text color={color} bold={bold} wrap="truncate">
        {text}
      </Text>
    </Box>
  );
}

export function PeersTab({ snapshot: s }: { snapshot: Snapshot }) {
  if (s.peers.length === 0) {
    return (
      <Box justifyContent="center" flexGrow={1}>
        <Text color="gray">No peers connected.</Text>
      </Box>
    );
  }
  return (
    <Box flexDirection="column" borderStyle="round" borderColor="gray" flexGrow={1}>
      <Box>
        {PEER_COLUMNS.map((c, i) => (
          <Cell key={c.title} text={c.title} col={i} color="yellowBright" bold />
        ))}
      </Box>
      {s.peers.map((p) => (
        <Box key={p.id}>
          {peerRow(p).map((cell, i) => (
            <Cell key={i} text={cell} col={i} color={i === 3 ? (p.inbound ? "cyan" : "green") : undefined} />
          ))}
        </Box>
      ))}
    </Box>
  );
}
