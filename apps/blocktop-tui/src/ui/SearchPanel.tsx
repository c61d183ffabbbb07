import type { ReactNode } from "react";
import { Box, Text } from "ink";
import {
  abbreviateHash,
  classifyResult,
  formatAge,
  formatBtc,
  formatDateTime,
  formatDifficulty,
  formatHeight,
  formatInt,
  inputsRow,
  outputsRow,
  overlayOpen,
  overlayWindow,
  truncateMiddle,
  type BlockDetails,
  type ConfirmedTx,
  type MempoolTx,
  type NavState,
  type SearchResult,
  type TxInput,
  type TxOutput,
} from "@blocktop/monitor-core";
import { LabelValue } from "./widgets.js";

const PANEL_WIDTH = 70;
const IO_PANEL_WIDTH = 84;

function Panel({ title, query, width, children }: { title: string; query: string; width: number; children: ReactNode }) {
  return (
    <Box flexGrow={1} justifyContent="center" alignItems="center">
      <Box flexDirection="column" borderStyle="round" width={width}>
        <Box justifyContent="space-between">
          <Text bold color="yellowBright">
            {title}
          </Text>
          <Text color="gray">{` ${abbreviateHash(query)} `}</Text>
        </Box>
        {children}
      </Box>
    </Box>
  );
}

function LinkRow({ label, value, selected }: { label: string; value: string; selected: boolean }) {
  return (
    <Box>
      <Text color="gray" inverse={selected}>
        {label}
      </Text>
      <Text color="cyan" underline inverse={selected}>
        {value}
      </Text>
    </Box>
  );
}

function BlockRows({ block, now }: { block: BlockDetails; now: number }) {
  return (
    <>
      <Text color="cyan" bold>
        {"  ⛏ BLOCK"}
      </Text>
      <LabelValue label="  Height       : " value={formatHeight(block.height)} />
      <LabelValue label="  Hash         : " value={abbreviateHash(block.hash, 4, 44)} />
      <LabelValue label="  Time         : " value={block.time > 0 ? formatDateTime(block.time) : "—"} />
      <LabelValue label="  Age          : " value={block.time > 0 ? formatAge(now - block.time) : "—"} />
      <LabelValue label="  Transactions : " value={formatInt(block.txCount)} />
      <LabelValue label="  Size         : " value={`${formatInt(block.size)} B`} />
      <LabelValue label="  Weight       : " value={`${formatInt(block.weight)} WU`} />
      <LabelValue label="  Difficulty   : " value={formatDifficulty(block.difficulty)} />
      <LabelValue label="  Miner        : " value={block.miner} />
      <LabelValue label="  Confirmations: " value={formatInt(block.confirmations)} />
    </>
  );
}

function MempoolRows({ tx, now }: { tx: MempoolTx; now: number }) {
  return (
    <>
      <Text color="yellow" bold>
        {"  ● MEMPOOL"}
      </Text>
      <LabelValue label="  Fee         : " value={formatBtc(tx.fee)} color="green" />
      <LabelValue label="  Fee rate    : " value={`${tx.feeRate.toFixed(1)} sat/vB`} />
      <LabelValue label="  vsize       : " value={`${formatInt(tx.vsize)} vB`} />
      <LabelValue label="  Weight      : " value={`${formatInt(tx.weight)} WU`} />
      <LabelValue label="  Ancestors   : " value={formatInt(tx.ancestors)} />
      <LabelValue label="  Descendants : " value={formatInt(tx.descendants)} />
      <LabelValue label="  In mempool  : " value={formatAge(now - tx.entryTime)} />
    </>
  );
}

function ConfirmedRows({ tx, nav, now }: { tx: ConfirmedTx; nav: NavState; now: number }) {
  return (
    <>
      <Text color="green" bold>
        {"  ✔ CONFIRMED"}
      </Text>
      <LabelValue label="  Confirmations: " value={formatInt(tx.confirmations)} />
      <LinkRow
        label="  Block #      : "
        value={tx.blockHeight === null ? "—" : formatHeight(tx.blockHeight)}
        selected={nav.selected === 0}
      />
      <LabelValue label="  Block hash   : " value={abbreviateHash(tx.blockHash, 4, 44)} />
      <LabelValue label="  Block age    : " value={tx.blockTime > 0 ? formatAge(now - tx.blockTime) : "—"} />
      <LabelValue label="  vsize        : " value={`${formatInt(tx.vsize)} vB`} />
      <LabelValue label="  Weight       : " value={`${formatInt(tx.weight)} WU`} />
      {tx.inputs.length > 0 ? (
        <LinkRow label="  Inputs       : " value={String(tx.inputs.length)} selected={nav.selected === inputsRow(tx)} />
      ) : null}
      {tx.outputs.length > 0 ? (
        <LinkRow label="  Outputs      : " value={String(tx.outputs.length)} selected={nav.selected === outputsRow(tx)} />
      ) : null}
      <LabelValue label="  Total out    : " value={formatBtc(tx.totalOutput)} color="green" />
    </>
  );
}

export function inputLabel(v: TxInput): string {
  return v.kind === "coinbase" ? "coinbase" : `${v.txid}:${v.vout}`;
}

export function outputLabel(v: TxOutput): string {
  const value = formatBtc(v.value);
  if (v.address !== null) return `${value}  ${truncateMiddle(v.address, 60)}`;
  return v.type ? `${value}  [${v.type}]` : value;
}

function ListOverlay({
  title,
  query,
  labels,
  dimmed,
  selected,
}: {
  title: string;
  query: string;
  labels: string[];
  dimmed: boolean[];
  selected: number;
}) {
  const n = labels.length;
  const { top, size } = overlayWindow(n, selected);
  return (
    <Panel title={` ${title} (${n}) `} query={query} width={IO_PANEL_WIDTH}>
      {labels.slice(top, top + size).map((label, k) => {
        const i = top + k;
        return (
          <Box key={i}>
            <Text color="gray" inverse={i === selected}>{`  [${i}] `}</Text>
            <Text color={dimmed[i] ? "gray" : undefined} inverse={i === selected}>
              {label}
            </Text>
          </Box>
        );
      })}
      {n > size ? (
        <Box justifyContent="flex-end">
          <Text color="gray">{`${top + 1}–${top + size} / ${n}`}</Text>
        </Box>
      ) : null}
    </Panel>
  );
}

/** Search result drawn over the Mempool tab, or an inputs/outputs list when one is open. */
export function SearchPanel({ result, now }: { result: SearchResult; now: number }) {
  const { outcome, nav, query } = result;

  if (outcome.kind === "confirmed") {
    const open = overlayOpen(result);
    if (open === "outputs") {
      return (
        <ListOverlay
          title="Outputs"
          query={query}
          labels={outcome.tx.outputs.map(outputLabel)}
          dimmed={outcome.tx.outputs.map(() => false)}
          selected={nav.outputs.selected}
        />
      );
    }
    if (open === "inputs") {
      return (
        <ListOverlay
          title="Inputs"
          query={query}
          labels={outcome.tx.inputs.map(inputLabel)}
          dimmed={outcome.tx.inputs.map((v) => v.kind === "coinbase")}
          selected={nav.inputs.selected}
        />
      );
    }
  }

  const kind = classifyResult(result);
  const title = kind === "block" ? " Block Search " : " Transaction Search ";
  return (
    <Panel title={title} query={query} width={PANEL_WIDTH}>
      {kind === "searching" ? <Text color="yellow">{"  Searching…"}</Text> : null}
      {outcome.kind === "block" ? <BlockRows block={outcome.block} now={now} /> : null}
      {outcome.kind === "mempool" ? <MempoolRows tx={outcome.tx} now={now} /> : null}
      {outcome.kind === "confirmed" ? <ConfirmedRows tx={outcome.tx} nav={nav} now={now} /> : null}
      {outcome.kind === "error" ? <Text color="red">{`  ${outcome.message}`}</Text> : null}
    </Panel>
  );
}
