import { Box, Text } from "ink";
import { formatBytes, formatHeight, formatInt, formatTimeAgo, type Snapshot } from "@blocktop/monitor-core";
import { BLOCK_BAR_HEIGHT, BLOCK_COL_WIDTH, blockFill, blockStripFrame, maxBlockColumns } from "./layout.js";
import { Section } from "./widgets.js";

function centre(s: string): string {
  if (s.length >= BLOCK_COL_WIDTH) return s.slice(0, BLOCK_COL_WIDTH);
  const left = Math.floor((BLOCK_COL_WIDTH - s.length) / 2);
  return " ".repeat(left) + s + " ".repeat(BLOCK_COL_WIDTH - s.length - left);
}

export function BlocksStrip({ snapshot, width, now }: { snapshot: Snapshot; width: number; now: number }) {
  if (snapshot.recentBlocks.length === 0 && !snapshot.animation.active) {
    return (
      <Section title="Recent Blocks">
        <Text color="gray">{"  Fetching…"}</Text>
      </Section>
    );
  }

  const { blocks, leftPad } = blockStripFrame(snapshot, maxBlockColumns(width));
  return (
    <Section title="Recent Blocks">
      <Box marginLeft={2 + leftPad} marginTop={1}>
        {blocks.map((b, i) => {
          const { rows, color } = blockFill(b.totalWeight);
          return (
            <Box key={b.height} flexDirection="column" width={BLOCK_COL_WIDTH} marginLeft={i === 0 ? 0 : 1}>
              {Array.from({ length: BLOCK_BAR_HEIGHT }, (_, r) =>
                r >= BLOCK_BAR_HEIGHT - rows ? (
                  <Text key={r} color={color}>
                    {"█".repeat(BLOCK_COL_WIDTH)}
                  </Text>
                ) : (
                  <Text key={r} color="gray">
                    {"░".repeat(BLOCK_COL_WIDTH)}
                  </Text>
                ),
              )}
              <Text>{centre(formatHeight(b.height))}</Text>
              <Text color="gray">{centre(`${formatInt(b.txs)} tx`)}</Text>
              <Text color="gray">{centre(formatBytes(b.totalSize))}</Text>
              <Text color="gray">{centre(b.time > 0 ? formatTimeAgo(b.time, now) : "")}</Text>
            </Box>
          );
        })}
      </Box>
    </Section>
  );
}
