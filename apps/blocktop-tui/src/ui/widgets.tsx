import type { ReactNode } from "react";
import { Box, Text } from "ink";
import { gaugeBar } from "./layout.js";

export function LabelValue({ label, value, color }: { label: string; value: string; color?: string }) {
  return (
    <Box>
      <Text color="gray">{label}</Text>
      <Text color={color} bold>
        {value}
      </Text>
    </Box>
  );
}

export function Section({ title, children, grow }: { title: string; children: ReactNode; grow?: boolean }) {
  return (
    <Box flexDirection="column" borderStyle="round" borderColor="gray" flexGrow={grow ? 1 : 0}>
      <Text bold color="yellowBright">
        {` ${title} `}
      </Text>
      {children}
    </Box>
  );
}

export function Gauge({
  label,
  fraction,
  color,
  suffix,
  width = 24,
}: {
  label: string;
  fraction: number;
  color: string;
  suffix: string;
  width?: number;
}) {
  return (
    <Box>
      <Text color="gray">{label}</Text>
      <Text color={color}>{gaugeBar(fraction, width)}</Text>
      <Text bold>{` ${suffix}`}</Text>
    </Box>
  );
}
