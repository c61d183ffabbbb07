import { BLOCK_ANIM_FRAMES, type BlockStat, type Snapshot } from "@blocktop/monitor-core";

export const TAB_LABELS = ["Dashboard", "Mempool", "Network", "Peers"] as const;
export type TabIndex = 0 | 1 | 2 | 3;
export const MEMPOOL_TAB: TabIndex = 1;

export function cycleTab(tab: TabIndex, delta: number): TabIndex {
  const n = TAB_LABELS.length;
  const next = (((tab + delta) % n) + n) % n;
  return next === 1 ? 1 : next === 2 ? 2 : next === 3 ? 3 : 0;
}

export const BLOCK_COL_WIDTH = 10;
export const BLOCK_BAR_HEIGHT = 6;
/** Consensus block weight limit. */
export const MAX_BLOCK_WEIGHT = 4_000_000;

export function maxBlockColumns(terminalWidth: number): number {
  return Math.max(1, Math.floor((terminalWidth - 4) / (BLOCK_COL_WIDTH + 1)));
}

export type BlockStripFrame = {
  blocks: BlockStat[];
  /** Columns of blank space before the first block while the strip slides right. */
  leftPad: number;
};

/**
 * What the recent-blocks strip shows right now. While a new-block animation runs, the list
 * from before the tip moved is drawn shifted right (its oldest column falling off the edge)
 * by a growing offset; afterwards the fresh list is drawn in place.
 */
export function blockStripFrame(s: Pick<Snapshot, "recentBlocks" | "animation">, maxCols: number): BlockStripFrame {
  const sliding = s.animation.active && s.animation.previousBlocks.length > 0;
  const src = sliding ? s.animation.previousBlocks : s.recentBlocks;
  const count = Math.min(sliding ? Math.max(0, src.length - 1) : src.length, maxCols);
  const leftPad = sliding
    ? Math.round(((s.animation.frame + 1) / BLOCK_ANIM_FRAMES) * (BLOCK_COL_WIDTH + 1))
    : 0;
  return { blocks: src.slice(0, count), leftPad };
}

export type FillColor = "green" | "yellow" | "redBright";

export function blockFill(totalWeight: number): { rows: number; color: FillColor } {
  const fill = totalWeight > 0 ? Math.min(1, totalWeight / MAX_BLOCK_WEIGHT) : 0;
  return {
    rows: Math.round(fill * BLOCK_BAR_HEIGHT),
    color: fill > 0.9 ? "redBright" : fill > 0.7 ? "yellow" : "green",
  };
}

/** Text gauge of `width` cells, e.g. `█████░░░░░`. */
export function gaugeBar(fraction: number, width: number): string {
  const f = Number.isFinite(fraction) ? Math.min(1, Math.max(0, fraction)) : 0;
  const filled = Math.round(f * width);
  return "█".repeat(filled) + "░".repeat(width - filled);
}

export function usageColor(fraction: number): "red" | "yellow" | "cyan" {
  return fraction > 0.8 ? "red" : fraction > 0.5 ? "yellow" : "cyan";
}

/** Tail of the search input that fits `cols` columns, so the cursor end stays visible. */
export function promptWindow(text: string, cols: number): string {
  return text.length > cols ? text.slice(text.length - cols) : text;
}
