import { describe, expect, it } from "vitest";
import { BLOCK_ANIM_FRAMES, type BlockStat } from "@blocktop/monitor-core";
import {
  blockFill,
  blockStripFrame,
  cycleTab,
  gaugeBar,
  maxBlockColumns,
  promptWindow,
  usageColor,
} from "../src/ui/layout.js";

function blocks(tip: number, n: number): BlockStat[] {
  return Array.from({ length: n }, (_, i) => ({
    height: tip - i,
    txs: 1000,
    totalSize: 1_000_000,
    totalWeight: 3_000_000,
    time: 1713571767 - i * 600,
  }));
}

describe("cycleTab", () => {
  it("wraps in both directions", () => {
    expect(cycleTab(0, -1)).toBe(3);
    expect(cycleTab(3, 1)).toBe(0);
    expect(cycleTab(1, 1)).toBe(2);
  });
});

describe("blockStripFrame", () => {
  it("fits as many columns as the terminal allows", () => {
    expect(maxBlockColumns(80)).toBe(6);
    expect(maxBlockColumns(4)).toBe(1);

    const idle = { recentBlocks: blocks(100, 5), animation: { active: false, frame: 0, previousBlocks: [] } };
    const frame = blockStripFrame(idle, 3);
    expect(frame.blocks.map((b) => b.height)).toEqual([100, 99, 98]);
    expect(frame.leftPad).toBe(0);
  });

  it("slides the previous list right while a new block animates in", () => {
    const s = { recentBlocks: blocks(101, 5), animation: { active: true, frame: 0, previousBlocks: blocks(100, 4) } };
    const first = blockStripFrame(s, 10);
    expect(first.blocks.map((b) => b.height)).toEqual([100, 99, 98]);
    expect(first.leftPad).toBe(1);

    const last = blockStripFrame({ ...s, animation: { ...s.animation, frame: BLOCK_ANIM_FRAMES - 1 } }, 10);
    expect(last.leftPad).toBe(11);
  });

  it("shows the fresh list when there is nothing to slide", () => {
    const s = { recentBlocks: blocks(101, 2), animation: { active: true, frame: 3, previousBlocks: [] } };
    expect(blockStripFrame(s, 10)).toEqual({ blocks: blocks(101, 2), leftPad: 0 });
  });
});

describe("blockFill", () => {
  it("scales the bar and colours it by weight", () => {
    expect(blockFill(0)).toEqual({ rows: 0, color: "green" });
    expect(blockFill(2_000_000)).toEqual({ rows: 3, color: "green" });
    expect(blockFill(3_000_000)).toEqual({ rows: 5, color: "yellow" });
    expect(blockFill(3_600_000)).toEqual({ rows: 5, color: "yellow" });
    expect(blockFill(4_110_914)).toEqual({ rows: 6, color: "redBright" });
  });
});

describe("gauges and prompt", () => {
  it("draws clamped gauges", () => {
    expect(gaugeBar(0.5, 10)).toBe("█████░░░░░");
    expect(gaugeBar(1.5, 4)).toBe("████");
    expect(gaugeBar(Number.NaN, 3)).toBe("░░░");
    expect(usageColor(0.9)).toBe("red");
    expect(usageColor(0.6)).toBe("yellow");
    expect(usageColor(0.5)).toBe("cyan");
  });

  it("keeps the end of long prompt text visible", () => {
    expect(promptWindow("abcdef", 4)).toBe("cdef");
    expect(promptWindow("ab", 4)).toBe("ab");
  });
});
