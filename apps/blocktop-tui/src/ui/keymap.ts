import { inputsRow, outputsRow, overlayOpen, type SearchResult, type UiEvent } from "@blocktop/monitor-core";

/** The fields of ink's key descriptor the dashboard reacts to. */
export type KeyPress = {
  upArrow: boolean;
  downArrow: boolean;
  leftArrow: boolean;
  rightArrow: boolean;
  return: boolean;
  escape: boolean;
  tab: boolean;
  shift: boolean;
  ctrl: boolean;
  meta: boolean;
  backspace: boolean;
  delete: boolean;
};

export type KeyCommand =
  | { type: "prompt-open" }
  | { type: "prompt-cancel" }
  | { type: "prompt-submit" }
  | { type: "prompt-backspace" }
  | { type: "prompt-type"; text: string }
  | { type: "switch-tab"; delta: 1 | -1 }
  | { type: "session"; event: UiEvent }
  | { type: "escape" }
  | { type: "quit" }
  | { type: "ignore" };

export type KeyContext = {
  promptActive: boolean;
  current: SearchResult | null;
};

function arrow(key: KeyPress): KeyCommand | null {
  if (key.downArrow) return { type: "session", event: { type: "navigate", delta: 1 } };
  if (key.upArrow) return { type: "session", event: { type: "navigate", delta: -1 } };
  return null;
}

/**
 * Maps one key press to a command. The search prompt swallows everything while it is open;
 * an open inputs/outputs overlay owns the arrows, Enter and Escape.
 */
export function resolveKey(ctx: KeyContext, input: string, key: KeyPress): KeyCommand {
  if (ctx.promptActive) {
    if (key.escape) return { type: "prompt-cancel" };
    if (key.return) return { type: "prompt-submit" };
    if (key.backspace || key.delete) return { type: "prompt-backspace" };
    if (key.tab || key.leftArrow || key.rightArrow || key.upArrow || key.downArrow) return { type: "ignore" };
    if (input && !key.ctrl && !key.meta) return { type: "prompt-type", text: input };
    return { type: "ignore" };
  }

  if (ctx.current && overlayOpen(ctx.current)) {
    if (key.escape) return { type: "session", event: { type: "close" } };
    if (key.return) return { type: "session", event: { type: "open" } };
    if (input === "q") return { type: "quit" };
    return arrow(key) ?? { type: "ignore" };
  }

  if (input === "/") return { type: "prompt-open" };
  if (input === "q") return { type: "quit" };
  if (key.escape) return { type: "escape" };
  if (key.return) return { type: "session", event: { type: "open" } };
  if (key.tab) return { type: "switch-tab", delta: key.shift ? -1 : 1 };
  if (key.rightArrow) return { type: "switch-tab", delta: 1 };
  if (key.leftArrow) return { type: "switch-tab", delta: -1 };
  return arrow(key) ?? { type: "ignore" };
}

/** Key hints for the status bar. */
export function keyHints(ctx: KeyContext): string {
  if (ctx.promptActive) return "[Enter] search  [Esc] cancel";
  const r = ctx.current;
  if (!r) return "[Tab/←/→] switch  [/] search  [q] quit";
  if (r.outcome.kind !== "confirmed") return "[Esc] dismiss  [q] quit";
  const open = overlayOpen(r);
  if (open === "outputs") return "[↑/↓] navigate  [Esc] back  [q] quit";
  if (open === "inputs") return "[↑/↓] navigate  [↵] lookup  [Esc] back  [q] quit";
  const tx = r.outcome.tx;
  const sel = r.nav.selected;
  if (sel >= 0 && sel === outputsRow(tx)) return "[↵] show outputs  [↑/↓] navigate  [Esc] dismiss  [q] quit";
  if (sel >= 0 && sel === inputsRow(tx)) return "[↵] show inputs  [↑/↓] navigate  [Esc] dismiss  [q] quit";
  if (sel === 0) return "[↵] view block  [↑/↓] navigate  [Esc] dismiss  [q] quit";
  return "[↑/↓] navigate  [Esc] dismiss  [q] quit";
}
