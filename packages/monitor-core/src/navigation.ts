import type { ConfirmedTx, NavState, OverlayState, SearchResult } from "./result.js";

/** Rows visible at once in the inputs/outputs overlays. */
export const OVERLAY_WINDOW = 10;

export const BLOCK_ROW = 0;

export function inputsRow(tx: ConfirmedTx): number {
  return tx.inputs.length === 0 ? -1 : 1;
}

export function outputsRow(tx: ConfirmedTx): number {
  if (tx.outputs.length === 0) return -1;
  return tx.inputs.length === 0 ? 1 : 2;
}

/** Highest selectable row: the block row plus one per non-empty list. */
export function rowCount(tx: ConfirmedTx): number {
  return (tx.inputs.length > 0 ? 1 : 0) + (tx.outputs.length > 0 ? 1 : 0);
}

function confirmedTx(r: SearchResult): ConfirmedTx | null {
  return r.outcome.kind === "confirmed" ? r.outcome.tx : null;
}

function clamp(v: number, lo: number, hi: number): number {
  return Math.min(Math.max(v, lo), hi);
}

function withNav(r: SearchResult, nav: Partial<NavState>): SearchResult {
  return { ...r, nav: { ...r.nav, ...nav } };
}

function moveOverlay(o: OverlayState, delta: number, n: number): OverlayState {
  return { ...o, selected: clamp(o.selected + delta, -1, n - 1) };
}

export function overlayOpen(r: SearchResult): "inputs" | "outputs" | null {
  const tx = confirmedTx(r);
  if (!tx) return null;
  if (r.nav.outputs.open && tx.outputs.length > 0) return "outputs";
  if (r.nav.inputs.open && tx.inputs.length > 0) return "inputs";
  return null;
}

/**
 * Moves the cursor of whichever overlay is open, or the row cursor otherwise.
 * Results other than a confirmed transaction are returned unchanged.
 */
export function moveSelection(r: SearchResult, delta: number): SearchResult {
  const tx = confirmedTx(r);
  if (!tx) return r;
  switch (overlayOpen(r)) {
    case "outputs":
      return withNav(r, { outputs: moveOverlay(r.nav.outputs, delta, tx.outputs.length) });
    case "inputs":
      return withNav(r, { inputs: moveOverlay(r.nav.inputs, delta, tx.inputs.length) });
    default:
      return withNav(r, { selected: clamp(r.nav.selected + delta, -1, rowCount(tx)) });
  }
}

export type Activation = {
  result: SearchResult;
  /** Set when activation asks for a drill-down lookup. */
  lookup: string | null;
};

/**
 * Enter. In the inputs overlay a non-coinbase input looks up its funding transaction; the
 * outputs overlay has nothing to follow. Without an overlay the inputs/outputs rows open their
 * overlay and any other row follows the containing block.
 */
export function activate(r: SearchResult): Activation {
  const tx = confirmedTx(r);
  if (!tx) return { result: r, lookup: null };

  const open = overlayOpen(r);
  if (open === "inputs") {
    const input = tx.inputs[r.nav.inputs.selected];
    return { result: r, lookup: input?.kind === "prevout" ? input.txid : null };
  }
  if (open === "outputs") return { result: r, lookup: null };

  const sel = r.nav.selected;
  if (sel === inputsRow(tx) && sel >= 0) {
    return { result: withNav(r, { inputs: { open: true, selected: -1 } }), lookup: null };
  }
  if (sel === outputsRow(tx) && sel >= 0) {
    return { result: withNav(r, { outputs: { open: true, selected: -1 } }), lookup: null };
  }
  return { result: r, lookup: tx.blockHash === "" ? null : tx.blockHash };
}

/** Closes the open overlay, outputs first. Returns null when none was open. */
export function closeOverlay(r: SearchResult): SearchResult | null {
  if (r.nav.outputs.open) return withNav(r, { outputs: { ...r.nav.outputs, open: false } });
  if (r.nav.inputs.open) return withNav(r, { inputs: { ...r.nav.inputs, open: false } });
  return null;
}

export type OverlayWindow = { top: number; size: number };

/** Visible slice of an n-row overlay, centred on the selection where the list allows. */
export function overlayWindow(n: number, selected: number): OverlayWindow {
  const size = Math.min(n, OVERLAY_WINDOW);
  const top = selected >= 0 ? Math.min(Math.max(0, selected - Math.floor(size / 2)), n - size) : 0;
  return { top, size };
}
