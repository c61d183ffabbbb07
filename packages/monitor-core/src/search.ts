import { errorMessage, isHeightQuery, type DaemonApi } from "@blocktop/rpc-sdk";
import { resolveQuery } from "./lookup.js";
import { activate, closeOverlay, moveSelection } from "./navigation.js";
import { searchingResult, type SearchResult } from "./result.js";
import type { RedrawSignal } from "./signal.js";
import type { SupervisedTask, TaskSupervisor } from "./task.js";

export const MAX_HISTORY = 32;

export type SearchMode = "top-level" | "drill-down";

export type SearchState = {
  /** Result on screen; null when nothing is shown. */
  current: SearchResult | null;
  /** Results to return to on back, most recent last. */
  history: SearchResult[];
};

export type Resolver = typeof resolveQuery;

export type SearchControllerOptions = {
  api: DaemonApi;
  supervisor: TaskSupervisor;
  redraw: RedrawSignal;
  /** Current chain tip, read when a search starts. */
  tip: () => number;
  resolve?: Resolver;
};

export class SearchController {
  private state: SearchState = { current: null, history: [] };
  private inFlight = false;
  private worker: SupervisedTask | null = null;
  private readonly resolve: Resolver;

  constructor(private readonly opts: SearchControllerOptions) {
    this.resolve = opts.resolve ?? resolveQuery;
  }

  read(): SearchState {
    return structuredClone(this.state);
  }

  get busy(): boolean {
    return this.inFlight;
  }

  /**
   * Starts a lookup in the background. Returns false, changing nothing, when a lookup is
   * already running or the session is shutting down.
   */
  submit(query: string, mode: SearchMode): boolean {
    const { supervisor, redraw, api } = this.opts;
    if (this.inFlight || supervisor.isShutdown) return false;
    this.inFlight = true;

    if (mode === "top-level") {
      this.state.history = [];
    } else if (this.state.current) {
      this.state.history.push(this.state.current);
      if (this.state.history.length > MAX_HISTORY) this.state.history.shift();
    }
    this.state.current = searchingResult(query);
    redraw.notify();

    const previous = this.worker;
    const isHeight = isHeightQuery(query);
    const tip = this.opts.tip();
    this.worker = supervisor.spawn("search", async () => {
      await previous?.join();
      try {
        this.state.current = await this.resolve(api, query, isHeight, tip);
      } catch (e) {
        this.state.current = { ...searchingResult(query), outcome: { kind: "error", message: errorMessage(e) } };
        throw e;
      } finally {
        this.inFlight = false;
        redraw.notify();
      }
    });
    return true;
  }

  /** Arrow keys. True when the result on screen takes row navigation. */
  navigate(delta: number): boolean {
    const current = this.state.current;
    if (current?.outcome.kind !== "confirmed") return false;
    this.replace(moveSelection(current, delta));
    return true;
  }

  /** Enter: opens an overlay or starts a drill-down lookup. */
  activate(): boolean {
    const current = this.state.current;
    if (!current) return false;
    const { result, lookup } = activate(current);
    if (lookup !== null) return this.submit(lookup, "drill-down");
    if (result === current) return false;
    this.replace(result);
    return true;
  }

  close(): boolean {
    const current = this.state.current;
    const closed = current ? closeOverlay(current) : null;
    if (!closed) return false;
    this.replace(closed);
    return true;
  }

  back(): boolean {
    const previous = this.state.history.pop();
    if (!previous) return false;
    this.replace(previous);
    return true;
  }

  dismiss(): boolean {
    if (!this.state.current) return false;
    this.state = { current: null, history: [] };
    this.opts.redraw.notify();
    return true;
  }

  /** Escape: close overlay, else go back, else dismiss. False when there was nothing to undo. */
  escape(): boolean {
    return this.close() || this.back() || this.dismiss();
  }

  private replace(result: SearchResult): void {
    this.state.current = result;
    this.opts.redraw.notify();
  }
}
