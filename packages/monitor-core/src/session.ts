import { DaemonApi, errorMessage, isHeightQuery, isTxidQuery, type RpcCaller } from "@blocktop/rpc-sdk";
import { ANIMATION_TICK_MS, BlockAnimator } from "./animator.js";
import { DEFAULT_REFRESH_MS, MetricsPoller } from "./poller.js";
import { SearchController, type Resolver, type SearchState } from "./search.js";
import { RedrawSignal, type RedrawListener } from "./signal.js";
import { SnapshotStore, type Snapshot } from "./snapshot.js";
import { TaskSupervisor } from "./task.js";

export type UiEvent =
  | { type: "submit-query"; query: string }
  | { type: "navigate"; delta: 1 | -1 }
  | { type: "open" }
  | { type: "close" }
  | { type: "back" }
  | { type: "dismiss" };

export type MonitorSessionOptions = {
  rpc: RpcCaller;
  /** Client for lookups; defaults to `rpc`. Usually one with a shorter timeout. */
  searchRpc?: RpcCaller;
  refreshMs?: number;
  animationTickMs?: number;
  now?: () => number;
  resolve?: Resolver;
};

export function isValidQuery(query: string): boolean {
  return isTxidQuery(query) || isHeightQuery(query);
}

/**
 * Everything one dashboard needs: the snapshot, the background poller and animator, and the
 * lookup controller. The UI reads copies, subscribes for redraws and feeds key events back
 * through {@link dispatch}.
 */
export class MonitorSession {
  readonly store = new SnapshotStore();
  private readonly redraw = new RedrawSignal();
  private readonly supervisor: TaskSupervisor;
  private readonly poller: MetricsPoller;
  private readonly animator: BlockAnimator;
  private readonly search: SearchController;
  private started = false;

  constructor(opts: MonitorSessionOptions) {
    this.supervisor = new TaskSupervisor((name, error) => {
      const message = `${name}: ${errorMessage(error)}`;
      this.store.update((s) => {
        s.status.lastError = message;
      });
      this.redraw.notify();
    });
    this.poller = new MetricsPoller(
      { api: new DaemonApi(opts.rpc), store: this.store, redraw: this.redraw, now: opts.now },
      opts.refreshMs ?? DEFAULT_REFRESH_MS,
    );
    this.animator = new BlockAnimator(this.store, this.redraw, opts.animationTickMs ?? ANIMATION_TICK_MS);
    this.search = new SearchController({
      api: new DaemonApi(opts.searchRpc ?? opts.rpc),
      supervisor: this.supervisor,
      redraw: this.redraw,
      tip: () => this.store.select((s) => s.chain.blocks),
      resolve: opts.resolve,
    });
  }

  start(): void {
    if (this.started) return;
    this.started = true;
    this.supervisor.spawn("poller", (signal) => this.poller.run(signal));
    this.supervisor.spawn("animator", (signal) => this.animator.run(signal));
  }

  readSnapshot(): Snapshot {
    return this.store.read();
  }

  readSearch(): SearchState {
    return this.search.read();
  }

  get searching(): boolean {
    return this.search.busy;
  }

  subscribe(listener: RedrawListener): () => void {
    return this.redraw.subscribe(listener);
  }

  /** Applies one UI event. Returns whether it changed anything. */
  dispatch(event: UiEvent): boolean {
    switch (event.type) {
      case "submit-query": {
        const query = event.query.trim();
        return isValidQuery(query) && this.search.submit(query, "top-level");
      }
      case "navigate":
        return this.search.navigate(event.delta);
      case "open":
        return this.search.activate();
      case "close":
        return this.search.close();
      case "back":
        return this.search.back();
      case "dismiss":
        return this.search.dismiss();
    }
  }

  /** Close, back, dismiss: the first that applies. False means Escape should quit. */
  escape(): boolean {
    return this.search.escape();
  }

  /** Stops redraws, then cancels and awaits every background task. */
  async shutdown(): Promise<void> {
    this.redraw.close();
    await this.supervisor.shutdown();
  }
}
