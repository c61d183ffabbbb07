import { setTimeout as delay } from "node:timers/promises";

export type TaskBody = (signal: AbortSignal) => Promise<void>;
export type TaskErrorHandler = (taskName: string, error: unknown) => void;

function isAbortError(e: unknown): boolean {
  return e instanceof Error && e.name === "AbortError";
}

/**
 * Sleeps for `ms`, waking early when `signal` aborts.
 * Resolves `false` if the sleep was cut short by cancellation.
 */
export async function sleep(ms: number, signal: AbortSignal): Promise<boolean> {
  if (signal.aborted) return false;
  try {
    await delay(ms, undefined, { signal });
    return true;
  } catch (e) {
    if (signal.aborted && isAbortError(e)) return false;
    throw e;
  }
}

export class SupervisedTask {
  private readonly controller = new AbortController();
  private finished = false;
  readonly done: Promise<void>;

  constructor(
    readonly name: string,
    body: TaskBody,
    onError: TaskErrorHandler,
  ) {
    const signal = this.controller.signal;
    this.done = (async () => {
      try {
        await body(signal);
      } catch (e) {
        if (!(signal.aborted && isAbortError(e))) onError(name, e);
      } finally {
        this.finished = true;
      }
    })();
  }

  get running(): boolean {
    return !this.finished;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  cancel(): void {
    this.controller.abort();
  }

  async join(): Promise<void> {
    await this.done;
  }
}

/** Owns every background task of a session so shutdown can cancel and await them all. */
export class TaskSupervisor {
  private readonly tasks = new Set<SupervisedTask>();
  private stopped = false;

  constructor(
    private readonly onError: TaskErrorHandler = (name, error) => {
      console.error(`task ${name} failed`, error);
    },
  ) {}

  spawn(name: string, body: TaskBody): SupervisedTask {
    if (this.stopped) throw new Error(`cannot spawn ${name}: supervisor is shut down`);
    const task = new SupervisedTask(name, body, this.onError);
    this.tasks.add(task);
    void task.done.then(() => this.tasks.delete(task));
    return task;
  }

  get activeCount(): number {
    return this.tasks.size;
  }

  get isShutdown(): boolean {
    return this.stopped;
  }

  async shutdown(): Promise<void> {
    this.stopped = true;
    const all = [...this.tasks];
    for (const t of all) t.cancel();
    await Promise.all(all.map((t) => t.done));
  }
}
