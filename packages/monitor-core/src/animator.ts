import type { Snapshot, SnapshotStore } from "./snapshot.js";
import type { RedrawSignal } from "./signal.js";
import { sleep } from "./task.js";

/** Frames the new-block slide takes (~480 ms at the default tick). */
export const BLOCK_ANIM_FRAMES = 12;
export const ANIMATION_TICK_MS = 40;

/** Advances an active animation by one frame. Returns whether anything changed. */
export function advanceAnimation(s: Snapshot): boolean {
  if (!s.animation.active) return false;
  s.animation.frame++;
  if (s.animation.frame >= BLOCK_ANIM_FRAMES) s.animation.active = false;
  return true;
}

export class BlockAnimator {
  constructor(
    private readonly store: SnapshotStore,
    private readonly redraw: RedrawSignal,
    private readonly tickMs: number = ANIMATION_TICK_MS,
  ) {}

  async run(signal: AbortSignal): Promise<void> {
    while (await sleep(this.tickMs, signal)) {
      if (this.store.update(advanceAnimation)) this.redraw.notify();
    }
  }
}
