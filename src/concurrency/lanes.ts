/**
 * Keyed Lanes
 *
 * Serializes async work per key so that operations on the same key never
 * interleave, while work on different keys runs freely. Each lane is a FIFO
 * promise chain that is dropped once it drains.
 */

// ============================================================================
// Types
// ============================================================================

export type LaneTask<R> = () => Promise<R>;

interface Lane {
  tail: Promise<void>;
  pending: number;
}

// ============================================================================
// Keyed Lanes
// ============================================================================

export class KeyedLanes {
  private lanes: Map<string, Lane> = new Map();

  /**
   * Run a task after every task previously queued for the same key.
   * The returned promise settles with the task's own outcome.
   */
  run<R>(key: string, task: LaneTask<R>): Promise<R> {
    const lane = this.lanes.get(key) ?? { tail: Promise.resolve(), pending: 0 };
    lane.pending++;
    this.lanes.set(key, lane);

    const result = lane.tail.then(task);

    // The chain swallows the outcome; callers observe it through `result`
    const settle = () => this.settle(key, lane);
    lane.tail = result.then(settle, settle);

    return result;
  }

  /**
   * Run a task while holding the lanes of several keys. Lanes are entered
   * in sorted key order, so two multi-key tasks cannot wait on each other.
   * A task holding lanes must not queue on any other lane.
   */
  runAll<R>(keys: Iterable<string>, task: LaneTask<R>): Promise<R> {
    const ordered = Array.from(new Set(keys)).sort();
    const enter = (i: number): Promise<R> =>
      i < ordered.length ? this.run(ordered[i], () => enter(i + 1)) : task();
    return enter(0);
  }

  /**
   * Resolve once every lane is empty, including work queued while draining
   */
  async drain(): Promise<void> {
    while (this.lanes.size > 0) {
      await Promise.all(Array.from(this.lanes.values(), (lane) => lane.tail));
    }
  }

  private settle(key: string, lane: Lane): void {
    lane.pending--;
    if (lane.pending === 0 && this.lanes.get(key) === lane) {
      this.lanes.delete(key);
    }
  }
}
