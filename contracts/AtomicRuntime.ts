// AtomicRuntime.ts - In-process execution host
// Every stateful participant (vault, ledgers, pools) registers here. An atomic scope
// checkpoints all of them and restores every checkpoint if the operation throws,
// so a failed call leaves no partial transfer, mint or stake behind.

export interface Journaled<S> {
  snapshot(): S;
  restore(state: S): void;
}

type Checkpoint = () => () => void;

export class AtomicRuntime {
  private readonly participants: Checkpoint[] = [];
  private depth = 0;
  private timestamp: bigint;

  constructor(latestTimestamp: bigint = BigInt(Math.floor(Date.now() / 1000))) {
    this.timestamp = latestTimestamp;
  }

  register<S>(participant: Journaled<S>): void {
    this.participants.push(() => {
      const state = participant.snapshot();
      return () => participant.restore(state);
    });
  }

  /**
   * Runs `fn` as one all-or-nothing operation. Nested scopes join the outermost one.
   */
  atomic<T>(fn: () => T): T {
    if (this.depth > 0) {
      return fn();
    }

    const rollbacks = this.participants.map((checkpoint) => checkpoint());
    this.depth++;
    try {
      return fn();
    } catch (err) {
      for (const rollback of rollbacks.reverse()) {
        rollback();
      }
      throw err;
    } finally {
      this.depth--;
    }
  }

  /** Seconds since epoch, the host's notion of "now" for permit deadlines */
  get latestTimestamp(): bigint {
    return this.timestamp;
  }

  setTimestamp(timestamp: bigint): void {
    this.timestamp = timestamp;
  }

  advanceTime(seconds: bigint): void {
    this.timestamp += seconds;
  }
}
