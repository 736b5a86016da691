import type { LedgerStateStore } from "./db";

const HEIGHT_KEY = "height";

/**
 * Persistent counter in `ledger_state`, advanced once per committed mutation. It
 * lives in the ledger's database so a rolled-back operation also rolls it back.
 */
export class StoredHeightCounter {
  constructor(private readonly state: LedgerStateStore) {}

  current(): number {
    return Number(this.state.get(HEIGHT_KEY) ?? "0");
  }

  /** Moves to the next height and returns it. */
  advance(): number {
    const next = this.current() + 1;
    this.state.set(HEIGHT_KEY, next.toString());
    return next;
  }
}
