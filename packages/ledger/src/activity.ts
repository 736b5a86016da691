import type { LedgerDatabase, LedgerStateStore } from "./db";
import type { AccountId, ActivityEntry, ActivityKind, ActivityQuery, LedgerStats } from "./types";

export const MAX_ACTIVITY_LIMIT = 500;

const SALE_COUNT_KEY = "sale_count";
const SALE_VOLUME_KEY = "sale_volume";

export interface ActivityRecord {
  kind: ActivityKind;
  height: number;
  collectionId?: number;
  tokenIndex?: number;
  fromAccount?: AccountId;
  toAccount?: AccountId;
  amount?: bigint;
}

interface ActivityRow {
  id: number;
  kind: ActivityKind;
  collectionId: number | null;
  tokenIndex: number | null;
  fromAccount: string | null;
  toAccount: string | null;
  amount: string | null;
  height: number;
}

/**
 * Append-only history of committed mutations. Sale totals are kept as running
 * counters in `ledger_state`, written in the same transaction as the sale.
 */
export class ActivityLog {
  constructor(
    private readonly db: LedgerDatabase,
    private readonly state: LedgerStateStore,
  ) {}

  record(entry: ActivityRecord): void {
    this.db
      .prepare(
        `INSERT INTO activity(kind, collection_id, token_index, from_account, to_account, amount, height)
         VALUES(@kind, @collectionId, @tokenIndex, @fromAccount, @toAccount, @amount, @height)`,
      )
      .run({
        kind: entry.kind,
        collectionId: entry.collectionId ?? null,
        tokenIndex: entry.tokenIndex ?? null,
        fromAccount: entry.fromAccount ?? null,
        toAccount: entry.toAccount ?? null,
        amount: entry.amount?.toString() ?? null,
        height: entry.height,
      });

    if (entry.kind === "sold") {
      this.state.set(SALE_COUNT_KEY, (this.saleCount() + 1).toString());
      this.state.set(SALE_VOLUME_KEY, (this.saleVolume() + (entry.amount ?? 0n)).toString());
    }
  }

  private saleCount(): number {
    return Number(this.state.get(SALE_COUNT_KEY) ?? "0");
  }

  private saleVolume(): bigint {
    return BigInt(this.state.get(SALE_VOLUME_KEY) ?? "0");
  }

  list(query: ActivityQuery = {}): ActivityEntry[] {
    const clauses: string[] = [];
    const params: Record<string, string | number> = {
      limit: Math.min(Math.max(query.limit ?? 100, 1), MAX_ACTIVITY_LIMIT),
    };

    if (query.collectionId !== undefined) {
      clauses.push("collection_id = @collectionId");
      params.collectionId = query.collectionId;
    }
    if (query.tokenIndex !== undefined) {
      clauses.push("token_index = @tokenIndex");
      params.tokenIndex = query.tokenIndex;
    }
    if (query.account !== undefined) {
      clauses.push("(from_account = @account OR to_account = @account)");
      params.account = query.account;
    }

    const where = clauses.length > 0 ? `WHERE ${clauses.join(" AND ")}` : "";
    const rows = this.db
      .prepare(
        `SELECT
          id,
          kind,
          collection_id AS collectionId,
          token_index AS tokenIndex,
          from_account AS fromAccount,
          to_account AS toAccount,
          amount,
          height
         FROM activity
         ${where}
         ORDER BY id DESC
         LIMIT @limit`,
      )
      .all(params) as ActivityRow[];

    return rows.map((row) => ({
      ...row,
      amount: row.amount === null ? null : BigInt(row.amount),
    }));
  }

  stats(): LedgerStats {
    const collectionCount = (this.db.prepare("SELECT COUNT(1) AS count FROM collections").get() as { count: number })
      .count;
    const tokenCount = (this.db.prepare("SELECT COUNT(1) AS count FROM tokens").get() as { count: number }).count;
    const listingCount = (this.db.prepare("SELECT COUNT(1) AS count FROM listings").get() as { count: number }).count;

    return {
      collectionCount,
      tokenCount,
      listingCount,
      saleCount: this.saleCount(),
      volume: this.saleVolume(),
    };
  }
}
