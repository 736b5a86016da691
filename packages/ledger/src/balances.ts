import type { LedgerDatabase } from "./db";
import type { AccountId } from "./types";

export type BalanceTransferResult = { ok: true } | { ok: false; reason: "InsufficientFunds" };

/** Value-transfer primitive the ledger pays through. Synchronous and fail-fast. */
export interface BalanceLedger {
  balanceOf(account: AccountId): bigint;
  transfer(amount: bigint, from: AccountId, to: AccountId): BalanceTransferResult;
}

/**
 * Balances kept in the ledger's own database, so a transfer made during an
 * operation commits or rolls back together with it.
 */
export class SqliteBalanceLedger implements BalanceLedger {
  constructor(private readonly db: LedgerDatabase) {}

  balanceOf(account: AccountId): bigint {
    const row = this.db.prepare("SELECT amount FROM balances WHERE account = ?").get(account) as
      | { amount: string }
      | undefined;
    return row ? BigInt(row.amount) : 0n;
  }

  transfer(amount: bigint, from: AccountId, to: AccountId): BalanceTransferResult {
    if (amount < 0n) {
      throw new Error("Transfer amount must not be negative");
    }

    const available = this.balanceOf(from);
    if (available < amount) {
      return { ok: false, reason: "InsufficientFunds" };
    }

    this.write(from, available - amount);
    this.write(to, this.balanceOf(to) + amount);
    return { ok: true };
  }

  credit(account: AccountId, amount: bigint): bigint {
    if (amount <= 0n) {
      throw new Error("Credit amount must be positive");
    }
    const next = this.balanceOf(account) + amount;
    this.write(account, next);
    return next;
  }

  private write(account: AccountId, amount: bigint): void {
    this.db
      .prepare(
        `INSERT INTO balances(account, amount)
         VALUES(?, ?)
         ON CONFLICT(account) DO UPDATE SET amount = excluded.amount`,
      )
      .run(account, amount.toString());
  }
}
