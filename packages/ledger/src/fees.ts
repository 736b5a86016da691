import { LedgerError } from "./errors";
import type { BalanceLedger } from "./balances";
import type { PlatformSettings } from "./settings";
import type { AccountId, Bps, SettlementSplit } from "./types";

export const BPS_DENOMINATOR = 10_000n;
export const MAX_ROYALTY_BPS = 3000;
export const MAX_PLATFORM_FEE_BPS = 1000;

function assertBps(value: Bps): void {
  if (!Number.isInteger(value) || value < 0 || value > Number(BPS_DENOMINATOR)) {
    throw new LedgerError("InvalidParameters", `Invalid basis points: ${value}`);
  }
}

function portion(amount: bigint, bps: Bps): bigint {
  if (amount < 0n) {
    throw new LedgerError("InvalidParameters", "Amount must not be negative");
  }
  assertBps(bps);
  // bigint division truncates, which is floor for non-negative operands.
  return (amount * BigInt(bps)) / BPS_DENOMINATOR;
}

export function platformFee(amount: bigint, feeBps: Bps): bigint {
  return portion(amount, feeBps);
}

export function royalty(amount: bigint, royaltyBps: Bps): bigint {
  return portion(amount, royaltyBps);
}

/**
 * Seller proceeds are whatever is left after the fee and royalty, so the three
 * parts always sum to `amount`.
 */
export function computeSplit(amount: bigint, feeBps: Bps, royaltyBps: Bps): SettlementSplit {
  const fee = platformFee(amount, feeBps);
  const roy = royalty(amount, royaltyBps);
  const sellerAmount = amount - fee - roy;
  if (sellerAmount < 0n) {
    throw new LedgerError("InvalidParameters", "Fee and royalty exceed the sale amount");
  }

  return { platformFee: fee, royalty: roy, sellerAmount };
}

export interface SettlementParties {
  payer: AccountId;
  seller: AccountId;
  creator: AccountId;
}

export class FeeEngine {
  constructor(
    private readonly settings: PlatformSettings,
    private readonly balances: BalanceLedger,
  ) {}

  /**
   * Moves a sale amount from the payer to the platform admin, the collection creator
   * and the seller. Must run inside the caller's transaction: a failed leg throws and
   * the earlier legs roll back with it.
   */
  settle(amount: bigint, parties: SettlementParties, royaltyBps: Bps): SettlementSplit {
    const split = computeSplit(amount, this.settings.getPlatformFeeBps(), royaltyBps);
    const legs: Array<[bigint, AccountId]> = [
      [split.platformFee, this.settings.getAdmin()],
      [split.royalty, parties.creator],
      [split.sellerAmount, parties.seller],
    ];

    for (const [legAmount, recipient] of legs) {
      if (legAmount === 0n) {
        continue;
      }
      const result = this.balances.transfer(legAmount, parties.payer, recipient);
      if (!result.ok) {
        throw new LedgerError("InsufficientPayment");
      }
    }

    return split;
  }
}
