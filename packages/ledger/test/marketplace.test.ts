import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { type BalanceTransferResult, SqliteBalanceLedger } from "../src/balances";
import { type LedgerDatabase, openLedgerDatabase } from "../src/db";
import type { LatticeLedger } from "../src/ledger";
import type { AccountId } from "../src/types";
import { ADMIN, ALICE, BOB, collectionRequest, CREATOR, createTestLedger, ledgerErrorCode } from "./helpers";

describe("listForSale / cancelListing", () => {
  let ledger: LatticeLedger;

  beforeEach(() => {
    ledger = createTestLedger();
    ledger.createCollection(collectionRequest(), CREATOR);
    ledger.mint(1, 1n, ALICE);
  });

  afterEach(() => {
    ledger.close();
  });

  it("creates a listing stamped with the current height", () => {
    const listing = ledger.listForSale(1, 1, 1000n, ALICE);

    expect(listing).toEqual({ collectionId: 1, tokenIndex: 1, seller: ALICE, price: 1000n, listedAtHeight: 3 });
    expect(ledger.getListing(1, 1)).toEqual(listing);
  });

  it("checks existence, ownership, price and duplicates in that order", () => {
    expect(ledgerErrorCode(() => ledger.listForSale(1, 2, 1000n, ALICE))).toBe("NftNotFound");
    expect(ledgerErrorCode(() => ledger.listForSale(1, 1, 0n, BOB))).toBe("NotOwner");
    expect(ledgerErrorCode(() => ledger.listForSale(1, 1, 0n, ALICE))).toBe("InvalidParameters");

    ledger.listForSale(1, 1, 1000n, ALICE);
    expect(ledgerErrorCode(() => ledger.listForSale(1, 1, 900n, ALICE))).toBe("ListingExists");
    expect(ledger.getListing(1, 1)?.price).toBe(1000n);
  });

  it("allows list, cancel, list again", () => {
    ledger.listForSale(1, 1, 1000n, ALICE);
    ledger.cancelListing(1, 1, ALICE);
    ledger.listForSale(1, 1, 800n, ALICE);

    expect(ledger.getListing(1, 1)?.price).toBe(800n);
  });

  it("fails a second cancel with ListingNotFound", () => {
    ledger.listForSale(1, 1, 1000n, ALICE);
    ledger.cancelListing(1, 1, ALICE);

    expect(ledgerErrorCode(() => ledger.cancelListing(1, 1, ALICE))).toBe("ListingNotFound");
  });

  it("only lets the seller cancel", () => {
    ledger.listForSale(1, 1, 1000n, ALICE);

    expect(ledgerErrorCode(() => ledger.cancelListing(1, 1, BOB))).toBe("NotAuthorized");
    expect(ledger.getListing(1, 1)).not.toBeNull();
  });

  it("lists active listings newest first", () => {
    ledger.mint(1, 2n, ALICE);
    ledger.listForSale(1, 1, 100n, ALICE);
    ledger.listForSale(1, 2, 200n, ALICE);

    expect(ledger.listListings(1).map((listing) => listing.tokenIndex)).toEqual([2, 1]);
    expect(ledger.listListings(2)).toEqual([]);
  });
});

describe("buyNft", () => {
  let ledger: LatticeLedger;

  beforeEach(() => {
    ledger = createTestLedger();
    ledger.setPlatformFeeBps(250, ADMIN);
    ledger.createCollection(collectionRequest({ royaltyBps: 500 }), CREATOR);
    ledger.mint(1, 1n, ALICE);
    ledger.listForSale(1, 1, 1000n, ALICE);
    ledger.deposit(BOB, 1000n, ADMIN);
  });

  afterEach(() => {
    ledger.close();
  });

  it("splits the price into fee, royalty and seller proceeds", () => {
    const receipt = ledger.buyNft(1, 1, BOB);

    expect(receipt).toEqual({
      collectionId: 1,
      tokenIndex: 1,
      seller: ALICE,
      buyer: BOB,
      price: 1000n,
      split: { platformFee: 25n, royalty: 50n, sellerAmount: 925n },
    });
    expect(ledger.getBalance(ADMIN)).toBe(25n);
    expect(ledger.getBalance(CREATOR)).toBe(50n);
    expect(ledger.getBalance(ALICE)).toBe(925n);
    expect(ledger.getBalance(BOB)).toBe(0n);
  });

  it("moves ownership to the buyer and removes the listing", () => {
    ledger.buyNft(1, 1, BOB);

    expect(ledger.getNftOwner(1, 1)).toBe(BOB);
    expect(ledger.getListing(1, 1)).toBeNull();
    expect(ledger.getOwnedNfts(ALICE)).toEqual([]);
    expect(ledger.getOwnedNfts(BOB)).toEqual([{ collectionId: 1, tokenIndex: 1 }]);
    expect(ledger.auditInvariants()).toEqual([]);
  });

  it("rejects the seller buying their own listing", () => {
    ledger.deposit(ALICE, 5000n, ADMIN);

    expect(ledgerErrorCode(() => ledger.buyNft(1, 1, ALICE))).toBe("NotAuthorized");
    expect(ledger.getBalance(ALICE)).toBe(5000n);
    expect(ledger.getListing(1, 1)).not.toBeNull();
  });

  it("rejects an underfunded buyer with no side effects", () => {
    ledger.transferNft(1, 1, ALICE, ALICE);
    ledger.listForSale(1, 1, 1001n, ALICE);

    expect(ledgerErrorCode(() => ledger.buyNft(1, 1, BOB))).toBe("InsufficientPayment");
    expect(ledger.getBalance(BOB)).toBe(1000n);
    expect(ledger.getNftOwner(1, 1)).toBe(ALICE);
    expect(ledger.getListing(1, 1)?.price).toBe(1001n);
  });

  it("fails on tokens without a listing", () => {
    ledger.cancelListing(1, 1, ALICE);

    expect(ledgerErrorCode(() => ledger.buyNft(1, 1, BOB))).toBe("ListingNotFound");
    expect(ledgerErrorCode(() => ledger.buyNft(3, 1, BOB))).toBe("ListingNotFound");
  });

  it("credits royalty and proceeds to the same account when the seller created the collection", () => {
    ledger.createCollection(collectionRequest({ royaltyBps: 1000 }), ALICE);
    ledger.mint(2, 9n, ALICE);
    ledger.listForSale(2, 1, 400n, ALICE);

    ledger.buyNft(2, 1, BOB);

    expect(ledger.getBalance(ALICE)).toBe(390n);
    expect(ledger.getBalance(ADMIN)).toBe(10n);
    expect(ledger.getBalance(BOB)).toBe(600n);
  });

  it("updates stats with the sale", () => {
    ledger.buyNft(1, 1, BOB);

    expect(ledger.getStats()).toEqual({
      collectionCount: 1,
      tokenCount: 1,
      listingCount: 0,
      saleCount: 1,
      volume: 1000n,
    });
  });

  it("accumulates sale totals across sales", () => {
    ledger.buyNft(1, 1, BOB);
    ledger.listForSale(1, 1, 900n, BOB);
    ledger.buyNft(1, 1, ALICE);
    ledger.listForSale(1, 1, 5000n, ALICE);
    expect(ledgerErrorCode(() => ledger.buyNft(1, 1, BOB))).toBe("InsufficientPayment");

    expect(ledger.getStats()).toMatchObject({ saleCount: 2, volume: 1900n });
  });

  it("keeps volume exact beyond the 64-bit range", () => {
    const price = 2n ** 64n + 1n;
    ledger.cancelListing(1, 1, ALICE);
    ledger.listForSale(1, 1, price, ALICE);
    ledger.deposit(BOB, price, ADMIN);

    ledger.buyNft(1, 1, BOB);

    expect(ledger.getStats()).toMatchObject({ saleCount: 1, volume: price });
  });
});

describe("getStats", () => {
  it("reads running totals stored with the ledger", () => {
    const db = openLedgerDatabase();
    const first = createTestLedger({ db });
    first.createCollection(collectionRequest(), CREATOR);
    first.mint(1, 1n, ALICE);
    first.listForSale(1, 1, 300n, ALICE);
    first.deposit(BOB, 300n, ADMIN);
    first.buyNft(1, 1, BOB);

    const second = createTestLedger({ db });

    expect(second.getStats()).toEqual({
      collectionCount: 1,
      tokenCount: 1,
      listingCount: 0,
      saleCount: 1,
      volume: 300n,
    });
    db.close();
  });
});

/** Delegates to the SQLite ledger but refuses payments to one account. */
class RefusingBalanceLedger extends SqliteBalanceLedger {
  constructor(
    db: LedgerDatabase,
    private readonly refused: AccountId,
  ) {
    super(db);
  }

  override transfer(amount: bigint, from: AccountId, to: AccountId): BalanceTransferResult {
    if (to === this.refused) {
      return { ok: false, reason: "InsufficientFunds" };
    }
    return super.transfer(amount, from, to);
  }
}

describe("buyNft settlement failure", () => {
  it("rolls back earlier payment legs and ownership when a later leg fails", () => {
    const db = openLedgerDatabase();
    const ledger = createTestLedger({ db, balances: new RefusingBalanceLedger(db, CREATOR) });
    ledger.setPlatformFeeBps(250, ADMIN);
    ledger.createCollection(collectionRequest({ royaltyBps: 500 }), CREATOR);
    ledger.mint(1, 1n, ALICE);
    ledger.listForSale(1, 1, 1000n, ALICE);
    ledger.deposit(BOB, 1000n, ADMIN);
    const heightBefore = ledger.getHeight();

    expect(ledgerErrorCode(() => ledger.buyNft(1, 1, BOB))).toBe("InsufficientPayment");

    expect(ledger.getBalance(BOB)).toBe(1000n);
    expect(ledger.getBalance(ADMIN)).toBe(0n);
    expect(ledger.getNftOwner(1, 1)).toBe(ALICE);
    expect(ledger.getListing(1, 1)?.seller).toBe(ALICE);
    expect(ledger.getHeight()).toBe(heightBefore);
    db.close();
  });
});
