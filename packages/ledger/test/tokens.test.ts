import { afterEach, beforeEach, describe, expect, it } from "vitest";

import type { LatticeLedger } from "../src/ledger";
import { ADMIN, ALICE, BOB, collectionRequest, CREATOR, createTestLedger, ledgerErrorCode } from "./helpers";

describe("mint", () => {
  let ledger: LatticeLedger;

  beforeEach(() => {
    ledger = createTestLedger();
  });

  afterEach(() => {
    ledger.close();
  });

  it("mints up to max supply and then fails with CollectionLimitReached", () => {
    const id = ledger.createCollection(collectionRequest({ maxSupply: 3, royaltyBps: 500 }), CREATOR);

    expect(ledger.mint(id, 11n, ALICE)).toEqual({ collectionId: 1, tokenIndex: 1 });
    expect(ledger.mint(id, 12n, ALICE)).toEqual({ collectionId: 1, tokenIndex: 2 });
    expect(ledger.mint(id, 13n, BOB)).toEqual({ collectionId: 1, tokenIndex: 3 });
    expect(ledgerErrorCode(() => ledger.mint(id, 14n, BOB))).toBe("CollectionLimitReached");

    expect(ledger.getCollection(id)?.currentSupply).toBe(3);
    expect(ledger.listCollectionTokens(id).map((token) => token.tokenIndex)).toEqual([1, 2, 3]);
  });

  it("records the token with owner, seed, height and derived locator", () => {
    const id = ledger.createCollection(collectionRequest(), CREATOR);
    ledger.mint(id, 18446744073709551615n, ALICE);

    expect(ledger.getNft(id, 1)).toEqual({
      collectionId: 1,
      tokenIndex: 1,
      owner: ALICE,
      seed: 18446744073709551615n,
      mintedAtHeight: 2,
      metadataLocator: "https://meta.example.test/tesseract/1",
    });
    expect(ledger.getNftOwner(id, 1)).toBe(ALICE);
    expect(ledger.getOwnedNfts(ALICE)).toEqual([{ collectionId: 1, tokenIndex: 1 }]);
  });

  it("rejects seeds outside the unsigned 64-bit range", () => {
    const id = ledger.createCollection(collectionRequest(), CREATOR);
    expect(ledgerErrorCode(() => ledger.mint(id, 2n ** 64n, ALICE))).toBe("InvalidParameters");
    expect(ledgerErrorCode(() => ledger.mint(id, -1n, ALICE))).toBe("InvalidParameters");
  });

  it("fails for unknown and closed collections", () => {
    expect(ledgerErrorCode(() => ledger.mint(5, 1n, ALICE))).toBe("CollectionNotFound");

    const id = ledger.createCollection(collectionRequest(), CREATOR);
    ledger.setCollectionStatus(id, false, CREATOR);
    expect(ledgerErrorCode(() => ledger.mint(id, 1n, ALICE))).toBe("CollectionClosed");
  });

  it("pays the mint price to the creator", () => {
    const id = ledger.createCollection(collectionRequest({ mintPrice: 300n }), CREATOR);
    ledger.deposit(ALICE, 500n, ADMIN);

    ledger.mint(id, 1n, ALICE);

    expect(ledger.getBalance(ALICE)).toBe(200n);
    expect(ledger.getBalance(CREATOR)).toBe(300n);
  });

  it("rejects an underfunded minter without allocating an index", () => {
    const id = ledger.createCollection(collectionRequest({ mintPrice: 300n }), CREATOR);
    ledger.deposit(ALICE, 299n, ADMIN);

    expect(ledgerErrorCode(() => ledger.mint(id, 1n, ALICE))).toBe("InsufficientPayment");
    expect(ledger.getCollection(id)?.currentSupply).toBe(0);
    expect(ledger.getBalance(ALICE)).toBe(299n);
    expect(ledger.getOwnedNfts(ALICE)).toEqual([]);
  });

  it("never reuses an index across collections or after failures", () => {
    const first = ledger.createCollection(collectionRequest({ maxSupply: 2 }), CREATOR);
    const second = ledger.createCollection(collectionRequest({ maxSupply: 2 }), CREATOR);

    ledger.mint(first, 1n, ALICE);
    ledgerErrorCode(() => ledger.mint(first, 2n, ""));
    ledger.mint(second, 3n, ALICE);
    ledger.mint(first, 4n, BOB);

    expect(ledger.getNft(first, 2)?.owner).toBe(BOB);
    expect(ledger.getNft(second, 1)?.owner).toBe(ALICE);
    expect(ledger.getOwnedNfts(ALICE)).toEqual([
      { collectionId: first, tokenIndex: 1 },
      { collectionId: second, tokenIndex: 1 },
    ]);
  });

  it("enforces the per-account portfolio cap", () => {
    const capped = createTestLedger({ maxOwnedPerAccount: 2 });
    const id = capped.createCollection(collectionRequest({ maxSupply: 5 }), CREATOR);
    capped.mint(id, 1n, ALICE);
    capped.mint(id, 2n, ALICE);

    expect(ledgerErrorCode(() => capped.mint(id, 3n, ALICE))).toBe("InvalidParameters");
    expect(capped.getCollection(id)?.currentSupply).toBe(2);
    capped.close();
  });
});

describe("transferNft", () => {
  let ledger: LatticeLedger;

  beforeEach(() => {
    ledger = createTestLedger();
    ledger.createCollection(collectionRequest(), CREATOR);
    ledger.mint(1, 7n, ALICE);
  });

  afterEach(() => {
    ledger.close();
  });

  it("moves ownership and the ownership index entry", () => {
    ledger.transferNft(1, 1, BOB, ALICE);

    expect(ledger.getNftOwner(1, 1)).toBe(BOB);
    expect(ledger.getOwnedNfts(ALICE)).toEqual([]);
    expect(ledger.getOwnedNfts(BOB)).toEqual([{ collectionId: 1, tokenIndex: 1 }]);
  });

  it("rejects a non-owner without changing state", () => {
    const heightBefore = ledger.getHeight();

    expect(ledgerErrorCode(() => ledger.transferNft(1, 1, BOB, BOB))).toBe("NotOwner");

    expect(ledger.getNftOwner(1, 1)).toBe(ALICE);
    expect(ledger.getOwnedNfts(ALICE)).toEqual([{ collectionId: 1, tokenIndex: 1 }]);
    expect(ledger.getOwnedNfts(BOB)).toEqual([]);
    expect(ledger.getHeight()).toBe(heightBefore);
  });

  it("fails for tokens that were never minted", () => {
    expect(ledgerErrorCode(() => ledger.transferNft(1, 2, BOB, ALICE))).toBe("NftNotFound");
  });

  it("accepts an owner given with surrounding whitespace", () => {
    ledger.transferNft(1, 1, BOB, ` ${ALICE} `);

    expect(ledger.getNftOwner(1, 1)).toBe(BOB);
    expect(ledger.auditInvariants()).toEqual([]);
  });

  it("removes the token's listing", () => {
    ledger.listForSale(1, 1, 500n, ALICE);

    ledger.transferNft(1, 1, BOB, ALICE);

    expect(ledger.getListing(1, 1)).toBeNull();
  });

  it("records the transfer in the activity log", () => {
    ledger.transferNft(1, 1, BOB, ALICE);

    expect(ledger.listActivity({ collectionId: 1, tokenIndex: 1, limit: 1 })).toEqual([
      {
        id: 3,
        kind: "transferred",
        collectionId: 1,
        tokenIndex: 1,
        fromAccount: ALICE,
        toAccount: BOB,
        amount: null,
        height: 3,
      },
    ]);
  });
});
