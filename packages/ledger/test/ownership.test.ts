import { beforeEach, describe, expect, it } from "vitest";

import { type LedgerDatabase, openLedgerDatabase } from "../src/db";
import { OwnershipIndex } from "../src/ownership";

describe("OwnershipIndex", () => {
  let db: LedgerDatabase;
  let index: OwnershipIndex;

  beforeEach(() => {
    db = openLedgerDatabase();
    index = new OwnershipIndex(db);
  });

  it("enumerates tokens in acquisition order", () => {
    index.add("alice", { collectionId: 2, tokenIndex: 5 });
    index.add("alice", { collectionId: 1, tokenIndex: 9 });
    index.add("alice", { collectionId: 1, tokenIndex: 1 });

    expect(index.list("alice")).toEqual([
      { collectionId: 2, tokenIndex: 5 },
      { collectionId: 1, tokenIndex: 9 },
      { collectionId: 1, tokenIndex: 1 },
    ]);
    expect(index.count("alice")).toBe(3);
  });

  it("removes by identity rather than position", () => {
    index.add("alice", { collectionId: 1, tokenIndex: 1 });
    index.add("alice", { collectionId: 1, tokenIndex: 2 });
    index.add("alice", { collectionId: 1, tokenIndex: 3 });

    index.remove("alice", { collectionId: 1, tokenIndex: 2 });

    expect(index.list("alice")).toEqual([
      { collectionId: 1, tokenIndex: 1 },
      { collectionId: 1, tokenIndex: 3 },
    ]);
    expect(index.has("alice", { collectionId: 1, tokenIndex: 2 })).toBe(false);
  });

  it("refuses duplicate entries", () => {
    index.add("alice", { collectionId: 1, tokenIndex: 1 });

    expect(() => index.add("alice", { collectionId: 1, tokenIndex: 1 })).toThrow(
      "Ownership index already holds 1:1 for alice",
    );
  });

  it("refuses to remove an entry it does not hold", () => {
    expect(() => index.remove("bob", { collectionId: 1, tokenIndex: 1 })).toThrow(
      "Ownership index has no 1:1 for bob",
    );
  });

  it("keeps accounts separate", () => {
    index.add("alice", { collectionId: 1, tokenIndex: 1 });
    index.add("bob", { collectionId: 1, tokenIndex: 2 });

    expect(index.list("bob")).toEqual([{ collectionId: 1, tokenIndex: 2 }]);
    expect(index.list("carol")).toEqual([]);
  });
});
