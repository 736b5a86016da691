import type { LedgerDatabase } from "./db";
import type { AccountId, Listing, TokenId } from "./types";

interface ListingRow {
  collectionId: number;
  tokenIndex: number;
  seller: string;
  price: string;
  listedAtHeight: number;
}

const LISTING_COLUMNS = `
  collection_id AS collectionId,
  token_index AS tokenIndex,
  seller,
  price,
  listed_at_height AS listedAtHeight`;

function toListing(row: ListingRow): Listing {
  return { ...row, price: BigInt(row.price) };
}

/** Listing rows, shared by the marketplace and the transfer primitive. */
export class ListingBook {
  constructor(private readonly db: LedgerDatabase) {}

  get(tokenId: TokenId): Listing | null {
    const row = this.db
      .prepare(`SELECT ${LISTING_COLUMNS} FROM listings WHERE collection_id = ? AND token_index = ?`)
      .get(tokenId.collectionId, tokenId.tokenIndex) as ListingRow | undefined;
    return row ? toListing(row) : null;
  }

  insert(tokenId: TokenId, seller: AccountId, price: bigint, height: number): void {
    this.db
      .prepare(
        `INSERT INTO listings(collection_id, token_index, seller, price, listed_at_height)
         VALUES(?, ?, ?, ?, ?)`,
      )
      .run(tokenId.collectionId, tokenId.tokenIndex, seller, price.toString(), height);
  }

  /** Returns whether a listing was removed. */
  delete(tokenId: TokenId): boolean {
    const result = this.db
      .prepare("DELETE FROM listings WHERE collection_id = ? AND token_index = ?")
      .run(tokenId.collectionId, tokenId.tokenIndex);
    return result.changes > 0;
  }

  list(collectionId?: number): Listing[] {
    if (collectionId !== undefined) {
      const rows = this.db
        .prepare(
          `SELECT ${LISTING_COLUMNS} FROM listings
           WHERE collection_id = ?
           ORDER BY listed_at_height DESC, token_index ASC`,
        )
        .all(collectionId) as ListingRow[];
      return rows.map(toListing);
    }

    const rows = this.db
      .prepare(`SELECT ${LISTING_COLUMNS} FROM listings ORDER BY listed_at_height DESC, collection_id ASC, token_index ASC`)
      .all() as ListingRow[];
    return rows.map(toListing);
  }

  count(): number {
    return (this.db.prepare("SELECT COUNT(1) AS count FROM listings").get() as { count: number }).count;
  }
}
