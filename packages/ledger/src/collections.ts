import type { LedgerDatabase } from "./db";
import type { AccountId, Collection, CollectionCreateRequest } from "./types";

interface CollectionRow {
  id: number;
  creator: string;
  name: string;
  description: string;
  maxSupply: number;
  currentSupply: number;
  mintPrice: string;
  royaltyBps: number;
  isOpen: number;
  createdAtHeight: number;
  metadataLocator: string;
}

const COLLECTION_COLUMNS = `
  collection_id AS id,
  creator,
  name,
  description,
  max_supply AS maxSupply,
  current_supply AS currentSupply,
  mint_price AS mintPrice,
  royalty_bps AS royaltyBps,
  is_open AS isOpen,
  created_at_height AS createdAtHeight,
  metadata_locator AS metadataLocator`;

function toCollection(row: CollectionRow): Collection {
  return {
    ...row,
    mintPrice: BigInt(row.mintPrice),
    isOpen: row.isOpen === 1,
  };
}

export class CollectionRegistry {
  constructor(private readonly db: LedgerDatabase) {}

  /** Inserts a validated collection under the next sequential id. */
  insert(creator: AccountId, request: CollectionCreateRequest, height: number): number {
    const id = this.count() + 1;
    this.db
      .prepare(
        `INSERT INTO collections(
          collection_id, creator, name, description, max_supply, current_supply,
          mint_price, royalty_bps, is_open, created_at_height, metadata_locator
        ) VALUES(
          @id, @creator, @name, @description, @maxSupply, 0,
          @mintPrice, @royaltyBps, 1, @height, @metadataLocator
        )`,
      )
      .run({
        id,
        creator,
        name: request.name,
        description: request.description,
        maxSupply: request.maxSupply,
        mintPrice: request.mintPrice.toString(),
        royaltyBps: request.royaltyBps,
        height,
        metadataLocator: request.metadataLocator,
      });
    return id;
  }

  get(collectionId: number): Collection | null {
    const row = this.db
      .prepare(`SELECT ${COLLECTION_COLUMNS} FROM collections WHERE collection_id = ?`)
      .get(collectionId) as CollectionRow | undefined;

    return row ? toCollection(row) : null;
  }

  list(creator?: AccountId): Collection[] {
    if (creator) {
      const rows = this.db
        .prepare(`SELECT ${COLLECTION_COLUMNS} FROM collections WHERE creator = ? ORDER BY collection_id DESC`)
        .all(creator) as CollectionRow[];
      return rows.map(toCollection);
    }

    const rows = this.db
      .prepare(`SELECT ${COLLECTION_COLUMNS} FROM collections ORDER BY collection_id DESC`)
      .all() as CollectionRow[];
    return rows.map(toCollection);
  }

  count(): number {
    return (this.db.prepare("SELECT COUNT(1) AS count FROM collections").get() as { count: number }).count;
  }

  setOpen(collectionId: number, isOpen: boolean): void {
    this.db
      .prepare("UPDATE collections SET is_open = ? WHERE collection_id = ?")
      .run(isOpen ? 1 : 0, collectionId);
  }

  /**
   * Compare-and-increment on the supply counter. Returns the allocated token index,
   * or null when the collection is already at its cap.
   */
  allocateTokenIndex(collectionId: number): number | null {
    const row = this.db
      .prepare(
        `UPDATE collections
         SET current_supply = current_supply + 1
         WHERE collection_id = ?
           AND current_supply < max_supply
         RETURNING current_supply AS tokenIndex`,
      )
      .get(collectionId) as { tokenIndex: number } | undefined;

    return row?.tokenIndex ?? null;
  }
}
