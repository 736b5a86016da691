import type { LedgerDatabase } from "./db";
import { type AccountId, formatTokenId, type TokenId } from "./types";

export const DEFAULT_MAX_OWNED_PER_ACCOUNT = 1000;

/**
 * Derived account → tokens index. `tokens.owner` stays the source of truth; every
 * write here happens in the same transaction as the owner change it mirrors.
 */
export class OwnershipIndex {
  constructor(private readonly db: LedgerDatabase) {}

  has(owner: AccountId, tokenId: TokenId): boolean {
    const row = this.db
      .prepare(
        `SELECT 1 AS present
         FROM ownership_index
         WHERE owner = ? AND collection_id = ? AND token_index = ?`,
      )
      .get(owner, tokenId.collectionId, tokenId.tokenIndex);
    return row !== undefined;
  }

  add(owner: AccountId, tokenId: TokenId): void {
    if (this.has(owner, tokenId)) {
      throw new Error(`Ownership index already holds ${formatTokenId(tokenId)} for ${owner}`);
    }

    this.db
      .prepare(
        `INSERT INTO ownership_index(owner, collection_id, token_index, seq)
         VALUES(
           @owner, @collectionId, @tokenIndex,
           (SELECT COALESCE(MAX(seq), 0) + 1 FROM ownership_index WHERE owner = @owner)
         )`,
      )
      .run({ owner, collectionId: tokenId.collectionId, tokenIndex: tokenId.tokenIndex });
  }

  remove(owner: AccountId, tokenId: TokenId): void {
    const result = this.db
      .prepare(
        `DELETE FROM ownership_index
         WHERE owner = ? AND collection_id = ? AND token_index = ?`,
      )
      .run(owner, tokenId.collectionId, tokenId.tokenIndex);

    if (result.changes !== 1) {
      throw new Error(`Ownership index has no ${formatTokenId(tokenId)} for ${owner}`);
    }
  }

  /** Tokens held by `owner`, in order of acquisition. */
  list(owner: AccountId): TokenId[] {
    return this.db
      .prepare(
        `SELECT collection_id AS collectionId, token_index AS tokenIndex
         FROM ownership_index
         WHERE owner = ?
         ORDER BY seq ASC`,
      )
      .all(owner) as TokenId[];
  }

  count(owner: AccountId): number {
    return (
      this.db.prepare("SELECT COUNT(1) AS count FROM ownership_index WHERE owner = ?").get(owner) as { count: number }
    ).count;
  }
}
