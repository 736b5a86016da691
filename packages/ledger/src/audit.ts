import type { LedgerDatabase } from "./db";

export type InvariantName =
  | "supply_within_cap"
  | "supply_matches_tokens"
  | "ownership_index_matches_owner"
  | "listing_seller_owns_token"
  | "listing_price_positive"
  | "balance_non_negative";

export interface InvariantViolation {
  invariant: InvariantName;
  detail: string;
}

interface TokenRef {
  collectionId: number;
  tokenIndex: number;
  owner: string;
}

/** Read-only scan of the ledger's global invariants. An empty result means consistent. */
export function auditInvariants(db: LedgerDatabase): InvariantViolation[] {
  const violations: InvariantViolation[] = [];

  const overCap = db
    .prepare(
      `SELECT collection_id AS id, current_supply AS currentSupply, max_supply AS maxSupply
       FROM collections
       WHERE current_supply > max_supply`,
    )
    .all() as Array<{ id: number; currentSupply: number; maxSupply: number }>;
  for (const row of overCap) {
    violations.push({
      invariant: "supply_within_cap",
      detail: `collection ${row.id}: supply ${row.currentSupply} exceeds cap ${row.maxSupply}`,
    });
  }

  const supplyMismatch = db
    .prepare(
      `SELECT c.collection_id AS id, c.current_supply AS currentSupply, COUNT(t.token_index) AS minted,
              COALESCE(MAX(t.token_index), 0) AS highestIndex
       FROM collections c
       LEFT JOIN tokens t ON t.collection_id = c.collection_id
       GROUP BY c.collection_id
       HAVING minted != c.current_supply OR highestIndex != c.current_supply`,
    )
    .all() as Array<{ id: number; currentSupply: number; minted: number }>;
  for (const row of supplyMismatch) {
    violations.push({
      invariant: "supply_matches_tokens",
      detail: `collection ${row.id}: supply ${row.currentSupply} but ${row.minted} tokens`,
    });
  }

  const missingFromIndex = db
    .prepare(
      `SELECT t.collection_id AS collectionId, t.token_index AS tokenIndex, t.owner
       FROM tokens t
       LEFT JOIN ownership_index o
         ON o.owner = t.owner AND o.collection_id = t.collection_id AND o.token_index = t.token_index
       WHERE o.owner IS NULL`,
    )
    .all() as TokenRef[];
  for (const row of missingFromIndex) {
    violations.push({
      invariant: "ownership_index_matches_owner",
      detail: `token ${row.collectionId}:${row.tokenIndex} owned by ${row.owner} is missing from the index`,
    });
  }

  const staleInIndex = db
    .prepare(
      `SELECT o.collection_id AS collectionId, o.token_index AS tokenIndex, o.owner
       FROM ownership_index o
       LEFT JOIN tokens t
         ON t.owner = o.owner AND t.collection_id = o.collection_id AND t.token_index = o.token_index
       WHERE t.owner IS NULL`,
    )
    .all() as TokenRef[];
  for (const row of staleInIndex) {
    violations.push({
      invariant: "ownership_index_matches_owner",
      detail: `index entry ${row.collectionId}:${row.tokenIndex} for ${row.owner} does not match the token owner`,
    });
  }

  const staleListings = db
    .prepare(
      `SELECT l.collection_id AS collectionId, l.token_index AS tokenIndex, l.seller AS owner
       FROM listings l
       LEFT JOIN tokens t ON t.collection_id = l.collection_id AND t.token_index = l.token_index
       WHERE t.owner IS NULL OR t.owner != l.seller`,
    )
    .all() as TokenRef[];
  for (const row of staleListings) {
    violations.push({
      invariant: "listing_seller_owns_token",
      detail: `listing ${row.collectionId}:${row.tokenIndex} by ${row.owner} is not backed by ownership`,
    });
  }

  const listings = db
    .prepare("SELECT collection_id AS collectionId, token_index AS tokenIndex, price FROM listings")
    .all() as Array<{ collectionId: number; tokenIndex: number; price: string }>;
  for (const row of listings) {
    if (BigInt(row.price) <= 0n) {
      violations.push({
        invariant: "listing_price_positive",
        detail: `listing ${row.collectionId}:${row.tokenIndex} has price ${row.price}`,
      });
    }
  }

  const balances = db.prepare("SELECT account, amount FROM balances").all() as Array<{
    account: string;
    amount: string;
  }>;
  for (const row of balances) {
    if (BigInt(row.amount) < 0n) {
      violations.push({
        invariant: "balance_non_negative",
        detail: `account ${row.account} has balance ${row.amount}`,
      });
    }
  }

  return violations;
}
