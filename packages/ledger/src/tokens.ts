import type { BalanceLedger } from "./balances";
import type { CollectionRegistry } from "./collections";
import type { LedgerDatabase } from "./db";
import { LedgerError } from "./errors";
import type { ListingBook } from "./listings";
import type { OwnershipIndex } from "./ownership";
import type { AccountId, Token, TokenId } from "./types";

interface TokenRow {
  collectionId: number;
  tokenIndex: number;
  owner: string;
  seed: string;
  mintedAtHeight: number;
  metadataLocator: string;
}

const TOKEN_COLUMNS = `
  collection_id AS collectionId,
  token_index AS tokenIndex,
  owner,
  seed,
  minted_at_height AS mintedAtHeight,
  metadata_locator AS metadataLocator`;

function toToken(row: TokenRow): Token {
  return { ...row, seed: BigInt(row.seed) };
}

export function tokenMetadataLocator(baseLocator: string, tokenIndex: number): string {
  return `${baseLocator}/${tokenIndex}`;
}

export interface TokenRegistryDeps {
  collections: CollectionRegistry;
  ownership: OwnershipIndex;
  listings: ListingBook;
  balances: BalanceLedger;
  maxOwnedPerAccount: number;
}

export interface MintResult extends TokenId {
  creator: AccountId;
  price: bigint;
  metadataLocator: string;
}

/** Sole authority over token existence and `owner`. */
export class TokenRegistry {
  constructor(
    private readonly db: LedgerDatabase,
    private readonly deps: TokenRegistryDeps,
  ) {}

  get(tokenId: TokenId): Token | null {
    const row = this.db
      .prepare(`SELECT ${TOKEN_COLUMNS} FROM tokens WHERE collection_id = ? AND token_index = ?`)
      .get(tokenId.collectionId, tokenId.tokenIndex) as TokenRow | undefined;
    return row ? toToken(row) : null;
  }

  listByCollection(collectionId: number): Token[] {
    const rows = this.db
      .prepare(`SELECT ${TOKEN_COLUMNS} FROM tokens WHERE collection_id = ? ORDER BY token_index ASC`)
      .all(collectionId) as TokenRow[];
    return rows.map(toToken);
  }

  assertCanReceive(account: AccountId): void {
    if (this.deps.ownership.count(account) >= this.deps.maxOwnedPerAccount) {
      throw new LedgerError(
        "InvalidParameters",
        `Account already holds the maximum of ${this.deps.maxOwnedPerAccount} NFTs`,
      );
    }
  }

  mint(collectionId: number, seed: bigint, caller: AccountId, height: number): MintResult {
    const collection = this.deps.collections.get(collectionId);
    if (!collection) {
      throw new LedgerError("CollectionNotFound");
    }
    if (!collection.isOpen) {
      throw new LedgerError("CollectionClosed");
    }
    if (collection.currentSupply >= collection.maxSupply) {
      throw new LedgerError("CollectionLimitReached");
    }
    if (this.deps.balances.balanceOf(caller) < collection.mintPrice) {
      throw new LedgerError("InsufficientPayment");
    }
    this.assertCanReceive(caller);

    if (collection.mintPrice > 0n) {
      const payment = this.deps.balances.transfer(collection.mintPrice, caller, collection.creator);
      if (!payment.ok) {
        throw new LedgerError("InsufficientPayment");
      }
    }

    const tokenIndex = this.deps.collections.allocateTokenIndex(collectionId);
    if (tokenIndex === null) {
      throw new LedgerError("CollectionLimitReached");
    }

    const metadataLocator = tokenMetadataLocator(collection.metadataLocator, tokenIndex);
    this.db
      .prepare(
        `INSERT INTO tokens(collection_id, token_index, owner, seed, minted_at_height, metadata_locator)
         VALUES(?, ?, ?, ?, ?, ?)`,
      )
      .run(collectionId, tokenIndex, caller, seed.toString(), height, metadataLocator);
    this.deps.ownership.add(caller, { collectionId, tokenIndex });

    return {
      collectionId,
      tokenIndex,
      creator: collection.creator,
      price: collection.mintPrice,
      metadataLocator,
    };
  }

  /**
   * Ownership move shared by direct transfers and sales. Callers check that `from`
   * is the current owner; the primitive only requires the token to exist.
   */
  transfer(tokenId: TokenId, from: AccountId, to: AccountId): void {
    const token = this.get(tokenId);
    if (!token) {
      throw new LedgerError("NftNotFound");
    }

    this.deps.listings.delete(tokenId);
    this.db
      .prepare("UPDATE tokens SET owner = ? WHERE collection_id = ? AND token_index = ?")
      .run(to, tokenId.collectionId, tokenId.tokenIndex);
    this.deps.ownership.remove(from, tokenId);
    this.deps.ownership.add(to, tokenId);
  }

  transferNft(tokenId: TokenId, recipient: AccountId, caller: AccountId): Token {
    const token = this.get(tokenId);
    if (!token) {
      throw new LedgerError("NftNotFound");
    }
    if (token.owner !== caller) {
      throw new LedgerError("NotOwner");
    }
    if (recipient !== caller) {
      this.assertCanReceive(recipient);
    }

    this.transfer(tokenId, caller, recipient);
    return token;
  }
}
