import type { BalanceLedger } from "./balances";
import type { CollectionRegistry } from "./collections";
import { LedgerError } from "./errors";
import type { FeeEngine } from "./fees";
import type { ListingBook } from "./listings";
import type { TokenRegistry } from "./tokens";
import type { AccountId, Listing, SaleReceipt, TokenId } from "./types";

export interface MarketplaceDeps {
  collections: CollectionRegistry;
  tokens: TokenRegistry;
  listings: ListingBook;
  fees: FeeEngine;
  balances: BalanceLedger;
}

export class MarketplaceLedger {
  constructor(private readonly deps: MarketplaceDeps) {}

  list(tokenId: TokenId, price: bigint, caller: AccountId, height: number): Listing {
    const token = this.deps.tokens.get(tokenId);
    if (!token) {
      throw new LedgerError("NftNotFound");
    }
    if (token.owner !== caller) {
      throw new LedgerError("NotOwner");
    }
    if (price <= 0n) {
      throw new LedgerError("InvalidParameters", "Price must be greater than zero");
    }
    if (this.deps.listings.get(tokenId)) {
      throw new LedgerError("ListingExists");
    }

    this.deps.listings.insert(tokenId, caller, price, height);
    return { ...tokenId, seller: caller, price, listedAtHeight: height };
  }

  cancel(tokenId: TokenId, caller: AccountId): Listing {
    const listing = this.deps.listings.get(tokenId);
    if (!listing) {
      throw new LedgerError("ListingNotFound");
    }
    if (listing.seller !== caller) {
      throw new LedgerError("NotAuthorized");
    }

    this.deps.listings.delete(tokenId);
    return listing;
  }

  /**
   * Pays the seller, creator and platform, then moves the token to the buyer. Both
   * halves run in the caller's transaction, so neither is visible without the other.
   */
  buy(tokenId: TokenId, caller: AccountId): SaleReceipt {
    const listing = this.deps.listings.get(tokenId);
    if (!listing) {
      throw new LedgerError("ListingNotFound");
    }
    const collection = this.deps.collections.get(tokenId.collectionId);
    if (!collection) {
      throw new LedgerError("CollectionNotFound");
    }
    if (!this.deps.tokens.get(tokenId)) {
      throw new LedgerError("NftNotFound");
    }
    if (caller === listing.seller) {
      throw new LedgerError("NotAuthorized", "Seller cannot buy their own listing");
    }
    if (this.deps.balances.balanceOf(caller) < listing.price) {
      throw new LedgerError("InsufficientPayment");
    }
    this.deps.tokens.assertCanReceive(caller);

    const split = this.deps.fees.settle(
      listing.price,
      { payer: caller, seller: listing.seller, creator: collection.creator },
      collection.royaltyBps,
    );
    this.deps.tokens.transfer(tokenId, listing.seller, caller);
    this.deps.listings.delete(tokenId);

    return {
      ...tokenId,
      seller: listing.seller,
      buyer: caller,
      price: listing.price,
      split,
    };
  }
}
