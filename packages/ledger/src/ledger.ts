import pino from "pino";

import { ActivityLog } from "./activity";
import { auditInvariants, type InvariantViolation } from "./audit";
import { type BalanceLedger, SqliteBalanceLedger } from "./balances";
import { CollectionRegistry } from "./collections";
import { type LedgerDatabase, LedgerStateStore, openLedgerDatabase } from "./db";
import { isLedgerError, LedgerError } from "./errors";
import { FeeEngine, MAX_PLATFORM_FEE_BPS } from "./fees";
import { StoredHeightCounter } from "./height";
import { LatticeParameterStore } from "./lattice-params";
import { ListingBook } from "./listings";
import { MarketplaceLedger } from "./marketplace";
import { DEFAULT_MAX_OWNED_PER_ACCOUNT, OwnershipIndex } from "./ownership";
import { PlatformSettings } from "./settings";
import { TokenRegistry } from "./tokens";
import type {
  AccountId,
  ActivityEntry,
  ActivityQuery,
  Bps,
  Collection,
  CollectionCreateRequest,
  LatticeParameters,
  LedgerStats,
  Listing,
  PlatformConfig,
  SaleReceipt,
  Token,
  TokenId,
} from "./types";
import { accountSchema, assertSeed, parseAccount, parseCollectionCreateRequest } from "./validation";

/** A balance ledger the platform admin can fund. */
export interface FundableBalanceLedger extends BalanceLedger {
  credit(account: AccountId, amount: bigint): bigint;
}

export interface LatticeLedgerOptions {
  /** Account that becomes the first platform admin of a fresh database. */
  deployer: AccountId;
  /** Database file; defaults to an in-memory database. Ignored when `db` is given. */
  dbFile?: string;
  db?: LedgerDatabase;
  logger?: pino.Logger;
  maxOwnedPerAccount?: number;
  /** Must write through the same database for payments to share the operation's transaction. */
  balances?: FundableBalanceLedger;
}

/**
 * Public operation surface. Every mutation runs as one immediate SQLite
 * transaction: a rejected call leaves no trace, including on the height counter.
 */
export class LatticeLedger {
  private readonly db: LedgerDatabase;
  private readonly ownsDb: boolean;
  private readonly log: pino.Logger;
  private readonly settings: PlatformSettings;
  private readonly height: StoredHeightCounter;
  private readonly balances: FundableBalanceLedger;
  private readonly collections: CollectionRegistry;
  private readonly latticeParams: LatticeParameterStore;
  private readonly ownership: OwnershipIndex;
  private readonly listings: ListingBook;
  private readonly tokens: TokenRegistry;
  private readonly marketplace: MarketplaceLedger;
  private readonly activity: ActivityLog;

  constructor(options: LatticeLedgerOptions) {
    this.ownsDb = !options.db;
    this.db = options.db ?? openLedgerDatabase(options.dbFile);
    this.log = options.logger ?? pino({ name: "lattice-ledger" });

    const state = new LedgerStateStore(this.db);
    this.settings = new PlatformSettings(state, parseAccount(options.deployer, "deployer"));
    this.height = new StoredHeightCounter(state);
    this.balances = options.balances ?? new SqliteBalanceLedger(this.db);
    this.collections = new CollectionRegistry(this.db);
    this.latticeParams = new LatticeParameterStore(this.db);
    this.ownership = new OwnershipIndex(this.db);
    this.listings = new ListingBook(this.db);
    this.activity = new ActivityLog(this.db, state);
    this.tokens = new TokenRegistry(this.db, {
      collections: this.collections,
      ownership: this.ownership,
      listings: this.listings,
      balances: this.balances,
      maxOwnedPerAccount: options.maxOwnedPerAccount ?? DEFAULT_MAX_OWNED_PER_ACCOUNT,
    });
    this.marketplace = new MarketplaceLedger({
      collections: this.collections,
      tokens: this.tokens,
      listings: this.listings,
      fees: new FeeEngine(this.settings, this.balances),
      balances: this.balances,
    });
  }

  close(): void {
    if (this.ownsDb) {
      this.db.close();
    }
  }

  private commit<T>(operation: string, caller: AccountId, work: (height: number) => T): T {
    const txn = this.db.transaction(() => work(this.height.advance()));
    try {
      return txn.immediate();
    } catch (error) {
      if (isLedgerError(error)) {
        this.log.debug({ operation, caller, code: error.code }, "Ledger operation rejected");
      }
      throw error;
    }
  }

  createCollection(request: CollectionCreateRequest, caller: AccountId): number {
    return this.commit("createCollection", caller, (height) => {
      const creator = parseAccount(caller, "caller");
      const valid = parseCollectionCreateRequest(request);
      const collectionId = this.collections.insert(creator, valid, height);
      this.latticeParams.put(collectionId, valid.lattice);
      this.activity.record({ kind: "collection_created", height, collectionId, toAccount: creator });

      this.log.info({ collectionId, creator, maxSupply: valid.maxSupply }, "Collection created");
      return collectionId;
    });
  }

  setCollectionStatus(collectionId: number, isOpen: boolean, caller: AccountId): void {
    this.commit("setCollectionStatus", caller, (height) => {
      const requester = parseAccount(caller, "caller");
      const collection = this.collections.get(collectionId);
      if (!collection) {
        throw new LedgerError("CollectionNotFound");
      }
      if (collection.creator !== requester) {
        throw new LedgerError("NotAuthorized");
      }

      this.collections.setOpen(collectionId, isOpen);
      this.activity.record({ kind: "collection_status_changed", height, collectionId, fromAccount: requester });
      this.log.info({ collectionId, isOpen }, "Collection status changed");
    });
  }

  mint(collectionId: number, seed: bigint, caller: AccountId): TokenId {
    return this.commit("mint", caller, (height) => {
      assertSeed(seed);
      const minter = parseAccount(caller, "caller");
      const minted = this.tokens.mint(collectionId, seed, minter, height);
      this.activity.record({
        kind: "minted",
        height,
        collectionId,
        tokenIndex: minted.tokenIndex,
        fromAccount: minted.creator,
        toAccount: minter,
        amount: minted.price,
      });

      this.log.info({ collectionId, tokenIndex: minted.tokenIndex, owner: minter }, "NFT minted");
      return { collectionId: minted.collectionId, tokenIndex: minted.tokenIndex };
    });
  }

  transferNft(collectionId: number, tokenIndex: number, recipient: AccountId, caller: AccountId): void {
    this.commit("transferNft", caller, (height) => {
      const tokenId = { collectionId, tokenIndex };
      const from = parseAccount(caller, "caller");
      const to = parseAccount(recipient, "recipient");
      this.tokens.transferNft(tokenId, to, from);
      this.activity.record({ kind: "transferred", height, ...tokenId, fromAccount: from, toAccount: to });
      this.log.info({ collectionId, tokenIndex, from, to }, "NFT transferred");
    });
  }

  listForSale(collectionId: number, tokenIndex: number, price: bigint, caller: AccountId): Listing {
    return this.commit("listForSale", caller, (height) => {
      const seller = parseAccount(caller, "caller");
      const listing = this.marketplace.list({ collectionId, tokenIndex }, price, seller, height);
      this.activity.record({
        kind: "listed",
        height,
        collectionId,
        tokenIndex,
        fromAccount: seller,
        amount: price,
      });
      this.log.info({ collectionId, tokenIndex, seller, price: price.toString() }, "NFT listed");
      return listing;
    });
  }

  cancelListing(collectionId: number, tokenIndex: number, caller: AccountId): void {
    this.commit("cancelListing", caller, (height) => {
      const seller = parseAccount(caller, "caller");
      const listing = this.marketplace.cancel({ collectionId, tokenIndex }, seller);
      this.activity.record({
        kind: "listing_cancelled",
        height,
        collectionId,
        tokenIndex,
        fromAccount: seller,
        amount: listing.price,
      });
      this.log.info({ collectionId, tokenIndex }, "Listing cancelled");
    });
  }

  buyNft(collectionId: number, tokenIndex: number, caller: AccountId): SaleReceipt {
    return this.commit("buyNft", caller, (height) => {
      const receipt = this.marketplace.buy({ collectionId, tokenIndex }, parseAccount(caller, "caller"));
      this.activity.record({
        kind: "sold",
        height,
        collectionId,
        tokenIndex,
        fromAccount: receipt.seller,
        toAccount: receipt.buyer,
        amount: receipt.price,
      });
      this.log.info(
        {
          collectionId,
          tokenIndex,
          seller: receipt.seller,
          buyer: receipt.buyer,
          price: receipt.price.toString(),
          platformFee: receipt.split.platformFee.toString(),
          royalty: receipt.split.royalty.toString(),
        },
        "NFT sold",
      );
      return receipt;
    });
  }

  setPlatformFeeBps(newFeeBps: Bps, caller: AccountId): void {
    this.commit("setPlatformFeeBps", caller, (height) => {
      const admin = this.requireAdmin(caller);
      if (!Number.isInteger(newFeeBps) || newFeeBps < 0 || newFeeBps > MAX_PLATFORM_FEE_BPS) {
        throw new LedgerError("InvalidParameters", `Platform fee must be between 0 and ${MAX_PLATFORM_FEE_BPS} bps`);
      }

      this.settings.setPlatformFeeBps(newFeeBps);
      this.activity.record({ kind: "platform_fee_changed", height, fromAccount: admin, amount: BigInt(newFeeBps) });
      this.log.info({ platformFeeBps: newFeeBps }, "Platform fee updated");
    });
  }

  setAdmin(newAdmin: AccountId, caller: AccountId): void {
    this.commit("setAdmin", caller, (height) => {
      const previousAdmin = this.requireAdmin(caller);
      const admin = parseAccount(newAdmin, "admin");
      this.settings.setAdmin(admin);
      this.activity.record({ kind: "admin_changed", height, fromAccount: previousAdmin, toAccount: admin });
      this.log.info({ previousAdmin, admin }, "Platform admin changed");
    });
  }

  deposit(account: AccountId, amount: bigint, caller: AccountId): bigint {
    return this.commit("deposit", caller, (height) => {
      this.requireAdmin(caller);
      const target = parseAccount(account);
      if (amount <= 0n) {
        throw new LedgerError("InvalidParameters", "Deposit amount must be greater than zero");
      }

      const balance = this.balances.credit(target, amount);
      this.activity.record({ kind: "deposited", height, toAccount: target, amount });
      this.log.info({ account: target, amount: amount.toString() }, "Balance deposited");
      return balance;
    });
  }

  /** Returns the normalized admin account; any other caller is `NotAuthorized`. */
  private requireAdmin(caller: AccountId): AccountId {
    const parsed = accountSchema.safeParse(caller);
    if (!parsed.success || !this.settings.isAdmin(parsed.data)) {
      throw new LedgerError("NotAuthorized");
    }
    return parsed.data;
  }

  getCollection(collectionId: number): Collection | null {
    return this.collections.get(collectionId);
  }

  listCollections(creator?: AccountId): Collection[] {
    return this.collections.list(creator);
  }

  getCollectionsCount(): number {
    return this.collections.count();
  }

  getLatticeParameters(collectionId: number): LatticeParameters | null {
    return this.latticeParams.get(collectionId);
  }

  getNft(collectionId: number, tokenIndex: number): Token | null {
    return this.tokens.get({ collectionId, tokenIndex });
  }

  getNftOwner(collectionId: number, tokenIndex: number): AccountId | null {
    return this.tokens.get({ collectionId, tokenIndex })?.owner ?? null;
  }

  listCollectionTokens(collectionId: number): Token[] {
    return this.tokens.listByCollection(collectionId);
  }

  getListing(collectionId: number, tokenIndex: number): Listing | null {
    return this.listings.get({ collectionId, tokenIndex });
  }

  listListings(collectionId?: number): Listing[] {
    return this.listings.list(collectionId);
  }

  getOwnedNfts(account: AccountId): TokenId[] {
    return this.ownership.list(account);
  }

  getBalance(account: AccountId): bigint {
    return this.balances.balanceOf(account);
  }

  getPlatformConfig(): PlatformConfig {
    return this.settings.snapshot();
  }

  getHeight(): number {
    return this.height.current();
  }

  listActivity(query?: ActivityQuery): ActivityEntry[] {
    return this.activity.list(query);
  }

  getStats(): LedgerStats {
    return this.activity.stats();
  }

  auditInvariants(): InvariantViolation[] {
    return auditInvariants(this.db);
  }
}
