export type AccountId = string;

/** Basis points: integer parts of 10000. */
export type Bps = number;

export interface TokenId {
  collectionId: number;
  tokenIndex: number;
}

export interface Collection {
  id: number;
  creator: AccountId;
  name: string;
  description: string;
  maxSupply: number;
  currentSupply: number;
  mintPrice: bigint;
  royaltyBps: Bps;
  isOpen: boolean;
  createdAtHeight: number;
  metadataLocator: string;
}

export interface LatticeConnection {
  from: number;
  to: number;
  weight: number;
}

export interface LatticeExtraParam {
  key: string;
  value: string;
}

export interface LatticeParameters {
  collectionId: number;
  dimensions: number;
  nodeCount: number;
  connections: LatticeConnection[];
  colorScheme: string;
  transformations: string[];
  extraParams: LatticeExtraParam[];
}

export type LatticeParametersInput = Omit<LatticeParameters, "collectionId">;

export interface Token extends TokenId {
  owner: AccountId;
  seed: bigint;
  mintedAtHeight: number;
  metadataLocator: string;
}

export interface Listing extends TokenId {
  seller: AccountId;
  price: bigint;
  listedAtHeight: number;
}

export interface SettlementSplit {
  platformFee: bigint;
  royalty: bigint;
  sellerAmount: bigint;
}

export interface CollectionCreateRequest {
  name: string;
  description: string;
  maxSupply: number;
  mintPrice: bigint;
  royaltyBps: Bps;
  metadataLocator: string;
  lattice: LatticeParametersInput;
}

export interface PlatformConfig {
  admin: AccountId;
  platformFeeBps: Bps;
}

export type ActivityKind =
  | "collection_created"
  | "collection_status_changed"
  | "minted"
  | "transferred"
  | "listed"
  | "listing_cancelled"
  | "sold"
  | "platform_fee_changed"
  | "admin_changed"
  | "deposited";

export interface ActivityEntry {
  id: number;
  kind: ActivityKind;
  collectionId: number | null;
  tokenIndex: number | null;
  fromAccount: AccountId | null;
  toAccount: AccountId | null;
  amount: bigint | null;
  height: number;
}

export interface ActivityQuery {
  collectionId?: number;
  tokenIndex?: number;
  account?: AccountId;
  limit?: number;
}

export interface LedgerStats {
  collectionCount: number;
  tokenCount: number;
  listingCount: number;
  saleCount: number;
  volume: bigint;
}

export interface SaleReceipt extends TokenId {
  seller: AccountId;
  buyer: AccountId;
  price: bigint;
  split: SettlementSplit;
}

export function formatTokenId(tokenId: TokenId): string {
  return `${tokenId.collectionId}:${tokenId.tokenIndex}`;
}
