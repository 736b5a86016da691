export type LedgerErrorCode =
  | "NotAuthorized"
  | "CollectionNotFound"
  | "CollectionClosed"
  | "CollectionLimitReached"
  | "InvalidParameters"
  | "InvalidRoyalty"
  | "InsufficientPayment"
  | "NftNotFound"
  | "NotOwner"
  | "ListingExists"
  | "ListingNotFound";

const DEFAULT_MESSAGES: Record<LedgerErrorCode, string> = {
  NotAuthorized: "Caller is not authorized for this operation",
  CollectionNotFound: "Collection not found",
  CollectionClosed: "Collection is closed for minting",
  CollectionLimitReached: "Collection has reached its maximum supply",
  InvalidParameters: "Invalid parameters",
  InvalidRoyalty: "Royalty must be between 0 and 3000 bps",
  InsufficientPayment: "Insufficient balance for payment",
  NftNotFound: "NFT not found",
  NotOwner: "Caller does not own this NFT",
  ListingExists: "NFT is already listed",
  ListingNotFound: "Listing not found",
};

/**
 * Rejection of a single ledger call. Thrown inside a transaction, it rolls the
 * whole operation back.
 */
export class LedgerError extends Error {
  readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message?: string) {
    super(message ?? DEFAULT_MESSAGES[code]);
    this.name = "LedgerError";
    this.code = code;
  }
}

export function isLedgerError(error: unknown): error is LedgerError {
  return error instanceof LedgerError;
}
