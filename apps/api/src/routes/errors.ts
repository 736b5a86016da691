import type { Response } from "express";
import { isLedgerError, type LedgerErrorCode } from "@lattice-market/ledger";
import { ZodError } from "zod";

const LEDGER_ERROR_STATUS: Record<LedgerErrorCode, number> = {
  NotAuthorized: 403,
  CollectionNotFound: 404,
  NftNotFound: 404,
  ListingNotFound: 404,
  CollectionClosed: 409,
  CollectionLimitReached: 409,
  ListingExists: 409,
  InsufficientPayment: 402,
  NotOwner: 403,
  InvalidParameters: 400,
  InvalidRoyalty: 400,
};

export function ledgerErrorStatus(code: LedgerErrorCode): number {
  return LEDGER_ERROR_STATUS[code];
}

/** Replies for rejections the caller can act on; returns false for anything else. */
export function replyWithKnownError(res: Response, error: unknown): boolean {
  if (isLedgerError(error)) {
    res.status(ledgerErrorStatus(error.code)).json({ message: error.message, code: error.code });
    return true;
  }

  if (error instanceof ZodError) {
    res.status(400).json({ message: "Invalid request", error: error.flatten() });
    return true;
  }

  return false;
}
