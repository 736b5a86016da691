import pino from "pino";

import { isLedgerError, type LedgerErrorCode } from "../src/errors";
import { LatticeLedger, type LatticeLedgerOptions } from "../src/ledger";
import type { CollectionCreateRequest } from "../src/types";

export const ADMIN = "admin";
export const CREATOR = "creator";
export const ALICE = "alice";
export const BOB = "bob";

export function createTestLedger(options: Partial<LatticeLedgerOptions> = {}): LatticeLedger {
  return new LatticeLedger({
    deployer: ADMIN,
    logger: pino({ level: "silent" }),
    ...options,
  });
}

export function collectionRequest(overrides: Partial<CollectionCreateRequest> = {}): CollectionCreateRequest {
  return {
    name: "Tesseract Study",
    description: "Four-dimensional lattices",
    maxSupply: 3,
    mintPrice: 0n,
    royaltyBps: 500,
    metadataLocator: "https://meta.example.test/tesseract",
    lattice: {
      dimensions: 4,
      nodeCount: 16,
      connections: [
        { from: 0, to: 1, weight: 1 },
        { from: 1, to: 2, weight: 0.5 },
      ],
      colorScheme: "aurora",
      transformations: ["rotate-xw", "scale"],
      extraParams: [{ key: "symmetry", value: "octahedral" }],
    },
    ...overrides,
  };
}

/** Runs `action` and returns the ledger error code it threw, or null if it succeeded. */
export function ledgerErrorCode(action: () => unknown): LedgerErrorCode | null {
  try {
    action();
  } catch (error) {
    if (isLedgerError(error)) {
      return error.code;
    }
    throw error;
  }
  return null;
}
