import { z } from "zod";

import { LedgerError } from "./errors";
import { MAX_ROYALTY_BPS } from "./fees";
import type { AccountId, CollectionCreateRequest } from "./types";

export const MAX_CONNECTIONS = 512;
export const MAX_TRANSFORMATIONS = 32;
export const MAX_EXTRA_PARAMS = 32;
export const MAX_SHORT_TEXT = 256;
export const MAX_NAME_LENGTH = 100;
export const MAX_DESCRIPTION_LENGTH = 1000;
export const MAX_LOCATOR_LENGTH = 512;
export const MAX_ACCOUNT_LENGTH = 128;
export const MAX_SEED = 2n ** 64n - 1n;

const shortText = z.string().max(MAX_SHORT_TEXT);

export const latticeParametersSchema = z.object({
  dimensions: z.number().int().min(1),
  nodeCount: z.number().int().min(2),
  connections: z
    .array(
      z.object({
        from: z.number().int().nonnegative(),
        to: z.number().int().nonnegative(),
        weight: z.number().finite(),
      }),
    )
    .max(MAX_CONNECTIONS),
  colorScheme: shortText,
  transformations: z.array(shortText).max(MAX_TRANSFORMATIONS),
  extraParams: z
    .array(
      z.object({
        key: shortText.min(1),
        value: shortText,
      }),
    )
    .max(MAX_EXTRA_PARAMS),
});

export const collectionCreateSchema = z.object({
  name: z.string().trim().min(1).max(MAX_NAME_LENGTH),
  description: z.string().max(MAX_DESCRIPTION_LENGTH),
  maxSupply: z.number().int().positive().max(Number.MAX_SAFE_INTEGER),
  mintPrice: z.bigint().nonnegative(),
  royaltyBps: z.number().int().min(0).max(MAX_ROYALTY_BPS),
  metadataLocator: z.string().max(MAX_LOCATOR_LENGTH),
  lattice: latticeParametersSchema,
});

export const accountSchema = z.string().trim().min(1).max(MAX_ACCOUNT_LENGTH);

function describeIssue(issue: z.ZodIssue): string {
  const field = issue.path.join(".");
  return field ? `${field}: ${issue.message}` : issue.message;
}

/**
 * Royalty problems surface as `InvalidRoyalty` unless the supply itself is also
 * invalid; every other problem is `InvalidParameters`.
 */
export function parseCollectionCreateRequest(input: CollectionCreateRequest): CollectionCreateRequest {
  const parsed = collectionCreateSchema.safeParse(input);
  if (parsed.success) {
    return parsed.data;
  }

  const issues = parsed.error.issues;
  const supplyIssue = issues.find((issue) => issue.path[0] === "maxSupply");
  const royaltyIssue = issues.find((issue) => issue.path[0] === "royaltyBps");
  if (!supplyIssue && royaltyIssue) {
    throw new LedgerError("InvalidRoyalty");
  }

  throw new LedgerError("InvalidParameters", describeIssue(supplyIssue ?? issues[0]));
}

export function parseAccount(value: AccountId, label = "account"): AccountId {
  const parsed = accountSchema.safeParse(value);
  if (!parsed.success) {
    throw new LedgerError("InvalidParameters", `Invalid ${label}`);
  }
  return parsed.data;
}

export function assertSeed(seed: bigint): void {
  if (seed < 0n || seed > MAX_SEED) {
    throw new LedgerError("InvalidParameters", "Seed must be an unsigned 64-bit integer");
  }
}
