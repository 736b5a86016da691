import type { NextFunction, Request, Response } from "express";
import { Router } from "express";
import { z } from "zod";
import type { LatticeLedger } from "@lattice-market/ledger";

import type { AppConfig } from "../config";
import { replyWithKnownError } from "./errors";

/** Decimal strings carry any size; JSON numbers only up to the safe-integer range. */
const amountSchema = z
  .union([
    z.string().trim().regex(/^\d+$/, "Expected a non-negative integer"),
    z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER, "Send amounts above 2^53 - 1 as decimal strings"),
  ])
  .transform((value) => BigInt(value));

const idSchema = z.coerce.number().int().positive();

const collectionParamsSchema = z.object({
  collectionId: idSchema,
});
const tokenParamsSchema = z.object({
  collectionId: idSchema,
  tokenIndex: idSchema,
});
const accountParamsSchema = z.object({
  account: z.string().trim().min(1),
});

const createCollectionSchema = z.object({
  name: z.string(),
  description: z.string().default(""),
  maxSupply: z.number(),
  mintPrice: amountSchema.default("0"),
  royaltyBps: z.number(),
  metadataLocator: z.string(),
  dimensions: z.number(),
  nodeCount: z.number(),
  connections: z
    .array(z.object({ from: z.number(), to: z.number(), weight: z.number() }))
    .default([]),
  colorScheme: z.string().default(""),
  transformations: z.array(z.string()).default([]),
  extraParams: z.array(z.object({ key: z.string(), value: z.string() })).default([]),
});
const statusSchema = z.object({ isOpen: z.boolean() });
const mintSchema = z.object({ seed: amountSchema });
const transferSchema = z.object({ recipient: z.string() });
const listingSchema = z.object({ price: amountSchema });
const platformFeeSchema = z.object({ feeBps: z.number() });
const adminSchema = z.object({ admin: z.string() });
const depositSchema = z.object({ amount: amountSchema });

const optionalIdSchema = z.preprocess(
  (value) => (typeof value === "string" && value.trim().length === 0 ? undefined : value),
  idSchema.optional(),
);

function readStringQueryValue(input: unknown): string | undefined {
  if (typeof input === "string") {
    const value = input.trim();
    return value.length > 0 ? value : undefined;
  }

  if (Array.isArray(input)) {
    return readStringQueryValue(input[0]);
  }

  return undefined;
}

type Handler = (req: Request, res: Response) => void;
type CallerHandler = (caller: string, req: Request, res: Response) => void;

export function createHttpRouter(ledger: LatticeLedger, config: AppConfig): Router {
  const router = Router();

  const activityQuerySchema = z.object({
    collectionId: optionalIdSchema,
    tokenIndex: optionalIdSchema,
    account: z.string().trim().min(1).optional(),
    limit: z.coerce.number().int().positive().max(500).default(config.ACTIVITY_DEFAULT_LIMIT),
  });

  function handle(handler: Handler) {
    return (req: Request, res: Response, next: NextFunction) => {
      try {
        handler(req, res);
      } catch (error) {
        if (!replyWithKnownError(res, error)) {
          next(error);
        }
      }
    };
  }

  function resolveCallerOrReply(req: Request, res: Response): string | null {
    const header = req.headers.authorization ?? "";
    const match = /^Bearer\s+(\S+)$/i.exec(header.trim());
    const account = match ? config.ACCOUNT_TOKENS.get(match[1]) : undefined;
    if (!account) {
      res.status(401).json({ message: "Missing or unknown bearer token" });
      return null;
    }
    return account;
  }

  function withCaller(handler: CallerHandler) {
    return handle((req, res) => {
      const caller = resolveCallerOrReply(req, res);
      if (!caller) {
        return;
      }
      handler(caller, req, res);
    });
  }

  function notFound(res: Response, message: string, code: string): void {
    res.status(404).json({ message, code });
  }

  router.post(
    "/collections",
    withCaller((caller, req, res) => {
      const body = createCollectionSchema.parse(req.body);
      const collectionId = ledger.createCollection(
        {
          name: body.name,
          description: body.description,
          maxSupply: body.maxSupply,
          mintPrice: body.mintPrice,
          royaltyBps: body.royaltyBps,
          metadataLocator: body.metadataLocator,
          lattice: {
            dimensions: body.dimensions,
            nodeCount: body.nodeCount,
            connections: body.connections,
            colorScheme: body.colorScheme,
            transformations: body.transformations,
            extraParams: body.extraParams,
          },
        },
        caller,
      );
      res.status(201).json({ collectionId });
    }),
  );

  router.get(
    "/collections",
    handle((req, res) => {
      res.json(ledger.listCollections(readStringQueryValue(req.query.creator)));
    }),
  );

  router.get(
    "/collections/count",
    handle((_req, res) => {
      res.json({ count: ledger.getCollectionsCount() });
    }),
  );

  router.get(
    "/collections/:collectionId",
    handle((req, res) => {
      const { collectionId } = collectionParamsSchema.parse(req.params);
      const collection = ledger.getCollection(collectionId);
      if (!collection) {
        notFound(res, "Collection not found", "CollectionNotFound");
        return;
      }
      res.json(collection);
    }),
  );

  router.get(
    "/collections/:collectionId/lattice",
    handle((req, res) => {
      const { collectionId } = collectionParamsSchema.parse(req.params);
      const params = ledger.getLatticeParameters(collectionId);
      if (!params) {
        notFound(res, "Collection not found", "CollectionNotFound");
        return;
      }
      res.json(params);
    }),
  );

  router.patch(
    "/collections/:collectionId/status",
    withCaller((caller, req, res) => {
      const { collectionId } = collectionParamsSchema.parse(req.params);
      const { isOpen } = statusSchema.parse(req.body);
      ledger.setCollectionStatus(collectionId, isOpen, caller);
      res.json({ success: true });
    }),
  );

  router.post(
    "/collections/:collectionId/mint",
    withCaller((caller, req, res) => {
      const { collectionId } = collectionParamsSchema.parse(req.params);
      const { seed } = mintSchema.parse(req.body);
      res.status(201).json(ledger.mint(collectionId, seed, caller));
    }),
  );

  router.get(
    "/collections/:collectionId/tokens",
    handle((req, res) => {
      const { collectionId } = collectionParamsSchema.parse(req.params);
      res.json(ledger.listCollectionTokens(collectionId));
    }),
  );

  router.get(
    "/collections/:collectionId/tokens/:tokenIndex",
    handle((req, res) => {
      const { collectionId, tokenIndex } = tokenParamsSchema.parse(req.params);
      const token = ledger.getNft(collectionId, tokenIndex);
      if (!token) {
        notFound(res, "NFT not found", "NftNotFound");
        return;
      }
      res.json(token);
    }),
  );

  router.get(
    "/collections/:collectionId/tokens/:tokenIndex/owner",
    handle((req, res) => {
      const { collectionId, tokenIndex } = tokenParamsSchema.parse(req.params);
      const owner = ledger.getNftOwner(collectionId, tokenIndex);
      if (!owner) {
        notFound(res, "NFT not found", "NftNotFound");
        return;
      }
      res.json({ owner });
    }),
  );

  router.post(
    "/collections/:collectionId/tokens/:tokenIndex/transfer",
    withCaller((caller, req, res) => {
      const { collectionId, tokenIndex } = tokenParamsSchema.parse(req.params);
      const { recipient } = transferSchema.parse(req.body);
      ledger.transferNft(collectionId, tokenIndex, recipient, caller);
      res.json({ success: true });
    }),
  );

  router.get(
    "/collections/:collectionId/tokens/:tokenIndex/listing",
    handle((req, res) => {
      const { collectionId, tokenIndex } = tokenParamsSchema.parse(req.params);
      const listing = ledger.getListing(collectionId, tokenIndex);
      if (!listing) {
        notFound(res, "Listing not found", "ListingNotFound");
        return;
      }
      res.json(listing);
    }),
  );

  router.put(
    "/collections/:collectionId/tokens/:tokenIndex/listing",
    withCaller((caller, req, res) => {
      const { collectionId, tokenIndex } = tokenParamsSchema.parse(req.params);
      const { price } = listingSchema.parse(req.body);
      res.status(201).json(ledger.listForSale(collectionId, tokenIndex, price, caller));
    }),
  );

  router.delete(
    "/collections/:collectionId/tokens/:tokenIndex/listing",
    withCaller((caller, req, res) => {
      const { collectionId, tokenIndex } = tokenParamsSchema.parse(req.params);
      ledger.cancelListing(collectionId, tokenIndex, caller);
      res.json({ success: true });
    }),
  );

  router.post(
    "/collections/:collectionId/tokens/:tokenIndex/buy",
    withCaller((caller, req, res) => {
      const { collectionId, tokenIndex } = tokenParamsSchema.parse(req.params);
      res.json(ledger.buyNft(collectionId, tokenIndex, caller));
    }),
  );

  router.get(
    "/listings",
    handle((req, res) => {
      const collectionId = optionalIdSchema.parse(req.query.collectionId);
      res.json(ledger.listListings(collectionId));
    }),
  );

  router.get(
    "/accounts/:account/tokens",
    handle((req, res) => {
      const { account } = accountParamsSchema.parse(req.params);
      res.json(ledger.getOwnedNfts(account));
    }),
  );

  router.get(
    "/accounts/:account/balance",
    handle((req, res) => {
      const { account } = accountParamsSchema.parse(req.params);
      res.json({ account, balance: ledger.getBalance(account) });
    }),
  );

  router.post(
    "/accounts/:account/deposit",
    withCaller((caller, req, res) => {
      const { account } = accountParamsSchema.parse(req.params);
      const { amount } = depositSchema.parse(req.body);
      res.json({ account, balance: ledger.deposit(account, amount, caller) });
    }),
  );

  router.get(
    "/platform",
    handle((_req, res) => {
      res.json({ ...ledger.getPlatformConfig(), height: ledger.getHeight() });
    }),
  );

  router.put(
    "/platform/fee",
    withCaller((caller, req, res) => {
      const { feeBps } = platformFeeSchema.parse(req.body);
      ledger.setPlatformFeeBps(feeBps, caller);
      res.json({ success: true });
    }),
  );

  router.put(
    "/platform/admin",
    withCaller((caller, req, res) => {
      const { admin } = adminSchema.parse(req.body);
      ledger.setAdmin(admin, caller);
      res.json({ success: true });
    }),
  );

  router.get(
    "/activity",
    handle((req, res) => {
      const query = activityQuerySchema.parse(req.query);
      res.json(ledger.listActivity(query));
    }),
  );

  router.get(
    "/stats",
    handle((_req, res) => {
      res.json(ledger.getStats());
    }),
  );

  router.get(
    "/audit",
    handle((_req, res) => {
      const violations = ledger.auditInvariants();
      res.json({ consistent: violations.length === 0, violations });
    }),
  );

  return router;
}
