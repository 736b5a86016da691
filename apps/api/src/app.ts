import cors from "cors";
import express, { type NextFunction, type Request, type Response } from "express";
import type pino from "pino";
import pinoHttp from "pino-http";
import type { LatticeLedger } from "@lattice-market/ledger";

import type { AppConfig } from "./config";
import { createHttpRouter } from "./routes/http";

/** Amounts are bigints in the ledger and decimal strings on the wire. */
function jsonReplacer(_key: string, value: unknown): unknown {
  return typeof value === "bigint" ? value.toString() : value;
}

export function createApp(ledger: LatticeLedger, config: AppConfig, log: pino.Logger): express.Express {
  const app = express();
  app.set("json replacer", jsonReplacer);
  app.use(pinoHttp({ logger: log }));
  app.use(express.json({ limit: config.API_JSON_LIMIT }));
  app.use(
    cors({
      origin: config.API_CORS_ORIGIN,
    }),
  );

  app.use("/api", createHttpRouter(ledger, config));

  app.get("/", (_req, res) => {
    res.json({
      status: "lattice-market-api running",
      endpoints: "/api/*",
      height: ledger.getHeight(),
    });
  });

  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof SyntaxError && "body" in error) {
      res.status(400).json({ message: "Malformed JSON body" });
      return;
    }

    req.log.error({ err: error }, "Unhandled request error");
    res.status(500).json({ message: "Internal server error" });
  });

  return app;
}
