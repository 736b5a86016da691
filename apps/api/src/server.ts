import pino from "pino";
import { LatticeLedger } from "@lattice-market/ledger";

import { createApp } from "./app";
import { loadConfig } from "./config";

async function main(): Promise<void> {
  const config = loadConfig();
  const log = pino({ name: "lattice-market-api", level: config.LOG_LEVEL });

  const ledger = new LatticeLedger({
    dbFile: config.DB_FILE,
    deployer: config.LEDGER_DEPLOYER,
    maxOwnedPerAccount: config.LEDGER_MAX_OWNED_PER_ACCOUNT,
    logger: log.child({ name: "lattice-ledger" }),
  });

  const app = createApp(ledger, config, log);
  const server = app.listen(config.API_PORT, config.API_HOST, () => {
    log.info(
      {
        host: config.API_HOST,
        port: config.API_PORT,
        dbFile: config.DB_FILE,
        admin: ledger.getPlatformConfig().admin,
        height: ledger.getHeight(),
      },
      "API server started",
    );
  });

  const shutdown = () => {
    log.info("Shutting down...");
    server.close(() => {
      ledger.close();
      process.exit(0);
    });
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((error: unknown) => {
  pino({ name: "lattice-market-api" }).fatal({ err: error }, "API server failed to start");
  process.exit(1);
});
