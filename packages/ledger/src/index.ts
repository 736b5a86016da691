export * from "./activity";
export * from "./audit";
export * from "./balances";
export * from "./collections";
export * from "./db";
export * from "./errors";
export * from "./fees";
export * from "./height";
export * from "./lattice-params";
export * from "./ledger";
export * from "./listings";
export * from "./marketplace";
export * from "./ownership";
export * from "./settings";
export * from "./tokens";
export * from "./types";
export * from "./validation";
