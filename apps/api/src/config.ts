import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const emptyStringToUndefined = (value: unknown): unknown => {
  if (typeof value !== "string") {
    return value;
  }

  const normalized = value.trim();
  return normalized.length > 0 ? normalized : undefined;
};

/**
 * Parses `token:account` pairs separated by commas. Tokens must be unique; several
 * tokens may resolve to the same account.
 */
export function parseAccountTokens(input: string): Map<string, string> {
  const tokens = new Map<string, string>();
  const entries = input
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);

  for (const entry of entries) {
    const separator = entry.indexOf(":");
    const token = separator > 0 ? entry.slice(0, separator).trim() : "";
    const account = separator > 0 ? entry.slice(separator + 1).trim() : "";
    if (!token || !account) {
      throw new Error(`Invalid API_ACCOUNT_TOKENS entry '${entry}': expected token:account`);
    }
    if (tokens.has(token)) {
      throw new Error("Duplicate token in API_ACCOUNT_TOKENS");
    }
    tokens.set(token, account);
  }

  if (tokens.size === 0) {
    throw new Error("API_ACCOUNT_TOKENS must configure at least one token:account pair");
  }

  return tokens;
}

const configSchema = z.object({
  API_HOST: z.string().default("0.0.0.0"),
  API_PORT: z.coerce.number().int().positive().default(8080),
  API_CORS_ORIGIN: z.string().default("*"),
  API_JSON_LIMIT: z.string().default("1mb"),
  DB_FILE: z.string().default("data/lattice-market.db"),
  LEDGER_DEPLOYER: z.preprocess(emptyStringToUndefined, z.string().max(128)),
  LEDGER_MAX_OWNED_PER_ACCOUNT: z.coerce.number().int().positive().default(1000),
  API_ACCOUNT_TOKENS: z.preprocess(emptyStringToUndefined, z.string()),
  ACTIVITY_DEFAULT_LIMIT: z.coerce.number().int().positive().max(500).default(100),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
});

type RawAppConfig = z.infer<typeof configSchema>;

export interface AppConfig extends Omit<RawAppConfig, "API_ACCOUNT_TOKENS"> {
  ACCOUNT_TOKENS: Map<string, string>;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const { API_ACCOUNT_TOKENS, ...parsed } = configSchema.parse(env);
  return {
    ...parsed,
    ACCOUNT_TOKENS: parseAccountTokens(API_ACCOUNT_TOKENS),
  };
}
