// server/config.ts
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { ConfigError } from "./shared/errors.js";

const DEFAULT_SYMBOLS_CSV = fileURLToPath(new URL("../data/stock_symbols.csv", import.meta.url));

const intFrom = (fallback: number, min: number, max: number) =>
  z.coerce.number().int().min(min).max(max).default(fallback);

const optionalKey = z
  .string()
  .transform((s) => s.replace(/["']/g, "").trim())
  .optional()
  .transform((s) => (s ? s : undefined));

const users = z
  .string()
  .default("")
  .transform((raw, ctx) => {
    const out = new Map<string, string>();
    for (const pair of raw.split(",").map((s) => s.trim()).filter(Boolean)) {
      const idx = pair.indexOf(":");
      if (idx <= 0 || idx === pair.length - 1) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `malformed user entry "${pair.slice(0, idx > 0 ? idx : pair.length)}"` });
        continue;
      }
      out.set(pair.slice(0, idx), pair.slice(idx + 1));
    }
    return out;
  });

const origins = z
  .string()
  .default("")
  .transform((raw) => raw.split(",").map((s) => s.trim().replace(/\/+$/, "")).filter(Boolean))
  .pipe(z.array(z.string().url()));

const EnvSchema = z.object({
  PORT: intFrom(8787, 1, 65535),
  SESSION_SECRET: z.string().min(16, "SESSION_SECRET must be at least 16 characters"),
  AUTH_USERS: users,
  ALPHAVANTAGE_API_KEY: z.string().trim().min(1, "ALPHAVANTAGE_API_KEY not set"),
  SERPER_API_KEY: optionalKey,
  GROQ_API_KEY: optionalKey,
  GROQ_MODEL: z.string().trim().min(1).default("llama-3.1-8b-instant"),
  NEWS_LIMIT: intFrom(10, 1, 50),
  HTTP_TIMEOUT_MS: intFrom(12_000, 1_000, 120_000),
  CORS_ORIGINS: origins,
  SYMBOLS_CSV: z.string().trim().min(1).default(DEFAULT_SYMBOLS_CSV),
});

export type Config = {
  port: number;
  sessionSecret: string;
  users: ReadonlyMap<string, string>;
  alphaVantageKey: string;
  serperKey?: string;
  groqKey?: string;
  groqModel: string;
  newsLimit: number;
  httpTimeoutMs: number;
  symbolsCsv: string;
  /** Browser origins allowed to make credentialed calls; empty means none. */
  corsOrigins: string[];
};

export function loadConfig(env: Record<string, string | undefined> = process.env): Config {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join(".") || "env"}: ${i.message}`));
  }
  const e = parsed.data;
  return {
    port: e.PORT,
    sessionSecret: e.SESSION_SECRET,
    users: e.AUTH_USERS,
    alphaVantageKey: e.ALPHAVANTAGE_API_KEY,
    serperKey: e.SERPER_API_KEY,
    groqKey: e.GROQ_API_KEY,
    groqModel: e.GROQ_MODEL,
    newsLimit: e.NEWS_LIMIT,
    httpTimeoutMs: e.HTTP_TIMEOUT_MS,
    symbolsCsv: e.SYMBOLS_CSV,
    corsOrigins: e.CORS_ORIGINS,
  };
}
