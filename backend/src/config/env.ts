import { z } from "zod";
import dotenv from "dotenv";
import path from "path";
import { fileURLToPath } from "url";
import { resolveDataFile } from "../utils/paths.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

dotenv.config({ path: path.resolve(__dirname, "../../../.env") });

const ConfigSchema = z.object({
  openaiApiKey: z.string().min(1).optional(),
  llmModel: z.string().default("gpt-4o-mini"),
  llmTimeoutMs: z.number().int().positive().default(10000),
  ordersCsvPath: z.string().default(resolveDataFile("orders.csv")),
  port: z.number().int().positive().default(3001),
  corsOrigin: z.string().default("http://localhost:5173"),
  maxMessageLength: z.number().int().positive().default(2000),
  rateLimitPerMinute: z.number().int().positive().default(60),
  logLevel: z
    .enum(["debug", "info", "warn", "error", "silent"])
    .default("info"),
  nodeEnv: z.enum(["development", "production", "test"]).default("development"),
});

export type Config = z.infer<typeof ConfigSchema>;

let config: Config | null = null;

function optionalInt(value: string | undefined): number | undefined {
  return value ? parseInt(value, 10) : undefined;
}

/**
 * Validates a raw settings object. Exposed separately from `getConfig` so
 * callers can build a config without touching `process.env`.
 */
export function parseConfig(raw: Record<string, unknown>): Config {
  return ConfigSchema.parse(raw);
}

export function getConfig(): Config {
  if (config) {
    return config;
  }

  const rawConfig = {
    // An empty OPENAI_API_KEY= line means "not configured"
    openaiApiKey: process.env.OPENAI_API_KEY || undefined,
    llmModel: process.env.LLM_MODEL,
    llmTimeoutMs: optionalInt(process.env.LLM_TIMEOUT_MS),
    ordersCsvPath: process.env.ORDERS_CSV_PATH,
    port: optionalInt(process.env.PORT),
    corsOrigin: process.env.CORS_ORIGIN,
    maxMessageLength: optionalInt(process.env.MAX_MESSAGE_LENGTH),
    rateLimitPerMinute: optionalInt(process.env.RATE_LIMIT_PER_MINUTE),
    logLevel: process.env.LOG_LEVEL,
    nodeEnv: process.env.NODE_ENV,
  };

  config = parseConfig(rawConfig);
  return config;
}
