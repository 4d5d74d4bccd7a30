/**
 * Centralized configuration with runtime validation
 * All environment variables validated at startup via Zod
 */
import { z } from "zod";
import "dotenv/config";

const booleanFlag = z
  .enum(["true", "false", "1", "0", ""])
  .default("")
  .transform((v) => v === "true" || v === "1");

const configSchema = z.object({
  // Server
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.coerce.number().int().positive().default(8010),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace"]).default("info"),

  // SSL (optional, usually terminated by the reverse proxy)
  SSL_KEY_PATH: z.string().optional(),
  SSL_CERT_PATH: z.string().optional(),

  // Redis
  REDIS_HOST: z.string().default("127.0.0.1"),
  REDIS_PORT: z.coerce.number().default(6379),
  REDIS_USERNAME: z.string().optional(),
  REDIS_PASSWORD: z.string().optional(),
  REDIS_DB: z.coerce.number().default(4),
  REDIS_TLS: booleanFlag,

  // Identity tokens are signed by the hosting site with this shared secret
  JWT_SECRET: z.string().min(32),
  JWT_MAX_AGE_SECONDS: z.coerce.number().int().positive().default(86_400),

  // Classroom layout and limits
  CLASSROOM_ROWS: z.coerce.number().int().positive().max(50).default(5),
  CLASSROOM_COLUMNS: z.coerce.number().int().positive().max(50).default(6),
  MAX_PARTICIPANTS_PER_ROOM: z.coerce.number().int().positive().default(60),
  // ICE trickling is chatty, keep this well above human message rates
  RATE_LIMIT_MESSAGES_PER_MINUTE: z.coerce.number().int().positive().default(600),

  // Security
  CORS_ORIGINS: z
    .string()
    .default("http://localhost:8000")
    .transform((s) => new Set(s.split(",").map((o) => o.trim()).filter(Boolean))),
});

export type Config = z.infer<typeof configSchema>;

/** Validated configuration object - fails fast on invalid config */
export const config: Config = configSchema.parse(process.env);

export const isDev = config.NODE_ENV === "development";
export const isProd = config.NODE_ENV === "production";
