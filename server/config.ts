import { z } from "zod";

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((v) => v === "true" || v === "1");

const configSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3001),
  DEPOT_NAME: z.string().min(1).default("Depot"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(60),
  SEED_NETWORK: booleanFlag.default("true"),
});

export interface ServerConfig {
  port: number;
  depot: string;
  logLevel: "debug" | "info" | "warn" | "error";
  rateLimitMax: number;
  seedNetwork: boolean;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = configSchema.parse(env);
  return {
    port: parsed.PORT,
    depot: parsed.DEPOT_NAME,
    logLevel: parsed.LOG_LEVEL,
    rateLimitMax: parsed.RATE_LIMIT_MAX,
    seedNetwork: parsed.SEED_NETWORK,
  };
}
