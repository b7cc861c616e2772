import { z } from "zod";
import dotenv from "dotenv";
import { GuardrailPolicy } from "./types.js";

dotenv.config();

const EnvSchema = z.object({
  CHANGE_BUDGET_MINUTES: z.coerce.number().int().nonnegative().default(240),
  HYSTERESIS_THRESHOLD_DB: z.coerce.number().int().nonnegative().default(2),
  HISTORY_ROWS: z.coerce.number().int().positive().default(50),

  NETWORK_CONFIG_PATH: z.string().default("./config/network.config.json"),

  PORT: z.coerce.number().int().positive().default(3000)
});

export type AppConfig = z.infer<typeof EnvSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    // eslint-disable-next-line no-console
    console.error(parsed.error.format());
    throw new Error("Invalid environment configuration");
  }
  return parsed.data;
}

export function policyFromConfig(cfg: AppConfig): GuardrailPolicy {
  return {
    change_budget_minutes: cfg.CHANGE_BUDGET_MINUTES,
    hysteresis_threshold_db: cfg.HYSTERESIS_THRESHOLD_DB
  };
}
