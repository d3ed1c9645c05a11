import { z } from "zod";
import { DEFAULT_LOOKBACK_DAYS, DEFAULT_SEED, DEFAULT_TOTAL_USERS } from "./funnel-tables";
import type { FunnelSynthConfig } from "./funnel-synth-engine";
import { LOG_LEVELS } from "./logger";
import type { LogLevel } from "./logger";

// `FUNNEL_SEED=` in a .env file means "unset", not zero.
function unsetIfBlank<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess(v => (typeof v === "string" && v.trim() === "" ? undefined : v), schema);
}

const EnvSchema = z.object({
  FUNNEL_USERS: unsetIfBlank(z.coerce.number().int().positive().default(DEFAULT_TOTAL_USERS)),
  FUNNEL_SEED: unsetIfBlank(z.coerce.number().int().nonnegative().default(DEFAULT_SEED)),
  FUNNEL_LOOKBACK_DAYS: unsetIfBlank(z.coerce.number().int().nonnegative().default(DEFAULT_LOOKBACK_DAYS)),
  FUNNEL_OUTPUT_DIR: unsetIfBlank(z.string().min(1).default("data")),
  FUNNEL_REFERENCE_TIME: unsetIfBlank(z.string().datetime({ offset: true }).optional()),
  LOG_LEVEL: unsetIfBlank(z.enum(LOG_LEVELS).default("info")),
});

export interface AppConfig {
  synth: FunnelSynthConfig;
  outputDir: string;
  logLevel: LogLevel;
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

/** Reads FUNNEL_* / LOG_LEVEL; anything unset takes the generator defaults. */
export function loadConfig(env: Record<string, string | undefined> = process.env, now: number = Date.now()): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map(i => `${i.path.join(".")}: ${i.message}`));
  }
  const cfg = parsed.data;
  return {
    synth: {
      totalUsers: cfg.FUNNEL_USERS,
      seed: cfg.FUNNEL_SEED,
      lookbackDays: cfg.FUNNEL_LOOKBACK_DAYS,
      referenceTime: cfg.FUNNEL_REFERENCE_TIME ? Date.parse(cfg.FUNNEL_REFERENCE_TIME) : now,
    },
    outputDir: cfg.FUNNEL_OUTPUT_DIR,
    logLevel: cfg.LOG_LEVEL,
  };
}

// CLI flags arrive as strings and win over the environment.
export interface ConfigOverrides {
  users?: string;
  seed?: string;
  lookbackDays?: string;
  out?: string;
  referenceTime?: string;
}

export function applyOverrides(base: Record<string, string | undefined>, flags: ConfigOverrides): Record<string, string | undefined> {
  return {
    ...base,
    ...(flags.users !== undefined ? { FUNNEL_USERS: flags.users } : {}),
    ...(flags.seed !== undefined ? { FUNNEL_SEED: flags.seed } : {}),
    ...(flags.lookbackDays !== undefined ? { FUNNEL_LOOKBACK_DAYS: flags.lookbackDays } : {}),
    ...(flags.out !== undefined ? { FUNNEL_OUTPUT_DIR: flags.out } : {}),
    ...(flags.referenceTime !== undefined ? { FUNNEL_REFERENCE_TIME: flags.referenceTime } : {}),
  };
}
