import { ConfigError } from "./errors.js";
import { EnvConfigSchema } from "./schemas.js";
import type { LogLevel } from "./utils/logger.js";

export type RepeatSignalPolicy = "ignore" | "force";

export type LifelineConfig = {
  shutdown: {
    timeoutMs: number;
    signals: NodeJS.Signals[];
    repeatSignal: RepeatSignalPolicy;
  };
  cleanup: {
    timeoutMs: number;
  };
  startup: {
    timeoutMs: number;
  };
  exitCodes: {
    success: number;
    failure: number;
    forced: number;
  };
  log: {
    level: LogLevel;
  };
};

export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends unknown[] ? T[P] : T[P] extends object ? DeepPartial<T[P]> : T[P];
};

const DEFAULTS: LifelineConfig = {
  shutdown: {
    timeoutMs: 15_000,
    signals: ["SIGINT", "SIGTERM"],
    repeatSignal: "ignore",
  },
  cleanup: {
    timeoutMs: 15_000,
  },
  startup: {
    timeoutMs: 15_000,
  },
  exitCodes: {
    success: 0,
    failure: 1,
    forced: 2,
  },
  log: {
    level: "info",
  },
};

export const DEFAULT_ENV_PREFIX = "LIFELINE";

let current: LifelineConfig = structuredClone(DEFAULTS);

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function deepMerge<T extends Record<string, unknown>>(base: T, overrides: DeepPartial<T>): T {
  const result = structuredClone(base);
  for (const key of Object.keys(overrides) as (keyof T)[]) {
    const val = overrides[key];
    const existing = result[key];
    if (isPlainObject(val) && isPlainObject(existing)) {
      (result as Record<string, unknown>)[key as string] = deepMerge<Record<string, unknown>>(existing, val);
    } else if (val !== undefined) {
      (result as Record<string, unknown>)[key as string] = val;
    }
  }
  return result;
}

/** Merge `overrides` into a copy of `base`. */
export function mergeConfig(base: LifelineConfig, overrides: DeepPartial<LifelineConfig>): LifelineConfig {
  return deepMerge(base, overrides);
}

/** Override config values. Merges deeply with defaults. */
export function configure(overrides: DeepPartial<LifelineConfig>): void {
  current = mergeConfig(DEFAULTS, overrides);
}

/** Reset config to defaults. */
export function resetConfig(): void {
  current = structuredClone(DEFAULTS);
}

/** Get the current config (read-only). */
export function getConfig(): Readonly<LifelineConfig> {
  return current;
}

/** The default config values (frozen). */
export const defaults: Readonly<LifelineConfig> = Object.freeze(structuredClone(DEFAULTS));

/**
 * Read `<prefix>_SHUTDOWN_TIMEOUT`, `<prefix>_CLEANUP_TIMEOUT`,
 * `<prefix>_STARTUP_TIMEOUT`, `<prefix>_SHUTDOWN_SIGNALS` and
 * `<prefix>_LOG_LEVEL` into config overrides. Unset variables are left out.
 */
export function loadEnvConfig(
  env: Record<string, string | undefined> = process.env,
  prefix = DEFAULT_ENV_PREFIX,
): DeepPartial<LifelineConfig> {
  const pick = (name: string): string | undefined => {
    const value = env[`${prefix}_${name}`];
    return value === undefined || value.trim() === "" ? undefined : value.trim();
  };

  const raw: Record<string, string | undefined> = {
    SHUTDOWN_TIMEOUT: pick("SHUTDOWN_TIMEOUT"),
    CLEANUP_TIMEOUT: pick("CLEANUP_TIMEOUT"),
    STARTUP_TIMEOUT: pick("STARTUP_TIMEOUT"),
    SHUTDOWN_SIGNALS: pick("SHUTDOWN_SIGNALS"),
    LOG_LEVEL: pick("LOG_LEVEL"),
  };

  const parsed = EnvConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const key = String(issue.path[0]);
    throw new ConfigError(`invalid ${prefix}_${key} value: ${raw[key]} - ${issue.message}`);
  }

  const vars = parsed.data;
  const overrides: DeepPartial<LifelineConfig> = {};
  if (vars.SHUTDOWN_TIMEOUT !== undefined || vars.SHUTDOWN_SIGNALS !== undefined) {
    overrides.shutdown = { timeoutMs: vars.SHUTDOWN_TIMEOUT, signals: vars.SHUTDOWN_SIGNALS };
  }
  if (vars.CLEANUP_TIMEOUT !== undefined) overrides.cleanup = { timeoutMs: vars.CLEANUP_TIMEOUT };
  if (vars.STARTUP_TIMEOUT !== undefined) overrides.startup = { timeoutMs: vars.STARTUP_TIMEOUT };
  if (vars.LOG_LEVEL !== undefined) overrides.log = { level: vars.LOG_LEVEL };
  return overrides;
}
