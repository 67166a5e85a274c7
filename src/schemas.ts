import { constants } from "node:os";
import { z } from "zod";
import { ValidationError } from "./errors.js";
import { isLogLevel, type LogLevel } from "./utils/logger.js";

const UNIT_MS: Record<string, number> = {
  ms: 1,
  s: 1_000,
  m: 60_000,
  h: 3_600_000,
};

/**
 * Parse a duration such as `500ms`, `15s`, `2m` or `1h` into milliseconds.
 * A bare integer counts as seconds. Returns `undefined` when unparseable.
 */
export function parseDuration(input: string): number | undefined {
  const match = /^(\d+)(ms|s|m|h)?$/.exec(input.trim());
  if (!match) return undefined;
  return Number(match[1]) * UNIT_MS[match[2] ?? "s"];
}

export function isSignalName(value: string): value is NodeJS.Signals {
  return Object.prototype.hasOwnProperty.call(constants.signals, value);
}

export const TimeoutMsSchema = z
  .number({ invalid_type_error: "must be a number of milliseconds" })
  .int("must be a whole number of milliseconds")
  .nonnegative("must not be negative")
  .finite();

export const DurationSchema = z.string().transform((value, ctx) => {
  const ms = parseDuration(value);
  if (ms === undefined) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: "must be a duration such as 500ms, 15s or 2m, or an integer representing seconds",
    });
    return z.NEVER;
  }
  return ms;
});

export const SignalListSchema = z.string().transform((value, ctx) => {
  const names = value
    .split(",")
    .map((s) => s.trim().toUpperCase())
    .filter((s) => s.length > 0);
  const signals: NodeJS.Signals[] = [];
  for (const name of names) {
    if (!isSignalName(name)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown signal "${name}"` });
      return z.NEVER;
    }
    signals.push(name);
  }
  if (signals.length === 0) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "must name at least one signal" });
    return z.NEVER;
  }
  return signals;
});

export const LogLevelSchema = z.string().transform((value, ctx): LogLevel => {
  const level = value.toLowerCase();
  if (!isLogLevel(level)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "must be one of debug, info, warn, error" });
    return z.NEVER;
  }
  return level;
});

export const EnvConfigSchema = z.object({
  SHUTDOWN_TIMEOUT: DurationSchema.optional(),
  CLEANUP_TIMEOUT: DurationSchema.optional(),
  STARTUP_TIMEOUT: DurationSchema.optional(),
  SHUTDOWN_SIGNALS: SignalListSchema.optional(),
  LOG_LEVEL: LogLevelSchema.optional(),
});

export type EnvConfig = z.infer<typeof EnvConfigSchema>;

/** Parse with a Zod schema, throwing a `ValidationError` that names `label` on failure. */
export function parseOrThrow<T extends z.ZodTypeAny>(schema: T, data: unknown, label: string): z.output<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    const msg = result.error.issues
      .map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
      .join("; ");
    throw new ValidationError("VALIDATION_FAILED", `Invalid ${label}: ${msg}`);
  }
  return result.data;
}
