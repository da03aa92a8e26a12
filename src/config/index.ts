/**
 * Centralized Configuration Module
 *
 * Type-safe, validated access to environment variables. Invalid
 * configuration fails fast on first access.
 */

import { z } from "zod";

/**
 * Custom boolean coercion that handles string "false" and "true"
 */
const booleanString = z
  .union([z.boolean(), z.string(), z.number()])
  .transform((val) => {
    if (typeof val === "boolean") return val;
    if (typeof val === "number") return val !== 0;
    const lower = val.toLowerCase().trim();
    if (lower === "false" || lower === "0" || lower === "") return false;
    if (lower === "true" || lower === "1") return true;
    return Boolean(val); // fallback
  });

/**
 * Configuration Schema
 */
const ConfigSchema = z.object({
  // Output checking around model / fitting calls
  outputCheck: z.object({
    logFailures: booleanString.default(true), // log before rethrowing
  }),

  // StatsD metrics (off unless a host is given)
  metrics: z.object({
    statsdHost: z.string().min(1).optional(),
    statsdPort: z.coerce.number().int().positive().default(8125),
    prefix: z.string().default("output_def."),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Parse and validate configuration from environment variables
 */
function parseConfig(): Config {
  const env = process.env;

  const rawConfig = {
    outputCheck: {
      logFailures: env.OUTPUT_CHECK_LOG_FAILURES,
    },
    metrics: {
      statsdHost: env.STATSD_HOST || undefined,
      statsdPort: env.STATSD_PORT,
      prefix: env.STATSD_PREFIX,
    },
  };

  const result = ConfigSchema.safeParse(rawConfig);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration. Please check environment variables. ${issues}`);
  }
  return result.data;
}

/**
 * Lazy-initialized configuration
 *
 * Defers parsing until first property access, so tests can set
 * environment variables before the config is parsed.
 *
 * ```
 * import { config } from "./config/index.js";
 * const logFailures = config.outputCheck.logFailures;
 * ```
 */
let _cachedConfig: Config | null = null;

export function getConfig(): Config {
  if (_cachedConfig === null) {
    _cachedConfig = parseConfig();
  }
  return _cachedConfig;
}

export const config = new Proxy({} as Config, {
  get(_target, prop) {
    return Reflect.get(getConfig(), prop);
  },

  ownKeys(_target) {
    return Reflect.ownKeys(getConfig());
  },

  getOwnPropertyDescriptor(_target, prop) {
    return Reflect.getOwnPropertyDescriptor(getConfig(), prop);
  },

  has(_target, prop) {
    return prop in getConfig();
  },
});

/**
 * Reset cached config (for testing only)
 */
export function _resetConfigCache(): void {
  _cachedConfig = null;
}
