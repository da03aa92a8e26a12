import { env } from "node:process";
import pino from "pino";
import { StatsD } from "hot-shots";
import { getConfig } from "../config/index.js";
import { createLoggerConfig } from "./logger-config.js";

/**
 * Shared Pino logger
 */
export const log = pino(createLoggerConfig(env.LOG_LEVEL || "info"));

export type TelemetryLeaf = string | number | boolean | null | undefined;
export type Event = Record<string, TelemetryLeaf | TelemetryLeaf[]>;

/**
 * Test sink for capturing telemetry events in tests
 * Only usable when NODE_ENV=test or under Vitest
 */
let testSink: ((eventName: string, data: Event) => void) | null = null;

export function setTestSink(sink: ((eventName: string, data: Event) => void) | null): void {
  const isTestEnv = env.NODE_ENV === "test" || Boolean(env.VITEST);
  if (!isTestEnv) {
    throw new Error("setTestSink() can only be used in test environment");
  }
  testSink = sink;
}

/**
 * Frozen telemetry event names
 */
export const TelemetryEvents = {
  OutputCheckPassed: "output_def.check.passed",
  OutputCheckFailed: "output_def.check.failed",
} as const;

export type TelemetryEvent = (typeof TelemetryEvents)[keyof typeof TelemetryEvents];

/**
 * All valid event names
 */
export const VALID_EVENT_NAMES: Set<string> = new Set(Object.values(TelemetryEvents));

/**
 * StatsD client, created on first use when STATSD_HOST is set
 */
let statsdClient: StatsD | null | undefined;

function getStatsd(): StatsD | null {
  if (statsdClient !== undefined) {
    return statsdClient;
  }
  const { statsdHost, statsdPort, prefix } = getConfig().metrics;
  if (!statsdHost) {
    statsdClient = null;
    return statsdClient;
  }
  statsdClient = new StatsD({
    host: statsdHost,
    port: statsdPort,
    prefix,
    errorHandler: (error: Error) => {
      log.error({ error }, "StatsD error");
    },
  });
  log.info({ statsd_host: statsdHost }, "StatsD client initialized");
  return statsdClient;
}

/**
 * Emit telemetry event (logs + StatsD counter)
 *
 * Passing checks are logged at debug level, failures at warn.
 */
export function emit(event: TelemetryEvent, data: Event): void {
  if (testSink) {
    testSink(event, data);
  }

  switch (event) {
    case TelemetryEvents.OutputCheckPassed:
      log.debug({ event, ...data });
      break;
    case TelemetryEvents.OutputCheckFailed:
      log.warn({ event, ...data });
      break;
  }

  const statsd = getStatsd();
  if (statsd) {
    statsd.increment(event, 1, {
      component: String(data.component ?? "unknown"),
    });
  }
}
