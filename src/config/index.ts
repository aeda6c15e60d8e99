import { z } from "zod";

const DURATION_MULTIPLIERS_MS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60_000,
  h: 3_600_000,
};

/** Longest delay a Node timer honours; anything larger fires after 1ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

/**
 * Parse a duration such as "500ms", "2s", "5m" or "1h" into milliseconds.
 */
export function parseDurationMs(raw: string): number {
  const value = raw.trim();
  const match = value.match(/^(\d+(?:\.\d+)?)(ms|s|m|h)$/i);
  if (!match) {
    throw new Error(`invalid duration "${value}"; expected format like 500ms, 2s, 5m, 1h`);
  }
  return Math.floor(Number(match[1]) * DURATION_MULTIPLIERS_MS[match[2].toLowerCase()]);
}

/** Unset and whitespace-only variables both fall back to the default. */
function blankToUndefined(value: unknown): unknown {
  return typeof value === "string" && value.trim() === "" ? undefined : value;
}

const requiredString = z.preprocess(blankToUndefined, z.string({ required_error: "is required but not set" }).trim());

function optionalString(fallback: string) {
  return z.preprocess(blankToUndefined, z.string().trim().default(fallback));
}

function duration(fallback: string) {
  return z.preprocess(blankToUndefined, z.string().default(fallback)).transform((raw, ctx) => {
    try {
      const ms = parseDurationMs(raw);
      if (ms <= 0) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: "must be greater than zero" });
        return z.NEVER;
      }
      if (ms > MAX_TIMER_DELAY_MS) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `must not exceed ${MAX_TIMER_DELAY_MS}ms (about 596h)` });
        return z.NEVER;
      }
      return ms;
    } catch (err) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: err instanceof Error ? err.message : String(err) });
      return z.NEVER;
    }
  });
}

function flag(fallback: boolean) {
  return z
    .preprocess(
      (value) => {
        const v = blankToUndefined(value);
        return typeof v === "string" ? v.trim().toLowerCase() : v;
      },
      z.enum(["1", "0", "true", "false", "yes", "no", "on", "off"]).default(fallback ? "true" : "false"),
    )
    .transform((raw) => ["1", "true", "yes", "on"].includes(raw));
}

function integer(fallback: number, min: number, max = Number.MAX_SAFE_INTEGER) {
  return z.preprocess(blankToUndefined, z.coerce.number().int().min(min).max(max).default(fallback));
}

export const configSchema = z.object({
  nodeEnv: z.preprocess(blankToUndefined, z.enum(["development", "production", "test"]).default("production")),
  logLevel: z.preprocess(blankToUndefined, z.enum(["error", "warn", "info", "debug"]).default("info")),

  /** Orchestrator connection and the proxy job being watched. */
  nomad: z.object({
    address: z.preprocess(blankToUndefined, z.string().url().default("http://localhost:4646")),
    token: requiredString,
    namespace: optionalString("default"),
    jobName: optionalString("ingress"),
  }),

  /** DNS provider credentials. */
  cloudflare: z.object({
    apiToken: requiredString,
    zoneId: requiredString,
  }),

  /** The hostname whose address records are managed. */
  dns: z.object({
    recordName: requiredString,
    /** 1 lets the provider pick ("automatic"). */
    ttl: integer(1, 0),
    proxied: flag(false),
  }),

  controller: z.object({
    syncIntervalMs: duration("5m"),
    debounceMs: duration("2s"),
    queueCapacity: integer(32, 1),
    /** Consecutive event stream failures tolerated before the controller gives up. */
    watchMaxFailures: integer(1, 1),
  }),

  metricsPort: integer(8080, 1, 65535),
  sentryDsn: z.preprocess(blankToUndefined, z.string().url().optional()),
});

export type Config = z.infer<typeof configSchema>;

/** Environment variable backing each config path, used in validation messages. */
const ENV_NAMES: Record<string, string> = {
  nodeEnv: "NODE_ENV",
  logLevel: "LOG_LEVEL",
  "nomad.address": "NOMAD_ADDR",
  "nomad.token": "NOMAD_TOKEN",
  "nomad.namespace": "NOMAD_NAMESPACE",
  "nomad.jobName": "TRAEFIK_JOB_NAME",
  "cloudflare.apiToken": "CLOUDFLARE_API_TOKEN",
  "cloudflare.zoneId": "CLOUDFLARE_ZONE_ID",
  "dns.recordName": "DNS_RECORD_NAME",
  "dns.ttl": "DNS_RECORD_TTL",
  "dns.proxied": "DNS_RECORD_PROXIED",
  "controller.syncIntervalMs": "SYNC_INTERVAL",
  "controller.debounceMs": "EVENT_DEBOUNCE",
  "controller.queueCapacity": "EVENT_QUEUE_CAPACITY",
  "controller.watchMaxFailures": "WATCH_MAX_FAILURES",
  metricsPort: "METRICS_PORT",
  sentryDsn: "SENTRY_DSN",
};

/** Thrown when the environment cannot produce a complete configuration. */
export class ConfigError extends Error {
  readonly name = "ConfigError" as const;
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Environment validation failed:\n${problems.map((p) => `  - ${p}`).join("\n")}`);
    this.problems = problems;
  }
}

/**
 * Build the controller configuration from environment variables.
 * Every problem is reported at once; nothing is started on failure.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const result = configSchema.safeParse({
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    nomad: {
      address: env.NOMAD_ADDR,
      token: env.NOMAD_TOKEN,
      namespace: env.NOMAD_NAMESPACE,
      jobName: env.TRAEFIK_JOB_NAME,
    },
    cloudflare: {
      apiToken: env.CLOUDFLARE_API_TOKEN,
      zoneId: env.CLOUDFLARE_ZONE_ID,
    },
    dns: {
      recordName: env.DNS_RECORD_NAME,
      ttl: env.DNS_RECORD_TTL,
      proxied: env.DNS_RECORD_PROXIED,
    },
    controller: {
      syncIntervalMs: env.SYNC_INTERVAL,
      debounceMs: env.EVENT_DEBOUNCE,
      queueCapacity: env.EVENT_QUEUE_CAPACITY,
      watchMaxFailures: env.WATCH_MAX_FAILURES,
    },
    metricsPort: env.METRICS_PORT,
    sentryDsn: env.SENTRY_DSN,
  });

  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => {
        const key = issue.path.join(".");
        return `${ENV_NAMES[key] ?? key} ${issue.message}`;
      }),
    );
  }
  return result.data;
}
