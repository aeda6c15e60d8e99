import * as Sentry from "@sentry/node";
import type { Breadcrumb } from "@sentry/node";

/** Where in the controller an error surfaced; becomes the `component` tag. */
export interface ErrorContext {
  component?: string;
  extra?: Record<string, unknown>;
}

/**
 * Drop the query string from HTTP breadcrumb URLs. Nomad and Cloudflare
 * requests carry namespaces, record names and stream topics there.
 */
export function scrubBreadcrumb(breadcrumb: Breadcrumb): Breadcrumb {
  const url = breadcrumb.data?.url;
  if (breadcrumb.category !== "http" || typeof url !== "string") return breadcrumb;

  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return breadcrumb;
  }
  parsed.search = "";
  return { ...breadcrumb, data: { ...breadcrumb.data, url: parsed.toString() } };
}

/**
 * Initialize Sentry SDK. Call before the controller starts so startup
 * failures are captured.
 *
 * If dsn is absent, Sentry stays disabled and capture calls are no-ops.
 */
export function initSentry(dsn: string | undefined, environment = "production"): void {
  if (!dsn) return;

  Sentry.init({
    dsn,
    environment,
    release: process.env.SENTRY_RELEASE ?? undefined,
    // Deduplicate: only alert on *new* error types
    integrations: [Sentry.dedupeIntegration()],
    beforeBreadcrumb: scrubBreadcrumb,
  });
}

export function captureError(error: unknown, context: ErrorContext = {}): void {
  const { component, extra } = context;
  Sentry.captureException(error, {
    tags: component ? { component } : undefined,
    extra,
  });
}

/** Flush pending events before the process exits. */
export async function flushSentry(timeoutMs = 2000): Promise<boolean> {
  return Sentry.flush(timeoutMs);
}
