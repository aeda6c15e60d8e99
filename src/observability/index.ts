/**
 * Observability: sync metrics, readiness and Sentry error tracking.
 */

export { ControllerMetrics } from "./metrics.js";
export { captureError, flushSentry, initSentry } from "./sentry.js";
