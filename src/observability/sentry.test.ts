import { beforeEach, describe, expect, it, vi } from "vitest";

// Mock @sentry/node before importing the module
vi.mock("@sentry/node", () => ({
  init: vi.fn(),
  captureException: vi.fn(),
  flush: vi.fn(async () => true),
  dedupeIntegration: vi.fn(() => ({ name: "Dedupe" })),
}));

import * as Sentry from "@sentry/node";
import { captureError, flushSentry, initSentry, scrubBreadcrumb } from "./sentry.js";

describe("sentry", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("does not call Sentry.init when dsn is undefined", () => {
    initSentry(undefined);
    expect(Sentry.init).not.toHaveBeenCalled();
  });

  it("does not call Sentry.init when dsn is empty string", () => {
    initSentry("");
    expect(Sentry.init).not.toHaveBeenCalled();
  });

  it("calls Sentry.init with dsn and environment when provided", () => {
    initSentry("https://public@sentry.example.com/1", "development");
    expect(Sentry.init).toHaveBeenCalledWith(
      expect.objectContaining({ dsn: "https://public@sentry.example.com/1", environment: "development" }),
    );
  });

  it("captureError tags the component", () => {
    const err = new Error("test");
    captureError(err, { component: "control-loop", extra: { attempt: 2 } });
    expect(Sentry.captureException).toHaveBeenCalledWith(err, {
      tags: { component: "control-loop" },
      extra: { attempt: 2 },
    });
  });

  it("captureError works without context", () => {
    const err = new Error("test");
    captureError(err);
    expect(Sentry.captureException).toHaveBeenCalledWith(err, { tags: undefined, extra: undefined });
  });

  it("installs the breadcrumb scrubber", () => {
    initSentry("https://public@sentry.example.com/1");
    expect(Sentry.init).toHaveBeenCalledWith(expect.objectContaining({ beforeBreadcrumb: scrubBreadcrumb }));
  });

  it("strips query strings from HTTP breadcrumb URLs", () => {
    const scrubbed = scrubBreadcrumb({
      category: "http",
      data: { url: "https://api.cloudflare.com/client/v4/zones/zone-1/dns_records?name=edge.example.com&page=1", method: "GET" },
    });
    expect(scrubbed.data).toEqual({ url: "https://api.cloudflare.com/client/v4/zones/zone-1/dns_records", method: "GET" });
  });

  it("leaves other breadcrumbs untouched", () => {
    const consoleCrumb = { category: "console", data: { url: "http://nomad.test:4646/v1/node/n1?namespace=edge" } };
    expect(scrubBreadcrumb(consoleCrumb)).toBe(consoleCrumb);

    const unparsable = { category: "http", data: { url: "not a url" } };
    expect(scrubBreadcrumb(unparsable)).toBe(unparsable);
  });

  it("flushSentry waits for pending events", async () => {
    await expect(flushSentry(500)).resolves.toBe(true);
    expect(Sentry.flush).toHaveBeenCalledWith(500);
  });
});
