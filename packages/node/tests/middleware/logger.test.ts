/**
 * Tests for logger middleware.
 */

import { describe, it, expect } from "vitest";
import type { RequestLogEntry } from "../../src/middleware/logger.js";
import { EMAIL, createTestApp, jsonRequest } from "../setup.js";

function collectingApp(options: Parameters<typeof createTestApp>[0] = {}) {
  const entries: RequestLogEntry[] = [];
  const testApp = createTestApp({ ...options, logFn: (entry) => entries.push(entry) });
  return { ...testApp, entries };
}

describe("loggerMiddleware", () => {
  it("calls logFn with request details", async () => {
    const { app, entries } = collectingApp();

    await app.request(jsonRequest("/health", "GET", undefined, { "X-Request-Id": "log-1" }));

    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      method: "GET",
      path: "/health",
      status: 200,
      requestId: "log-1",
      level: "info",
    });
    expect(entries[0]?.durationMs).toBeGreaterThanOrEqual(0);
  });

  it("logs a created expense at info", async () => {
    const { app, entries } = collectingApp();

    await app.request(jsonRequest("/api/v1/expenses/forward", "POST", EMAIL));

    expect(entries[0]).toMatchObject({ method: "POST", status: 201, level: "info" });
  });

  it("logs client errors at warn", async () => {
    const { app, entries } = collectingApp();

    await app.request(jsonRequest("/api/v1/expenses/forward", "POST", { subject: 1 }));

    expect(entries[0]).toMatchObject({ status: 400, level: "warn" });
  });

  it("logs upstream failures at error", async () => {
    const { app, entries, model } = collectingApp();
    model.reply = "I could not find an expense in this email.";

    await app.request(jsonRequest("/api/v1/expenses/forward", "POST", EMAIL));

    expect(entries[0]).toMatchObject({ status: 502, level: "error" });
  });
});
