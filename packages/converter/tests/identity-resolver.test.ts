/**
 * Identity Resolver Tests
 *
 * Verifies:
 * - Token matching rules (email, first, last, full name)
 * - Principal always first; its names fall back to it when the directory misses
 * - One lookup per distinct token, one warning per unresolved token
 * - Resolution is idempotent
 */

import { describe, it, expect } from "vitest";
import type { Identity } from "@splitrelay/types";
import { IdentityResolver } from "../src/identity-resolver.js";
import { displayName, matchesIdentity, normalizeToken } from "../src/matching.js";
import { FakeIdentityDirectory, alice, bob, john, principal, sarah } from "./fakes.js";

// =============================================================================
// Matching
// =============================================================================

describe("matchesIdentity", () => {
  it("matches on email, first name, last name and full name", () => {
    expect(matchesIdentity(john, "john@example.com")).toBe(true);
    expect(matchesIdentity(john, "John")).toBe(true);
    expect(matchesIdentity(john, "smith")).toBe(true);
    expect(matchesIdentity(john, "  JOHN SMITH ")).toBe(true);
  });

  it("does not match partially", () => {
    expect(matchesIdentity(john, "Jo")).toBe(false);
    expect(matchesIdentity(john, "John S")).toBe(false);
  });

  it("never matches on an absent field", () => {
    expect(matchesIdentity(alice, "")).toBe(false);
    expect(matchesIdentity(alice, "   ")).toBe(false);
  });

  it("normalizes tokens", () => {
    expect(normalizeToken("  Mixed Case ")).toBe("mixed case");
  });

  it("formats display names", () => {
    expect(displayName(john)).toBe("John Smith");
    expect(displayName(alice)).toBe("Alice");
  });
});

// =============================================================================
// IdentityResolver
// =============================================================================

describe("IdentityResolver", () => {
  it("puts the principal first even when not mentioned", async () => {
    const resolver = new IdentityResolver(new FakeIdentityDirectory());
    const result = await resolver.resolve(["John", "Sarah"], principal);

    expect(result.participants.map((p) => p.id)).toEqual([principal.id, john.id, sarah.id]);
    expect(result.warnings).toEqual([]);
  });

  it("falls back to the principal for its own names without a warning", async () => {
    const directory = new FakeIdentityDirectory();
    const resolver = new IdentityResolver(directory);
    const result = await resolver.resolve(["Sarah", "mike@example.com", "Mike Jones"], principal);

    expect(result.participants.map((p) => p.id)).toEqual([principal.id, sarah.id]);
    expect(result.warnings).toEqual([]);
    expect(directory.calls).toEqual(["Sarah", "mike@example.com", "Mike Jones"]);
  });

  it("keeps a friend who shares the principal's first name", async () => {
    const johnDoe: Identity = { id: 1, firstName: "John", lastName: "Doe" };
    const directory = new FakeIdentityDirectory([john]);
    const result = await new IdentityResolver(directory).resolve(["John"], johnDoe);

    expect(result.participants.map((p) => p.id)).toEqual([johnDoe.id, john.id]);
    expect(result.warnings).toEqual([]);
    expect(directory.calls).toEqual(["John"]);
  });

  it("looks up each distinct token once", async () => {
    const directory = new FakeIdentityDirectory();
    const resolver = new IdentityResolver(directory);
    const result = await resolver.resolve(["Alice", "alice", " ALICE ", "Bob"], principal);

    expect(result.participants.map((p) => p.id)).toEqual([principal.id, alice.id, bob.id]);
    expect(directory.calls).toEqual(["Alice", "Bob"]);
  });

  it("collapses different tokens naming the same person", async () => {
    const resolver = new IdentityResolver(new FakeIdentityDirectory());
    const result = await resolver.resolve(["John", "john@example.com", "Smith"], principal);

    expect(result.participants.map((p) => p.id)).toEqual([principal.id, john.id]);
  });

  it("warns once per unresolved token and leaves it out", async () => {
    const directory = new FakeIdentityDirectory();
    const resolver = new IdentityResolver(directory);
    const result = await resolver.resolve(["Zed", "John", "zed"], principal);

    expect(result.participants.map((p) => p.id)).toEqual([principal.id, john.id]);
    expect(result.warnings).toEqual([
      {
        kind: "participant-unresolved",
        subject: "Zed",
        message: 'No friend matches participant "Zed"; left out of the split',
      },
    ]);
    expect(directory.calls).toEqual(["Zed", "John"]);
  });

  it("skips blank tokens without a lookup", async () => {
    const directory = new FakeIdentityDirectory();
    const result = await new IdentityResolver(directory).resolve(["", "  "], principal);

    expect(result.participants).toEqual([principal]);
    expect(directory.calls).toEqual([]);
  });

  it("is idempotent for the same tokens", async () => {
    const resolver = new IdentityResolver(new FakeIdentityDirectory());
    const tokens = ["Sarah", "Zed", "John", "sarah"];

    const first = await resolver.resolve(tokens, principal);
    const second = await resolver.resolve(tokens, principal);

    expect(second).toEqual(first);
  });

  it("propagates directory failures unchanged", async () => {
    const failure = new Error("ledger unreachable");
    const resolver = new IdentityResolver({
      findIdentity: () => Promise.reject(failure),
    });

    await expect(resolver.resolve(["John"], principal)).rejects.toBe(failure);
  });
});
