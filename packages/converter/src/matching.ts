/**
 * Identity matching.
 *
 * A token matches an identity when, trimmed and lowercased, it equals
 * the identity's email, first name, last name, or "first last".
 * No fuzzy matching, no partial matches.
 */

import type { Identity } from "@splitrelay/types";

export function normalizeToken(token: string): string {
  return token.trim().toLowerCase();
}

export function matchesIdentity(identity: Identity, token: string): boolean {
  const needle = normalizeToken(token);
  if (needle === "") {
    return false;
  }

  const first = normalizeToken(identity.firstName);
  const last = normalizeToken(identity.lastName ?? "");
  const email = normalizeToken(identity.email ?? "");
  const full = `${first} ${last}`.trim();

  return [email, first, last, full].some((candidate) => candidate !== "" && candidate === needle);
}

/**
 * The first identity the token matches, in list order.
 */
export function findMatchingIdentity(
  identities: readonly Identity[],
  token: string,
): Identity | undefined {
  return identities.find((identity) => matchesIdentity(identity, token));
}

/**
 * "First Last" for log lines and CLI output.
 */
export function displayName(identity: Identity): string {
  return [identity.firstName, identity.lastName ?? ""].join(" ").trim();
}
