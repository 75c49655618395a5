/**
 * Identity Resolver.
 *
 * Turns the participant tokens of a candidate expense into an ordered,
 * de-duplicated participant set:
 * - The principal is always first, mentioned or not
 * - Every distinct token is looked up once per call, principal names
 *   included, so a friend sharing the principal's name is not lost
 * - A token the directory does not know but that names the principal
 *   is satisfied by the principal
 * - A token resolving to someone already in the set adds nothing
 * - Unresolved tokens become warnings; they never fail the conversion
 */

import type { Identity, IdentityDirectory, Lookup } from "@splitrelay/types";
import { matchesIdentity, normalizeToken } from "./matching.js";
import type { ConversionWarning } from "./types.js";

export interface ResolvedParticipants {
  /** Principal first, then resolved participants in mention order */
  readonly participants: readonly Identity[];
  readonly warnings: readonly ConversionWarning[];
}

export class IdentityResolver {
  constructor(private readonly directory: IdentityDirectory) {}

  /**
   * Resolve participant tokens against the directory.
   * Directory failures propagate unchanged.
   */
  async resolve(tokens: readonly string[], principal: Identity): Promise<ResolvedParticipants> {
    const participants: Identity[] = [principal];
    const ids = new Set<number>([principal.id]);
    const warnings: ConversionWarning[] = [];
    const lookups = new Map<string, Lookup<Identity>>();

    for (const raw of tokens) {
      const token = raw.trim();
      if (token === "") {
        continue;
      }

      const key = normalizeToken(token);
      let lookup = lookups.get(key);
      if (lookup === undefined) {
        lookup = await this.directory.findIdentity(token);
        lookups.set(key, lookup);

        if (!lookup.found && !matchesIdentity(principal, token)) {
          warnings.push({
            kind: "participant-unresolved",
            subject: token,
            message: `No friend matches participant "${token}"; left out of the split`,
          });
        }
      }

      if (!lookup.found || ids.has(lookup.value.id)) {
        continue;
      }

      ids.add(lookup.value.id);
      participants.push(lookup.value);
    }

    return { participants, warnings };
  }
}
