/**
 * Payer determination.
 *
 * The payer is chosen from the already-resolved participants only, so
 * it is always a member of the split and never costs a second lookup.
 * No payer named, or no participant matching it, means the principal paid.
 */

import type { Identity } from "@splitrelay/types";
import { findMatchingIdentity } from "./matching.js";
import type { ConversionWarning } from "./types.js";

export interface PayerDetermination {
  readonly payer: Identity;
  readonly warning?: ConversionWarning;
}

export function determinePayer(
  payerToken: string | undefined,
  participants: readonly Identity[],
  principal: Identity,
): PayerDetermination {
  if (payerToken === undefined || payerToken.trim() === "") {
    return { payer: principal };
  }

  const payer = findMatchingIdentity(participants, payerToken);
  if (payer !== undefined) {
    return { payer };
  }

  return {
    payer: principal,
    warning: {
      kind: "payer-unresolved",
      subject: payerToken.trim(),
      message: `Payer "${payerToken.trim()}" is not among the participants; the principal is recorded as payer`,
    },
  };
}
