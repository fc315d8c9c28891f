import type { Storage } from "@ringsum/storage";
import type { Ring } from "@ringsum/ring";
import type { AggregateMode } from "./constants.js";
import type { AggregateResult } from "./encoding.js";
import { decodeMasked } from "./encoding.js";
import type { ArtifactLayout } from "./layout.js";
import type { MaskedRecord } from "./record.js";

export type AggregateOutcome =
  | { status: "pending"; missing: string[] }
  | { status: "complete"; result: AggregateResult };

/** Adds masked records field by field; the masks cancel once every ring member is included. */
export function sumMasked(
  records: readonly MaskedRecord[],
  fields: readonly string[],
): Record<string, bigint> {
  const totals: Record<string, bigint> = {};
  for (const field of [...fields].sort()) {
    totals[field] = records.reduce((total, record) => total + record[field], 0n);
  }
  return totals;
}

export function summarize(
  totals: Record<string, bigint>,
  participants: number,
  mode: AggregateMode,
): AggregateResult {
  const values: Record<string, number> = {};
  for (const [field, total] of Object.entries(totals)) {
    values[field] =
      mode === "mean" ? Number(total) / participants : Number(total);
  }
  return { mode, participants, values };
}

/**
   Reads every ring member's published masked record and, once all of
   them are visible, reconstructs the ring-wide totals. Absent records
   are not an error: the outcome is `pending` and names who is
   missing. A mean is taken over the ring passed in, so callers pass
   the current membership.
 */
export async function aggregate(
  storage: Storage,
  layout: ArtifactLayout,
  ring: Ring,
  fields: readonly string[],
  mode: AggregateMode,
): Promise<AggregateOutcome> {
  const texts = await Promise.all(
    ring.map((member) => storage.readText(layout.masked(member))),
  );

  const missing: string[] = [];
  const published: { location: string; text: string }[] = [];
  ring.forEach((member, i) => {
    const text = texts[i];
    if (text === undefined) missing.push(member);
    else published.push({ location: layout.masked(member), text });
  });

  if (missing.length > 0) {
    return { status: "pending", missing };
  }

  const records = published.map(({ location, text }) =>
    decodeMasked(text, location, fields),
  );
  return {
    status: "complete",
    result: summarize(sumMasked(records, fields), ring.length, mode),
  };
}
