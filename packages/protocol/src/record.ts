import { randomIntegerInRange } from "@ringsum/common";
import type { FieldSpec } from "./constants.js";

/** A participant's private counters, keyed by field name. */
export type PrivateRecord = Record<string, number>;

/** A private record offset by the participant's masks. */
export type MaskedRecord = Record<string, bigint>;

export function generateRecord(fields: readonly FieldSpec[]): PrivateRecord {
  return Object.fromEntries(
    fields.map(({ name, min, max }) => [
      name,
      Number(randomIntegerInRange(BigInt(min), BigInt(max))),
    ]),
  );
}

/** field names in the order every participant processes them */
export function canonicalFields(record: object): string[] {
  return Object.keys(record).sort();
}
