import type { Keys } from "./keyExchange.js";
import type { MaskedRecord, PrivateRecord } from "./record.js";
import { canonicalFields } from "./record.js";
import { KeysNotReadyError } from "./errors.js";
import { maskDifference } from "./mask.js";

/**
   Offsets every field of `record` by
   `mask(first, field) - mask(second, field)`, visiting fields in
   sorted order. Summed around the whole ring the offsets cancel.

   @throws {@linkcode KeysNotReadyError} if either key is absent.
 */
export async function encrypt(
  record: PrivateRecord,
  keys: Partial<Keys>,
): Promise<MaskedRecord> {
  const { first, second } = keys;
  if (first === undefined || second === undefined) {
    const missing: ("first" | "second")[] = [];
    if (first === undefined) missing.push("first");
    if (second === undefined) missing.push("second");
    throw new KeysNotReadyError(missing);
  }

  const masked: MaskedRecord = {};
  for (const field of canonicalFields(record)) {
    masked[field] =
      BigInt(record[field]) + (await maskDifference(first, second, field));
  }
  return masked;
}
