import { turboshake128 } from "@noble/hashes/sha3-addons";
import {
  integerToOctetStringBE,
  octetStringToIntegerBE,
  randomIntegerInRange,
} from "@ringsum/common";
import { MASK_RANGE } from "./constants.js";

const encoder = new TextEncoder();

export const KEY_SEED_SIZE = 16;
// MASK_RANGE is a power of two, so masking a 4 byte read is uniform
const MASK_BYTES = 4;

/** domain separation tag absorbed ahead of every mask derivation */
export const MASK_DST = encoder.encode("ringsum mask");

export function assertKey(key: bigint): void {
  if (key < 1n || key > MASK_RANGE) {
    throw new RangeError(`key ${key} is outside [1, ${MASK_RANGE}]`);
  }
}

/**
   The keyed pseudorandom function behind every mask: TurboSHAKE128
   over the length-prefixed tag, the key as a 16 byte big-endian seed
   and the UTF-8 field name, read as a 30 bit integer and shifted into
   `[1, MASK_RANGE]`. Identical inputs give identical masks in every
   process.
 */
export async function mask(key: bigint, fieldName: string): Promise<bigint> {
  assertKey(key);
  const output = turboshake128
    .create({ D: 1 })
    .update(Uint8Array.of(MASK_DST.length))
    .update(MASK_DST)
    .update(integerToOctetStringBE(key, KEY_SEED_SIZE))
    .update(encoder.encode(fieldName))
    .xof(MASK_BYTES);
  return (octetStringToIntegerBE(output) & (MASK_RANGE - 1n)) + 1n;
}

export async function maskDifference(
  firstKey: bigint,
  secondKey: bigint,
  fieldName: string,
): Promise<bigint> {
  return (await mask(firstKey, fieldName)) - (await mask(secondKey, fieldName));
}

/** a fresh secret, uniform in `[1, MASK_RANGE]` */
export function randomKey(): bigint {
  return randomIntegerInRange(1n, MASK_RANGE);
}
