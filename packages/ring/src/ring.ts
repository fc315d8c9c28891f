import { ConfigurationError } from "@ringsum/common";
import { NotInRingError, RingTooSmallError } from "./errors.js";

/** Below three members a participant can subtract its own mask and read a neighbor's record. */
export const MIN_RING_SIZE = 3;

export type Ring = readonly string[];

export interface Neighbors {
  previous: string;
  next: string;
}

/**
   Finds the participants on either side of `self`, wrapping around
   the ends of the ring. A ring of one resolves both neighbors to
   `self`; callers that run the protocol reject such rings with
   {@linkcode assertRingSize} first.

   @throws {@linkcode NotInRingError} if `self` is not a member.
 */
export function resolveNeighbors(ring: Ring, self: string): Neighbors {
  const index = ring.indexOf(self);
  if (index === -1) {
    throw new NotInRingError(self);
  }
  const n = ring.length;
  return {
    previous: ring[(index - 1 + n) % n],
    next: ring[(index + 1) % n],
  };
}

export function assertRingSize(ring: Ring, minimum = MIN_RING_SIZE): void {
  if (ring.length < minimum) {
    throw new RingTooSmallError(ring.length, minimum);
  }
}

/** Checks that a published membership list is a list of unique, non-empty identities. */
export function validateRing(value: unknown): string[] {
  if (!Array.isArray(value)) {
    throw new ConfigurationError("ring is not an array");
  }

  const seen = new Set<string>();
  const ring: string[] = [];
  for (const [index, member] of value.entries()) {
    if (typeof member !== "string" || member.length === 0) {
      throw new ConfigurationError(
        `ring member at index ${index} is not a non-empty string`,
      );
    }
    if (seen.has(member)) {
      throw new ConfigurationError(`ring member ${member} appears twice`);
    }
    seen.add(member);
    ring.push(member);
  }
  return ring;
}
