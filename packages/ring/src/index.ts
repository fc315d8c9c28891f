export {
  MIN_RING_SIZE,
  resolveNeighbors,
  assertRingSize,
  validateRing,
} from "./ring.js";
export type { Ring, Neighbors } from "./ring.js";
export {
  StaticRingSource,
  HttpRingSource,
  parseRingDocument,
} from "./source.js";
export type { RingSource } from "./source.js";
export { NotInRingError, RingTooSmallError, RingFetchError } from "./errors.js";
