import { webcrypto } from "one-webcrypto";

export {
  ConfigurationError,
  TransportError,
  MalformedArtifactError,
} from "./errors.js";

/** @internal */
export function integerToOctetStringBE(i: bigint, len: number): Uint8Array {
  const max = 256n ** BigInt(len);
  if (i < 0n || i >= max) {
    throw new Error(
      `Integer ${i} does not fit a ${len} byte array (max ${max}).`,
    );
  }
  const octets = new Uint8Array(len);
  for (let index = octets.length - 1; index >= 0; index--) {
    octets[index] = Number(i % 256n);
    i /= 256n;
  }
  return octets;
}

/** @internal */
export function octetStringToIntegerBE(octetString: Uint8Array): bigint {
  return octetString.reduceRight(
    (total, value, index) =>
      total + 256n ** BigInt(octetString.length - index - 1) * BigInt(value),
    0n,
  );
}

/** @internal */
export function nextPowerOf2Big(n: bigint): bigint {
  if (n === 1n) {
    return 1n;
  } else if (n > 0n) {
    return 2n ** BigInt((n - 1n).toString(2).length);
  } else {
    throw new Error("log of negative number");
  }
}

/** @internal */
export function randomBytes(n: number): Uint8Array {
  const buffer = new Uint8Array(n);
  webcrypto.getRandomValues(buffer);
  return buffer;
}

/**
   Draws an integer uniformly from the inclusive range `[min, max]`,
   rejection sampling over the smallest power-of-two span that covers it.
 */
export function randomIntegerInRange(min: bigint, max: bigint): bigint {
  if (max < min) {
    throw new Error(`empty range [${min}, ${max}]`);
  }
  const span = max - min + 1n;
  const mask = nextPowerOf2Big(span) - 1n;
  const length = Math.max(1, Math.ceil(mask.toString(2).length / 8));
  let candidate: bigint;
  do {
    candidate = octetStringToIntegerBE(randomBytes(length)) & mask;
  } while (candidate >= span);
  return min + candidate;
}

/** @internal */
export function arr<T>(length: number, mapper: (n: number) => T): T[] {
  const a: T[] = [];
  for (let i = 0; i < length; i++) a.push(mapper(i));
  return a;
}
