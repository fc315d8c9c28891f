import { MalformedArtifactError } from "@ringsum/common";
import type { AggregateMode } from "./constants.js";
import { MASK_RANGE } from "./constants.js";
import type { MaskedRecord, PrivateRecord } from "./record.js";
import { canonicalFields } from "./record.js";

export interface AggregateResult {
  mode: AggregateMode;
  /** ring size the result was computed over */
  participants: number;
  values: Record<string, number>;
}

const INTEGER = /^-?[0-9]+$/;

function parseJsonObject(
  text: string,
  location: string,
): Record<string, unknown> {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (_) {
    throw new MalformedArtifactError(location, "not valid JSON");
  }
  if (typeof value !== "object" || Array.isArray(value) || value === null) {
    throw new MalformedArtifactError(location, "not a JSON object");
  }
  return Object.fromEntries(Object.entries(value));
}

function checkFieldNames(
  object: Record<string, unknown>,
  fields: readonly string[],
  location: string,
) {
  for (const field of fields) {
    if (!(field in object)) {
      throw new MalformedArtifactError(location, `missing field ${field}`);
    }
  }
  for (const key of Object.keys(object)) {
    if (!fields.includes(key)) {
      throw new MalformedArtifactError(location, `unexpected field ${key}`);
    }
  }
}

export function encodeKey(key: bigint): string {
  return key.toString();
}

export function decodeKey(text: string, location: string): bigint {
  const trimmed = text.trim();
  if (!/^[0-9]+$/.test(trimmed)) {
    throw new MalformedArtifactError(location, "key is not an integer");
  }
  const key = BigInt(trimmed);
  if (key < 1n || key > MASK_RANGE) {
    throw new MalformedArtifactError(
      location,
      `key is outside [1, ${MASK_RANGE}]`,
    );
  }
  return key;
}

export function encodeRecord(record: PrivateRecord): string {
  return JSON.stringify(
    Object.fromEntries(
      canonicalFields(record).map((field) => [field, record[field]]),
    ),
  );
}

export function decodeRecord(
  text: string,
  location: string,
  fields: readonly string[],
): PrivateRecord {
  const object = parseJsonObject(text, location);
  checkFieldNames(object, fields, location);
  const record: PrivateRecord = {};
  for (const field of canonicalFields(object)) {
    const value = object[field];
    if (typeof value !== "number" || !Number.isSafeInteger(value)) {
      throw new MalformedArtifactError(
        location,
        `field ${field} is not a safe integer`,
      );
    }
    record[field] = value;
  }
  return record;
}

/** Masked values are written as decimal strings; they can leave the safe integer range. */
export function encodeMasked(masked: MaskedRecord): string {
  return JSON.stringify(
    Object.fromEntries(
      canonicalFields(masked).map((field) => [field, masked[field].toString()]),
    ),
  );
}

export function decodeMasked(
  text: string,
  location: string,
  fields: readonly string[],
): MaskedRecord {
  const object = parseJsonObject(text, location);
  checkFieldNames(object, fields, location);
  const masked: MaskedRecord = {};
  for (const field of canonicalFields(object)) {
    const value = object[field];
    if (typeof value === "string" && INTEGER.test(value)) {
      masked[field] = BigInt(value);
    } else if (typeof value === "number" && Number.isSafeInteger(value)) {
      masked[field] = BigInt(value);
    } else {
      throw new MalformedArtifactError(
        location,
        `field ${field} is not an integer`,
      );
    }
  }
  return masked;
}

export function encodeAggregate(result: AggregateResult): string {
  return JSON.stringify({
    mode: result.mode,
    participants: result.participants,
    values: Object.fromEntries(
      canonicalFields(result.values).map((field) => [
        field,
        result.values[field],
      ]),
    ),
  });
}

export function decodeAggregate(
  text: string,
  location: string,
): AggregateResult {
  const object = parseJsonObject(text, location);
  const { mode, participants, values } = object;
  if (mode !== "sum" && mode !== "mean") {
    throw new MalformedArtifactError(location, "mode is not sum or mean");
  }
  if (typeof participants !== "number" || !Number.isInteger(participants)) {
    throw new MalformedArtifactError(location, "participants is not an integer");
  }
  if (typeof values !== "object" || Array.isArray(values) || values === null) {
    throw new MalformedArtifactError(location, "values is not an object");
  }
  const decoded: Record<string, number> = {};
  for (const [field, value] of Object.entries(values)) {
    if (typeof value !== "number") {
      throw new MalformedArtifactError(location, `value ${field} is not a number`);
    }
    decoded[field] = value;
  }
  return { mode, participants, values: decoded };
}
