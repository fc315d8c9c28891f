import { inspect } from "node:util";
import { readFile } from "node:fs/promises";
import { ConfigurationError } from "@ringsum/common";
import type { AggregateMode, FieldSpec } from "@ringsum/protocol";

export const CONFIG_PATH_ENV = "RINGSUM_CONFIG_PATH";

export interface RunnerConfig {
  identity: string;
  /** root directory of the shared medium on this machine */
  dataDir: string;
  appName?: string;
  /** either a fixed membership list or a URL publishing `{ "ring": [...] }` */
  ring?: string[];
  ringUrl?: string;
  aggregateMode?: AggregateMode;
  autoGenerateRecord?: boolean;
  fields?: FieldSpec[];
}

function isObject(value: unknown): value is { [key: string]: unknown } {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(
  obj: { [key: string]: unknown },
  property: string,
): string | undefined {
  const value = obj[property];
  if (value === undefined) return undefined;
  if (typeof value !== "string" || value.length === 0) {
    throw new ConfigurationError(
      `${property} is not a non-empty string (was ${inspect(value)})`,
    );
  }
  return value;
}

function requiredString(
  obj: { [key: string]: unknown },
  property: string,
): string {
  const value = optionalString(obj, property);
  if (value === undefined) {
    throw new ConfigurationError(`${property} is missing`);
  }
  return value;
}

function parseField(input: unknown, index: number): FieldSpec {
  if (!isObject(input)) {
    throw new ConfigurationError(`field at index ${index} is not an object`);
  }
  const name = requiredString(input, "name");
  const { min, max } = input;
  if (typeof min !== "number" || !Number.isSafeInteger(min)) {
    throw new ConfigurationError(`field ${name} min is not an integer`);
  }
  if (typeof max !== "number" || !Number.isSafeInteger(max)) {
    throw new ConfigurationError(`field ${name} max is not an integer`);
  }
  if (min < 0 || max < min) {
    throw new ConfigurationError(
      `field ${name} range [${min}, ${max}] is not a non-negative range`,
    );
  }
  return { name, min, max };
}

/** Checks a parsed configuration document, naming the first offending property. */
export function sanitizeConfig(raw: unknown): RunnerConfig {
  if (!isObject(raw)) {
    throw new ConfigurationError("configuration is not a JSON object");
  }

  const config: RunnerConfig = {
    identity: requiredString(raw, "identity"),
    dataDir: requiredString(raw, "dataDir"),
  };

  const appName = optionalString(raw, "appName");
  if (appName !== undefined) {
    if (appName.includes("/")) {
      throw new ConfigurationError("appName may not contain /");
    }
    config.appName = appName;
  }

  const { ring, aggregateMode, autoGenerateRecord, fields } = raw;
  if (ring !== undefined && raw.ringUrl !== undefined) {
    throw new ConfigurationError("only one of ring and ringUrl may be given");
  }
  if (ring !== undefined) {
    if (!Array.isArray(ring)) {
      throw new ConfigurationError("ring is not an array");
    }
    config.ring = ring.map((member: unknown, index) => {
      if (typeof member !== "string") {
        throw new ConfigurationError(`ring member at index ${index} is not a string`);
      }
      return member;
    });
  } else {
    const ringUrl = optionalString(raw, "ringUrl");
    if (ringUrl === undefined) {
      throw new ConfigurationError("one of ring and ringUrl is missing");
    }
    try {
      new URL(ringUrl);
    } catch (_) {
      throw new ConfigurationError(`ringUrl ${ringUrl} is not a valid URL`);
    }
    config.ringUrl = ringUrl;
  }

  switch (aggregateMode) {
    case undefined:
      break;
    case "sum":
    case "mean":
      config.aggregateMode = aggregateMode;
      break;
    default:
      throw new ConfigurationError(
        `aggregateMode is not sum or mean (was ${inspect(aggregateMode)})`,
      );
  }

  if (autoGenerateRecord !== undefined) {
    if (typeof autoGenerateRecord !== "boolean") {
      throw new ConfigurationError("autoGenerateRecord is not a boolean");
    }
    config.autoGenerateRecord = autoGenerateRecord;
  }

  if (fields !== undefined) {
    if (!Array.isArray(fields) || fields.length === 0) {
      throw new ConfigurationError("fields is not a non-empty array");
    }
    const parsed = fields.map((field: unknown, index) => parseField(field, index));
    const names = new Set(parsed.map(({ name }) => name));
    if (names.size !== parsed.length) {
      throw new ConfigurationError("fields has duplicate names");
    }
    config.fields = parsed;
  }

  return config;
}

/**
   Finds the configuration path in `--config <path>` (or
   `--config=<path>`), falling back to the environment.
 */
export function configPath(
  argv: readonly string[],
  env: NodeJS.ProcessEnv = process.env,
): string {
  for (const [i, arg] of argv.entries()) {
    if (arg === "--config") {
      const path = argv[i + 1];
      if (path === undefined) {
        throw new ConfigurationError("--config needs a path");
      }
      return path;
    }
    if (arg.startsWith("--config=")) {
      return arg.slice("--config=".length);
    }
  }
  const path = env[CONFIG_PATH_ENV];
  if (path === undefined || path === "") {
    throw new ConfigurationError(
      `no configuration given; pass --config <path> or set ${CONFIG_PATH_ENV}`,
    );
  }
  return path;
}

export async function loadConfig(path: string): Promise<RunnerConfig> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (error) {
    throw new ConfigurationError(`cannot read configuration ${path}`, {
      cause: error,
    });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (_) {
    throw new ConfigurationError(`configuration ${path} is not valid JSON`);
  }
  return sanitizeConfig(raw);
}
