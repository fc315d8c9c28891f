/**
   The participant or ring is set up in a way the protocol cannot run
   with. Fatal for the invocation that hits it.
 */
export class ConfigurationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}

/** A read, write or permission change against the storage medium failed. */
export class TransportError extends Error {
  readonly location: string;

  constructor(message: string, location: string, options?: ErrorOptions) {
    super(`${message} (${location})`, options);
    this.name = "TransportError";
    this.location = location;
  }
}

/** A persisted artifact exists but does not parse as what it should hold. */
export class MalformedArtifactError extends Error {
  readonly location: string;

  constructor(location: string, detail: string) {
    super(`malformed artifact at ${location}: ${detail}`);
    this.name = "MalformedArtifactError";
    this.location = location;
  }
}
