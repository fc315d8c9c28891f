import { ConfigurationError, TransportError } from "@ringsum/common";

export class NotInRingError extends ConfigurationError {
  readonly identity: string;

  constructor(identity: string) {
    super(`identity ${identity} not found in the ring`);
    this.name = "NotInRingError";
    this.identity = identity;
  }
}

export class RingTooSmallError extends ConfigurationError {
  constructor(size: number, minimum: number) {
    super(
      `ring has ${size} participant(s); at least ${minimum} are needed to keep records private`,
    );
    this.name = "RingTooSmallError";
  }
}

export class RingFetchError extends TransportError {
  constructor(message: string, url: string, options?: ErrorOptions) {
    super(message, url, options);
    this.name = "RingFetchError";
  }
}
