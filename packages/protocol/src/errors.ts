export {
  ConfigurationError,
  TransportError,
  MalformedArtifactError,
} from "@ringsum/common";

/**
   Masking was attempted without both keys. The orchestrator checks
   for both keys before masking, so reaching this is a bug.
 */
export class KeysNotReadyError extends Error {
  readonly missing: ("first" | "second")[];

  constructor(missing: ("first" | "second")[]) {
    super(`masking needs both keys; missing ${missing.join(" and ")} key`);
    this.name = "KeysNotReadyError";
    this.missing = missing;
  }
}
