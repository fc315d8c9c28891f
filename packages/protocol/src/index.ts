export { Participant, Participant as default } from "./participant.js";
export type {
  ParticipantOptions,
  InvocationReport,
  InvocationStatus,
} from "./participant.js";
export {
  MASK_RANGE,
  DEFAULT_APP_NAME,
  DEMO_FIELDS,
} from "./constants.js";
export type { AggregateMode, FieldSpec } from "./constants.js";
export { mask, maskDifference, randomKey, MASK_DST } from "./mask.js";
export { KeyExchange } from "./keyExchange.js";
export type { KeyExchangeState, Keys } from "./keyExchange.js";
export { encrypt } from "./masking.js";
export { aggregate, sumMasked, summarize } from "./aggregator.js";
export type { AggregateOutcome } from "./aggregator.js";
export { stageOf, nextAction } from "./stage.js";
export type { Stage, Observation, Action } from "./stage.js";
export { ArtifactLayout } from "./layout.js";
export type { KeySlot } from "./layout.js";
export { generateRecord } from "./record.js";
export type { PrivateRecord, MaskedRecord } from "./record.js";
export {
  encodeKey,
  decodeKey,
  encodeRecord,
  decodeRecord,
  encodeMasked,
  decodeMasked,
  encodeAggregate,
  decodeAggregate,
} from "./encoding.js";
export type { AggregateResult } from "./encoding.js";
export type { Logger } from "./logger.js";
export {
  KeysNotReadyError,
  ConfigurationError,
  TransportError,
  MalformedArtifactError,
} from "./errors.js";
