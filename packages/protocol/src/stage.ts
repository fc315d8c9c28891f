/** How far a participant's round has progressed, judged from its artifacts alone. */
export type Stage = "NoRecord" | "KeysPending" | "KeysReady" | "Masked" | "Aggregated";

/** Which of the participant's own artifacts are visible. */
export interface Observation {
  record: boolean;
  firstKey: boolean;
  secondKey: boolean;
  masked: boolean;
  aggregate: boolean;
}

export type Action =
  | "createRecord"
  | "awaitRecord"
  | "exchangeKeys"
  | "awaitFirstKey"
  | "publishMasked"
  | "aggregate"
  | "done";

export interface StageOptions {
  autoGenerateRecord: boolean;
}

export function stageOf(observation: Observation): Stage {
  if (observation.aggregate) return "Aggregated";
  if (observation.masked) return "Masked";
  if (!observation.record) return "NoRecord";
  if (observation.firstKey && observation.secondKey) return "KeysReady";
  return "KeysPending";
}

/**
   The single next step for a participant in the given state. The
   `await*` actions end an invocation unless what they wait for has
   appeared; `aggregate` always ends one; `done` means the round is
   over for this participant.
 */
export function nextAction(
  observation: Observation,
  { autoGenerateRecord }: StageOptions,
): Action {
  switch (stageOf(observation)) {
    case "Aggregated":
      return "done";
    case "NoRecord":
      return autoGenerateRecord ? "createRecord" : "awaitRecord";
    case "KeysPending":
      return observation.secondKey ? "awaitFirstKey" : "exchangeKeys";
    case "KeysReady":
      return "publishMasked";
    case "Masked":
      return "aggregate";
  }
}
