import assert from "assert";
import type { Observation } from "./stage.js";
import { nextAction, stageOf } from "./stage.js";

function observation(overrides: Partial<Observation> = {}): Observation {
  return {
    record: false,
    firstKey: false,
    secondKey: false,
    masked: false,
    aggregate: false,
    ...overrides,
  };
}

const auto = { autoGenerateRecord: true };
const manual = { autoGenerateRecord: false };

describe("stage machine", () => {
  it("finishes once an aggregate exists, whatever else is present", () => {
    const o = observation({ aggregate: true });
    assert.equal(stageOf(o), "Aggregated");
    assert.equal(nextAction(o, auto), "done");
    assert.equal(nextAction(observation({ aggregate: true, record: true, masked: true }), auto), "done");
  });

  it("creates a record only when configured to", () => {
    assert.equal(stageOf(observation()), "NoRecord");
    assert.equal(nextAction(observation(), auto), "createRecord");
    assert.equal(nextAction(observation(), manual), "awaitRecord");
  });

  it("starts the key exchange when there is no second key", () => {
    const o = observation({ record: true });
    assert.equal(stageOf(o), "KeysPending");
    assert.equal(nextAction(o, auto), "exchangeKeys");
  });

  it("starts the key exchange even if the first key arrived early", () => {
    const o = observation({ record: true, firstKey: true });
    assert.equal(stageOf(o), "KeysPending");
    assert.equal(nextAction(o, auto), "exchangeKeys");
  });

  it("waits for the first key once the second exists", () => {
    const o = observation({ record: true, secondKey: true });
    assert.equal(stageOf(o), "KeysPending");
    assert.equal(nextAction(o, manual), "awaitFirstKey");
  });

  it("publishes the masked record once both keys exist", () => {
    const o = observation({ record: true, firstKey: true, secondKey: true });
    assert.equal(stageOf(o), "KeysReady");
    assert.equal(nextAction(o, auto), "publishMasked");
  });

  it("aggregates once the masked record is published", () => {
    const o = observation({
      record: true,
      firstKey: true,
      secondKey: true,
      masked: true,
    });
    assert.equal(stageOf(o), "Masked");
    assert.equal(nextAction(o, auto), "aggregate");
  });
});
