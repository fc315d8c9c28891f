import type { Storage } from "@ringsum/storage";
import type { Neighbors, RingSource } from "@ringsum/ring";
import { assertRingSize, resolveNeighbors, validateRing } from "@ringsum/ring";
import type { AggregateMode, FieldSpec } from "./constants.js";
import { DEFAULT_APP_NAME, DEMO_FIELDS } from "./constants.js";
import type { AggregateResult } from "./encoding.js";
import {
  decodeAggregate,
  decodeRecord,
  encodeAggregate,
  encodeMasked,
  encodeRecord,
} from "./encoding.js";
import { ArtifactLayout } from "./layout.js";
import type { Logger } from "./logger.js";
import { KeyExchange } from "./keyExchange.js";
import { encrypt } from "./masking.js";
import { aggregate } from "./aggregator.js";
import { generateRecord } from "./record.js";
import type { Action, Observation, Stage } from "./stage.js";
import { nextAction, stageOf } from "./stage.js";

export interface ParticipantOptions {
  identity: string;
  storage: Storage;
  ringSource: RingSource;
  appName?: string;
  /** defaults to `"mean"` */
  aggregateMode?: AggregateMode;
  /** create a record with the bootstrap generator when none exists; defaults to `true` */
  autoGenerateRecord?: boolean;
  fields?: readonly FieldSpec[];
  logger?: Logger;
}

export type InvocationStatus =
  | "aggregate complete"
  | "aggregate already complete"
  | "waiting on record"
  | "waiting on keys"
  | "waiting on participants";

export interface InvocationReport {
  identity: string;
  stage: Stage;
  status: InvocationStatus;
  /** ring members whose masked records are not visible yet */
  missing?: string[];
  result?: AggregateResult;
}

interface Round {
  ring: string[];
  neighbors: Neighbors;
  keyExchange: KeyExchange;
}

// every stage is entered at most once per invocation; anything beyond is a bug
const MAX_STEPS = 16;

/**
   Drives one participant through a round of the ring secure sum.
   Each call to {@linkcode Participant.invoke} looks at what is on
   the medium, does whatever can be done right now and returns; it
   never waits on another participant. Call it again later to make
   further progress.
 */
export class Participant {
  readonly identity: string;
  readonly layout: ArtifactLayout;
  readonly aggregateMode: AggregateMode;
  readonly autoGenerateRecord: boolean;
  readonly fields: readonly FieldSpec[];
  #storage: Storage;
  #ringSource: RingSource;
  #logger: Logger;
  // invocations on one participant run one after another
  #inFlight: Promise<unknown> = Promise.resolve();

  constructor(options: ParticipantOptions) {
    this.identity = options.identity;
    this.layout = new ArtifactLayout(options.appName ?? DEFAULT_APP_NAME);
    this.aggregateMode = options.aggregateMode ?? "mean";
    this.autoGenerateRecord = options.autoGenerateRecord ?? true;
    this.fields = options.fields ?? DEMO_FIELDS;
    if (this.fields.length === 0) {
      throw new Error("at least one field is needed");
    }
    this.#storage = options.storage;
    this.#ringSource = options.ringSource;
    this.#logger = options.logger ?? console;
  }

  get fieldNames(): string[] {
    return this.fields.map(({ name }) => name);
  }

  async observe(): Promise<Observation> {
    const { layout, identity } = this;
    const [record, firstKey, secondKey, masked, aggregate] = await Promise.all(
      [
        layout.privateRecord(identity),
        layout.key(identity, "first"),
        layout.key(identity, "second"),
        layout.masked(identity),
        layout.aggregate(identity),
      ].map((location) => this.#storage.exists(location)),
    );
    return { record, firstKey, secondKey, masked, aggregate };
  }

  /**
     Runs one invocation. Calls made while another is running wait
     for it to finish first.

     @throws `ConfigurationError` when the ring is unusable or does not
     contain this participant, `TransportError` when the medium fails,
     `MalformedArtifactError` when an artifact does not parse. Nothing
     half-computed is written before any of these.
   */
  invoke(): Promise<InvocationReport> {
    const run = this.#inFlight.then(() => this.invokeOnce());
    // a failure reaches the caller through `run`; the queue moves on
    this.#inFlight = run.catch(() => undefined);
    return run;
  }

  private async invokeOnce(): Promise<InvocationReport> {
    try {
      const observation = await this.observe();
      if (observation.aggregate) {
        this.#logger.info("aggregate already exists, nothing to do");
        return this.report("Aggregated", "aggregate already complete", {
          result: await this.readAggregate(),
        });
      }

      return await this.advance(await this.startRound(), observation);
    } catch (error) {
      this.#logger.error(`invocation failed: ${String(error)}`);
      throw error;
    }
  }

  private async startRound(): Promise<Round> {
    const ring = validateRing(await this.#ringSource.fetchRing());
    assertRingSize(ring);
    const neighbors = resolveNeighbors(ring, this.identity);
    this.#logger.info(
      `neighbors determined: previous=${neighbors.previous}, next=${neighbors.next}`,
    );
    return {
      ring,
      neighbors,
      keyExchange: new KeyExchange(
        this.#storage,
        this.layout,
        this.identity,
        neighbors,
        this.#logger,
      ),
    };
  }

  private async advance(
    round: Round,
    initial: Observation,
  ): Promise<InvocationReport> {
    let observation = initial;

    for (let step = 0; step < MAX_STEPS; step++) {
      const stage = stageOf(observation);
      const action: Action = nextAction(observation, {
        autoGenerateRecord: this.autoGenerateRecord,
      });
      this.#logger.debug(`stage ${stage}, next action ${action}`);

      switch (action) {
        case "done":
          return this.report(stage, "aggregate already complete", {
            result: await this.readAggregate(),
          });

        case "awaitRecord":
          // the key exchange proceeds without a record
          await round.keyExchange.advance();
          this.#logger.info(
            `no private record at ${this.layout.privateRecord(this.identity)}, waiting`,
          );
          return this.report(stage, "waiting on record");

        case "createRecord":
          await this.createRecord();
          break;

        case "exchangeKeys":
        case "awaitFirstKey":
          if ((await round.keyExchange.advance()) !== "KEYS_COMPLETE") {
            return this.report("KeysPending", "waiting on keys");
          }
          break;

        case "publishMasked":
          await this.publishMasked(round);
          break;

        case "aggregate": {
          const outcome = await aggregate(
            this.#storage,
            this.layout,
            round.ring,
            this.fieldNames,
            this.aggregateMode,
          );
          if (outcome.status === "pending") {
            this.#logger.info(
              `waiting for masked records from ${outcome.missing.join(", ")}`,
            );
            return this.report(stage, "waiting on participants", {
              missing: outcome.missing,
            });
          }
          await this.writeAggregate(outcome.result);
          return this.report("Aggregated", "aggregate complete", {
            result: outcome.result,
          });
        }
      }

      observation = await this.observe();
    }

    throw new Error(`no terminal state reached after ${MAX_STEPS} steps`);
  }

  private async createRecord(): Promise<void> {
    const location = this.layout.privateRecord(this.identity);
    await this.#storage.setPermissions(this.layout.privateDir(this.identity), {
      read: [this.identity],
      write: [this.identity],
    });
    await this.#storage.writeText(
      location,
      encodeRecord(generateRecord(this.fields)),
    );
    this.#logger.info(`generated private record at ${location}`);
  }

  private async publishMasked(round: Round): Promise<void> {
    const recordLocation = this.layout.privateRecord(this.identity);
    const text = await this.#storage.readText(recordLocation);
    if (text === undefined) {
      throw new Error(`private record at ${recordLocation} disappeared`);
    }
    const record = decodeRecord(text, recordLocation, this.fieldNames);
    const masked = await encrypt(record, await round.keyExchange.keys());

    const location = this.layout.masked(this.identity);
    await this.#storage.setPermissions(this.layout.publicDir(this.identity), {
      read: round.ring,
      write: [this.identity],
    });
    await this.#storage.writeText(location, encodeMasked(masked));
    this.#logger.info(`masked record published to ${location}`);
  }

  private async writeAggregate(result: AggregateResult): Promise<void> {
    const location = this.layout.aggregate(this.identity);
    await this.#storage.setPermissions(this.layout.privateDir(this.identity), {
      read: [this.identity],
      write: [this.identity],
    });
    await this.#storage.writeText(location, encodeAggregate(result));
    this.#logger.info(`aggregate (${result.mode}) saved to ${location}`);
  }

  private async readAggregate(): Promise<AggregateResult | undefined> {
    const location = this.layout.aggregate(this.identity);
    const text = await this.#storage.readText(location);
    return text === undefined ? undefined : decodeAggregate(text, location);
  }

  private report(
    stage: Stage,
    status: InvocationStatus,
    extra: Pick<InvocationReport, "missing" | "result"> = {},
  ): InvocationReport {
    this.#logger.info(`${this.identity}: ${status}`);
    return { identity: this.identity, stage, status, ...extra };
  }
}
