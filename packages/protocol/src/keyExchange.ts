import type { Storage } from "@ringsum/storage";
import type { Neighbors } from "@ringsum/ring";
import type { ArtifactLayout } from "./layout.js";
import type { Logger } from "./logger.js";
import { decodeKey, encodeKey } from "./encoding.js";
import { KeysNotReadyError } from "./errors.js";
import { randomKey } from "./mask.js";

export type KeyExchangeState = "NO_KEYS" | "SECOND_KEY_READY" | "KEYS_COMPLETE";

export interface Keys {
  /** deposited by the previous neighbor, added to this participant's values */
  first: bigint;
  /** generated here, subtracted from this participant's values and sent to the next neighbor */
  second: bigint;
}

/**
   One participant's half of the pairwise exchange around the ring:
   it creates its own second key and hands the same value to the next
   neighbor as that neighbor's first key, and it waits for the
   previous neighbor to do the same for it.
 */
export class KeyExchange {
  #storage: Storage;
  #layout: ArtifactLayout;
  #logger: Logger;
  readonly identity: string;
  readonly neighbors: Neighbors;

  constructor(
    storage: Storage,
    layout: ArtifactLayout,
    identity: string,
    neighbors: Neighbors,
    logger: Logger = console,
  ) {
    this.#storage = storage;
    this.#layout = layout;
    this.#logger = logger;
    this.identity = identity;
    this.neighbors = neighbors;
  }

  async state(): Promise<KeyExchangeState> {
    const [second, first] = await Promise.all([
      this.#storage.exists(this.#layout.key(this.identity, "second")),
      this.#storage.exists(this.#layout.key(this.identity, "first")),
    ]);
    if (!second) return "NO_KEYS";
    return first ? "KEYS_COMPLETE" : "SECOND_KEY_READY";
  }

  /**
     Moves the exchange as far as it can go right now. A second key
     that already exists is never replaced, since the next neighbor
     may already have masked with it; if it never reached the next
     neighbor, the stored value is delivered again.

     @throws `TransportError` when a permission change or write fails.
   */
  async advance(): Promise<KeyExchangeState> {
    const secondLocation = this.#layout.key(this.identity, "second");
    const stored = await this.#storage.readText(secondLocation);

    if (stored === undefined) {
      await this.restrictPermissions();
      const secret = randomKey();
      await this.#storage.writeText(secondLocation, encodeKey(secret));
      this.#logger.info(`created second key at ${secondLocation}`);
      await this.deliver(secret);
    } else {
      const deliveredTo = this.#layout.key(this.neighbors.next, "first");
      if (!(await this.#storage.exists(deliveredTo))) {
        this.#logger.warn(
          `second key never reached ${this.neighbors.next}; delivering it again`,
        );
        await this.deliver(decodeKey(stored, secondLocation));
      }
    }

    const state = await this.state();
    this.#logger.info(
      state === "KEYS_COMPLETE"
        ? "key exchange complete"
        : `key exchange incomplete, waiting on ${this.neighbors.previous}`,
    );
    return state;
  }

  /** @throws {@linkcode KeysNotReadyError} unless both keys are present */
  async keys(): Promise<Keys> {
    const firstLocation = this.#layout.key(this.identity, "first");
    const secondLocation = this.#layout.key(this.identity, "second");
    const [first, second] = await Promise.all([
      this.#storage.readText(firstLocation),
      this.#storage.readText(secondLocation),
    ]);

    if (first === undefined || second === undefined) {
      const missing: ("first" | "second")[] = [];
      if (first === undefined) missing.push("first");
      if (second === undefined) missing.push("second");
      throw new KeysNotReadyError(missing);
    }

    return {
      first: decodeKey(first, firstLocation),
      second: decodeKey(second, secondLocation),
    };
  }

  /** Narrows both key locations before any secret is written to them. */
  private async restrictPermissions(): Promise<void> {
    const { next } = this.neighbors;
    await this.#storage.setPermissions(this.#layout.keyDir(next, "first"), {
      read: [next],
      write: [this.identity],
    });
    await this.#storage.setPermissions(
      this.#layout.keyDir(this.identity, "second"),
      { read: [this.identity], write: [this.identity] },
    );
    this.#logger.debug("key folder permissions set");
  }

  private async deliver(secret: bigint): Promise<void> {
    const location = this.#layout.key(this.neighbors.next, "first");
    await this.#storage.writeText(location, encodeKey(secret));
    this.#logger.info(`sent second key to ${location}`);
  }
}
