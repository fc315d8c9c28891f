import { ConfigurationError } from "@ringsum/common";
import { RingFetchError } from "./errors.js";
import { validateRing } from "./ring.js";

type Fetch = (input: string, init?: RequestInit) => Promise<Response>;

/**
   Publishes the current ring membership. Membership may change
   between calls, so consumers fetch it on every invocation rather
   than caching it.
 */
export interface RingSource {
  fetchRing(): Promise<string[]>;
}

export class StaticRingSource implements RingSource {
  #ring: string[];

  constructor(ring: readonly string[]) {
    this.#ring = validateRing(ring);
  }

  fetchRing(): Promise<string[]> {
    return Promise.resolve([...this.#ring]);
  }
}

/** Reads `{ "ring": [...] }` documents from a URL. */
export class HttpRingSource implements RingSource {
  #url: URL;
  #fetch: Fetch = globalThis.fetch.bind(globalThis);

  constructor(url: string | URL) {
    this.#url = new URL(url);
  }

  /** @internal */
  //this exists for testing, and should not be considered part of the public api.
  set fetch(fetch: Fetch) {
    this.#fetch = fetch;
  }

  get url(): URL {
    return this.#url;
  }

  async fetchRing(): Promise<string[]> {
    const url = this.#url.toString();
    let response: Response;
    try {
      response = await this.#fetch(url, {
        headers: { Accept: "application/json" },
      });
    } catch (error) {
      throw new RingFetchError("ring request failed", url, { cause: error });
    }

    if (!response.ok) {
      throw new RingFetchError(
        `ring request received a ${response.status} response`,
        url,
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new RingFetchError("ring document is not valid JSON", url, {
        cause: error,
      });
    }
    return parseRingDocument(body);
  }
}

export function parseRingDocument(body: unknown): string[] {
  if (typeof body !== "object" || Array.isArray(body) || body === null) {
    throw new ConfigurationError("ring document is not an object");
  }
  if (!("ring" in body)) {
    throw new ConfigurationError("ring document has no ring");
  }
  return validateRing(body.ring);
}
