import { TransportError } from "@ringsum/common";
import type { Permissions, Storage } from "./storage.js";
import { ancestry, locationSegments, ownerOf } from "./storage.js";

export type Operation =
  | {
      kind: "write";
      identity: string;
      location: string;
      text: string;
      /** everyone able to read the location at the moment it was written */
      readers: string[];
    }
  | {
      kind: "setPermissions";
      identity: string;
      location: string;
      permissions: Permissions;
    };

/**
   An in-process stand-in for the synchronised medium shared by a
   whole ring. Each participant gets its own {@linkcode Storage} view
   from {@linkcode MemoryMedium.storageFor}, which only sees what the
   access rules let that identity see.

   The owner of a location (its first segment) can always read and
   write it. Anyone else needs to be named by the nearest rule at or
   above the location. A location without a rule of its own that only
   falls under the owner's default may be claimed by any identity
   setting permissions on it.
 */
export class MemoryMedium {
  #files = new Map<string, string>();
  #rules = new Map<string, Permissions>();
  #failingWrites = new Set<string>();
  readonly log: Operation[] = [];

  storageFor(identity: string): Storage {
    return new MemoryStorage(this, identity);
  }

  /** the rule in force at `location`, if any rule governs it */
  ruleAt(location: string): Permissions | undefined {
    for (const candidate of ancestry(location)) {
      const rule = this.#rules.get(candidate);
      if (rule) return rule;
    }
    return undefined;
  }

  readersOf(location: string): string[] {
    const readers = new Set([ownerOf(location)]);
    for (const reader of this.ruleAt(location)?.read ?? []) readers.add(reader);
    return [...readers].sort();
  }

  canRead(identity: string, location: string): boolean {
    return this.readersOf(location).includes(identity);
  }

  canWrite(identity: string, location: string): boolean {
    return (
      identity === ownerOf(location) ||
      (this.ruleAt(location)?.write.includes(identity) ?? false)
    );
  }

  /** Makes every later write to `location` fail, as a broken link would. */
  failWritesTo(location: string): void {
    this.#failingWrites.add(location);
  }

  restoreWrites(): void {
    this.#failingWrites.clear();
  }

  /** @internal */
  read(identity: string, location: string): string | undefined {
    if (!this.canRead(identity, location)) return undefined;
    return this.#files.get(location);
  }

  /** @internal */
  write(identity: string, location: string, text: string): void {
    locationSegments(location);
    if (this.#failingWrites.has(location)) {
      throw new TransportError("write failed", location);
    }
    if (!this.canWrite(identity, location)) {
      throw new TransportError(`${identity} may not write`, location);
    }
    this.#files.set(location, text);
    this.log.push({
      kind: "write",
      identity,
      location,
      text,
      readers: this.readersOf(location),
    });
  }

  /** @internal */
  exists(identity: string, location: string): boolean {
    if (!this.canRead(identity, location) && !this.canWrite(identity, location))
      return false;
    if (this.#files.has(location)) return true;
    const prefix = `${location}/`;
    for (const key of this.#files.keys()) {
      if (key.startsWith(prefix)) return true;
    }
    return false;
  }

  /** @internal */
  setPermissions(
    identity: string,
    location: string,
    permissions: Permissions,
  ): void {
    const unclaimed = this.ruleAt(location) === undefined;
    if (!unclaimed && !this.canWrite(identity, location)) {
      throw new TransportError(
        `${identity} may not change permissions`,
        location,
      );
    }
    const rule = {
      read: [...permissions.read],
      write: [...permissions.write],
    };
    this.#rules.set(location, rule);
    this.log.push({
      kind: "setPermissions",
      identity,
      location,
      permissions: rule,
    });
  }
}

class MemoryStorage implements Storage {
  constructor(
    private medium: MemoryMedium,
    readonly identity: string,
  ) {}

  readText(location: string): Promise<string | undefined> {
    return Promise.resolve(this.medium.read(this.identity, location));
  }

  writeText(location: string, text: string): Promise<void> {
    try {
      this.medium.write(this.identity, location, text);
      return Promise.resolve();
    } catch (error) {
      return Promise.reject(error);
    }
  }

  exists(location: string): Promise<boolean> {
    return Promise.resolve(this.medium.exists(this.identity, location));
  }

  setPermissions(location: string, permissions: Permissions): Promise<void> {
    try {
      this.medium.setPermissions(this.identity, location, permissions);
      return Promise.resolve();
    } catch (error) {
      return Promise.reject(error);
    }
  }
}
