import { mkdir, readFile, rename, rm, stat, writeFile } from "node:fs/promises";
import * as path from "node:path";
import { TransportError, randomBytes } from "@ringsum/common";
import type { Permissions, Storage } from "./storage.js";
import { locationSegments } from "./storage.js";

/** name of the rule file written into a directory by `setPermissions` */
export const PERMISSION_FILE = "_.perm.json";

function isNotFound(error: unknown): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    (error.code === "ENOENT" || error.code === "ENOTDIR")
  );
}

/**
   Keeps artifacts under a local directory that an external sync
   client mirrors between participants. Access rules are left for the
   sync client to enforce as `_.perm.json` files.
 */
export class FileSystemStorage implements Storage {
  readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  resolve(location: string): string {
    return path.join(this.root, ...locationSegments(location));
  }

  async readText(location: string): Promise<string | undefined> {
    try {
      return await readFile(this.resolve(location), "utf-8");
    } catch (error) {
      if (isNotFound(error)) return undefined;
      throw new TransportError("read failed", location, { cause: error });
    }
  }

  async writeText(location: string, text: string): Promise<void> {
    const target = this.resolve(location);
    // written beside the target and renamed over it so readers never see a partial value
    const temporary = `${target}.${Buffer.from(randomBytes(6)).toString("hex")}.tmp`;
    try {
      await mkdir(path.dirname(target), { recursive: true });
      await writeFile(temporary, text, "utf-8");
      await rename(temporary, target);
    } catch (error) {
      await rm(temporary, { force: true });
      throw new TransportError("write failed", location, { cause: error });
    }
  }

  async exists(location: string): Promise<boolean> {
    try {
      await stat(this.resolve(location));
      return true;
    } catch (error) {
      if (isNotFound(error)) return false;
      throw new TransportError("stat failed", location, { cause: error });
    }
  }

  async setPermissions(
    location: string,
    permissions: Permissions,
  ): Promise<void> {
    const rule = {
      read: [...permissions.read],
      write: [...permissions.write],
    };
    await this.writeText(
      `${location}/${PERMISSION_FILE}`,
      JSON.stringify(rule, null, 2),
    );
  }
}
