import { joinLocation } from "@ringsum/storage";

export type KeySlot = "first" | "second";

/**
   Where each participant's artifacts live on the shared medium. Every
   location starts with the identity that owns it.
 */
export class ArtifactLayout {
  readonly appName: string;

  constructor(appName: string) {
    this.appName = joinLocation(appName);
  }

  /** readable and writable by the owner only */
  privateDir(identity: string): string {
    return joinLocation(identity, "private", this.appName);
  }

  privateRecord(identity: string): string {
    return joinLocation(this.privateDir(identity), "my_data.json");
  }

  aggregate(identity: string): string {
    return joinLocation(this.privateDir(identity), "aggregate_data.json");
  }

  keyDir(identity: string, slot: KeySlot): string {
    return joinLocation(identity, "app_pipelines", this.appName, slot);
  }

  key(identity: string, slot: KeySlot): string {
    return joinLocation(this.keyDir(identity, slot), "key.txt");
  }

  /** readable by the whole ring */
  publicDir(identity: string): string {
    return joinLocation(identity, "public", this.appName);
  }

  masked(identity: string): string {
    return joinLocation(this.publicDir(identity), "encrypted_data.json");
  }
}
