/** Who may read and who may write everything at and below a location. */
export interface Permissions {
  read: readonly string[];
  write: readonly string[];
}

/**
   The narrow view of the synchronised medium that a participant
   works through. Locations are `/`-separated logical paths whose
   first segment is the identity that owns them.

   A value written with {@linkcode Storage.writeText} becomes visible
   to readers whole or not at all.
 */
export interface Storage {
  /** resolves to `undefined` when nothing is visible at `location` */
  readText(location: string): Promise<string | undefined>;
  writeText(location: string, text: string): Promise<void>;
  exists(location: string): Promise<boolean>;
  /**
     Applies `permissions` to the directory at `location` and
     everything below it. Must be called before the secrets it
     protects are written.
   */
  setPermissions(location: string, permissions: Permissions): Promise<void>;
}

export function locationSegments(location: string): string[] {
  const segments = location.split("/");
  for (const segment of segments) {
    if (
      segment.length === 0 ||
      segment === "." ||
      segment === ".." ||
      segment.includes("\\")
    ) {
      throw new Error(`invalid location "${location}"`);
    }
  }
  return segments;
}

export function joinLocation(...parts: string[]): string {
  const location = parts.join("/");
  locationSegments(location);
  return location;
}

export function ownerOf(location: string): string {
  return locationSegments(location)[0];
}

/** the location itself followed by each of its ancestors, nearest first */
export function ancestry(location: string): string[] {
  const segments = locationSegments(location);
  const result: string[] = [];
  for (let i = segments.length; i > 0; i--) {
    result.push(segments.slice(0, i).join("/"));
  }
  return result;
}
