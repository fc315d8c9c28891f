export type { Storage, Permissions } from "./storage.js";
export {
  joinLocation,
  ownerOf,
  ancestry,
  locationSegments,
} from "./storage.js";
export { FileSystemStorage, PERMISSION_FILE } from "./fileSystem.js";
export { MemoryMedium } from "./memory.js";
export type { Operation } from "./memory.js";
