// Constants
export * from "./constants.ts";

// Interfaces and configs
export * from "./interfaces/index.ts";

// Superblock schema and codec
export {
  SuperblockCodec,
  SUPERBLOCK_FIELDS,
  SUPERBLOCK_LAYOUT,
  computeGeometry,
  type FieldLayout,
  type Geometry,
  type Superblock,
  type SuperblockField,
} from "./superblock.ts";

// Seed content
export {
  SEED_TABLE,
  matchesSeed,
  seedEnd,
  validateSeedTable,
  type SeedEntry,
  type SeedKind,
} from "./seed-table.ts";

export { gigabytesToBytes, logicalSizeOf, megabytesToBytes } from "./units.ts";
