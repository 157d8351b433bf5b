import type { CliDefaults, ImageConfig, InflateConfig } from "./config.ts";
import { MIN_PHYSICAL_SIZE } from "../constants.ts";
import { SEED_TABLE } from "../seed-table.ts";

/**
 * Default geometry for generated images
 *
 * - blockSize: 4096 - the usual XFS allocation unit
 * - allocationGroupCount: 4 - what mkfs.xfs picks for small volumes
 * - inodeSize: 256 - v4 inode record size
 */
export const DEFAULT_IMAGE_CONFIG: ImageConfig = {
  blockSize: 4096,
  allocationGroupCount: 4,
  inodeSize: 256,
  seeds: SEED_TABLE,
};

export const DEFAULT_INFLATE_CONFIG: InflateConfig = {
  minPhysicalSize: MIN_PHYSICAL_SIZE,
};

/**
 * Command line defaults
 *
 * A 150 GiB inflated image is large enough to push the scanner past its
 * 100 GB threshold.
 */
export const DEFAULT_CLI_DEFAULTS: CliDefaults = {
  imagePath: "test-data/test-xfs.img",
  inflatedPath: "test-data/large-xfs-test.img",
  sizeMb: 50,
  targetGb: 150,
  minPhysicalMb: 100,
};
