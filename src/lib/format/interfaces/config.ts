import type { SeedEntry } from "../seed-table.ts";

/**
 * Geometry and content settings for newly built images
 */
export interface ImageConfig {
  /**
   * Allocation unit size in bytes, written to the block size field
   */
  blockSize: number;

  /**
   * Number of allocation groups the data blocks are split across
   *
   * Blocks per group is derived as `dataBlockCount / allocationGroupCount`
   */
  allocationGroupCount: number;

  /**
   * Size of one inode record in bytes
   */
  inodeSize: number;

  /**
   * Recoverable payloads written beyond the header region
   */
  seeds: readonly SeedEntry[];
}

/**
 * Settings for the size inflator
 */
export interface InflateConfig {
  /**
   * Minimum physical size in bytes of an inflated image
   *
   * Smaller inputs are zero-extended in memory up to this size before
   * being written, so the file has a plausible footprint.
   */
  minPhysicalSize: number;
}

/**
 * Values used by the command line when an option is omitted
 */
export interface CliDefaults {
  /** Output of `create` and input of `inflate` */
  imagePath: string;

  /** Output of `inflate` */
  inflatedPath: string;

  /** Logical size of a new image in MiB */
  sizeMb: number;

  /** Logical size an image is inflated to in GiB */
  targetGb: number;

  /** Physical floor of an inflated image in MiB */
  minPhysicalMb: number;
}
