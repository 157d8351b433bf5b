import { open } from "node:fs/promises";
import { XFS_MAGIC } from "../format/constants.ts";
import type { ImageConfig } from "../format/interfaces/index.ts";
import { DEFAULT_IMAGE_CONFIG } from "../format/interfaces/index.ts";
import { seedEnd, validateSeedTable } from "../format/seed-table.ts";
import type { SeedEntry } from "../format/seed-table.ts";
import { SuperblockCodec, computeGeometry } from "../format/superblock.ts";
import type { Superblock } from "../format/superblock.ts";
import { LogEventType, logger } from "../utils/logger.ts";

export interface BuildResult {
  path: string;
  /** Physical and logical length of the file in bytes */
  logicalSize: number;
  superblock: Superblock;
  /** Seeds whose payload lies entirely inside the file */
  seeds: SeedEntry[];
}

/**
 * Writes new XFS-looking images: a synthetic superblock, the seed
 * payloads, and a sparse tail up to the requested logical size.
 */
export class ImageBuilder {
  private config: ImageConfig;

  constructor(config?: ImageConfig) {
    this.config = config ?? DEFAULT_IMAGE_CONFIG;
    validateSeedTable(this.config.seeds);
  }

  /**
   * Superblock record describing an image of the given logical size
   */
  describe(logicalSizeBytes: number): Superblock {
    const { blockSize, allocationGroupCount, inodeSize } = this.config;
    const geometry = computeGeometry(
      logicalSizeBytes,
      blockSize,
      allocationGroupCount,
    );

    return {
      magic: XFS_MAGIC,
      blockSize,
      dataBlockCount: geometry.dataBlockCount,
      allocationGroupBlockCount: geometry.allocationGroupBlockCount,
      allocationGroupCount,
      inodeSize,
    };
  }

  /**
   * Encoded 4096-byte header region for an image of the given logical size
   */
  buildHeader(logicalSizeBytes: number): Buffer {
    return SuperblockCodec.build(this.describe(logicalSizeBytes));
  }

  /**
   * Create (or replace) the image at `path`.
   *
   * The file is extended to `logicalSizeBytes` with ftruncate, so the
   * region after the last seed is a hole: it occupies no storage and reads
   * back as zeros. A size smaller than the written content cuts it off.
   */
  async create(path: string, logicalSizeBytes: number): Promise<BuildResult> {
    const superblock = this.describe(logicalSizeBytes);
    const header = SuperblockCodec.build(superblock);

    logger.info(
      `Creating ${path} (${logicalSizeBytes} bytes)`,
      LogEventType.IMAGE_CREATE_START,
      { path, logicalSize: logicalSizeBytes },
    );

    const handle = await open(path, "w");
    try {
      await handle.write(header, 0, header.length, 0);
      logger.debug(
        `Wrote ${header.length}-byte superblock`,
        LogEventType.HEADER_WRITTEN,
        { blockCount: superblock.dataBlockCount.toString() },
      );

      for (const seed of this.config.seeds) {
        await handle.write(seed.payload, 0, seed.payload.length, seed.offset);
        logger.debug(
          `Seeded ${seed.label} at offset ${seed.offset} (${seed.payload.length} bytes)`,
        );
      }
      logger.debug(
        `Wrote ${this.config.seeds.length} seed blocks`,
        LogEventType.SEEDS_WRITTEN,
      );

      await handle.truncate(logicalSizeBytes);
      logger.debug(
        `Extended file to ${logicalSizeBytes} bytes`,
        LogEventType.IMAGE_EXTENDED,
      );
    } finally {
      await handle.close();
    }

    logger.info(`Created XFS test image: ${path}`);

    return {
      path,
      logicalSize: logicalSizeBytes,
      superblock,
      seeds: this.config.seeds.filter(
        (seed) => seedEnd(seed) <= logicalSizeBytes,
      ),
    };
  }
}

/**
 * Create an image at `path` with the default geometry and seed table
 */
export function createImage(
  path: string,
  logicalSizeBytes: number,
  config?: ImageConfig,
): Promise<BuildResult> {
  return new ImageBuilder(config).create(path, logicalSizeBytes);
}
