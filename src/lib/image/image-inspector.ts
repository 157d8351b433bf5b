import { open } from "node:fs/promises";
import { HEADER_SIZE } from "../format/constants.ts";
import { SEED_TABLE, matchesSeed, seedEnd } from "../format/seed-table.ts";
import type { SeedEntry, SeedKind } from "../format/seed-table.ts";
import { SuperblockCodec } from "../format/superblock.ts";
import type { Superblock } from "../format/superblock.ts";
import { logicalSizeOf } from "../format/units.ts";
import { HeaderTooShortError } from "../utils/errors.ts";
import { LogEventType, logger } from "../utils/logger.ts";

export interface SeedPresence {
  label: string;
  kind: SeedKind;
  offset: number;
  present: boolean;
}

export interface InspectionReport {
  path: string;
  physicalSize: number;
  /** `dataBlockCount * blockSize` as claimed by the header */
  logicalSize: bigint;
  superblock: Superblock;
  seeds: SeedPresence[];
}

/**
 * Decode the superblock of an image and check each seed payload at its
 * offset. Only the header region and the seed regions are read.
 */
export async function inspectImage(
  path: string,
  seeds: readonly SeedEntry[] = SEED_TABLE,
): Promise<InspectionReport> {
  const handle = await open(path, "r");
  try {
    const { size } = await handle.stat();
    if (size < HEADER_SIZE) {
      throw new HeaderTooShortError(size, HEADER_SIZE);
    }

    const header = Buffer.alloc(HEADER_SIZE);
    await handle.read(header, 0, HEADER_SIZE, 0);
    logger.debug(`Read header of ${path}`, LogEventType.IMAGE_READ);

    const superblock = SuperblockCodec.validate(header);
    logger.debug("Signature verified", LogEventType.MAGIC_VERIFIED);

    const presence: SeedPresence[] = [];
    for (const seed of seeds) {
      let present = false;
      if (seedEnd(seed) <= size) {
        const region = Buffer.alloc(seed.payload.length);
        await handle.read(region, 0, region.length, seed.offset);
        present = matchesSeed(seed, region);
      }
      presence.push({
        label: seed.label,
        kind: seed.kind,
        offset: seed.offset,
        present,
      });
    }

    return {
      path,
      physicalSize: size,
      logicalSize: logicalSizeOf(superblock),
      superblock,
      seeds: presence,
    };
  } finally {
    await handle.close();
  }
}
