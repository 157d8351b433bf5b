import { readFile, writeFile } from "node:fs/promises";
import type { InflateConfig } from "../format/interfaces/index.ts";
import { DEFAULT_INFLATE_CONFIG } from "../format/interfaces/index.ts";
import { SuperblockCodec, computeGeometry } from "../format/superblock.ts";
import type { Superblock } from "../format/superblock.ts";
import { LogEventType, logger } from "../utils/logger.ts";

export interface InflateResult {
  inputPath: string;
  outputPath: string;
  previous: Superblock;
  superblock: Superblock;
  inputSize: number;
  outputSize: number;
}

/**
 * Rewrites the superblock of an existing image so it claims a larger
 * logical size, without growing the file to match.
 */
export class SizeInflator {
  private config: InflateConfig;

  constructor(config?: InflateConfig) {
    this.config = config ?? DEFAULT_INFLATE_CONFIG;
  }

  /**
   * Apply the new size to an image held in memory.
   *
   * The header fields are patched in place; the returned buffer is the
   * same one when no padding is needed.
   *
   * @throws ImageFormatError when the signature does not match or the block size is zero
   * @throws HeaderTooShortError when the buffer is shorter than the header region
   */
  inflateBuffer(
    data: Buffer,
    targetLogicalSizeBytes: number,
  ): { data: Buffer; previous: Superblock; superblock: Superblock } {
    const previous = SuperblockCodec.validate(data);
    logger.debug(
      `Signature verified, block size ${previous.blockSize}, ${previous.dataBlockCount} blocks`,
      LogEventType.MAGIC_VERIFIED,
      {
        blockSize: previous.blockSize,
        blockCount: previous.dataBlockCount.toString(),
      },
    );

    const geometry = computeGeometry(
      targetLogicalSizeBytes,
      previous.blockSize,
      previous.allocationGroupCount,
    );
    SuperblockCodec.patch(data, geometry);

    const superblock: Superblock = { ...previous, ...geometry };
    logger.debug(
      `Block count ${previous.dataBlockCount} -> ${superblock.dataBlockCount}, AG blocks ${previous.allocationGroupBlockCount} -> ${superblock.allocationGroupBlockCount}`,
      LogEventType.HEADER_REWRITTEN,
    );

    let output = data;
    if (output.length < this.config.minPhysicalSize) {
      output = Buffer.concat(
        [output, Buffer.alloc(this.config.minPhysicalSize - output.length)],
        this.config.minPhysicalSize,
      );
      logger.debug(
        `Padded to ${output.length} bytes physical size`,
        LogEventType.IMAGE_PADDED,
      );
    }

    return { data: output, previous, superblock };
  }

  /**
   * Read `inputPath`, rewrite its size fields and write the result to
   * `outputPath`. Nothing is written if the input is rejected.
   */
  async inflate(
    inputPath: string,
    outputPath: string,
    targetLogicalSizeBytes: number,
  ): Promise<InflateResult> {
    const data = await readFile(inputPath);
    const inputSize = data.length;
    logger.debug(
      `Read ${inputSize} bytes from ${inputPath}`,
      LogEventType.IMAGE_READ,
    );

    const inflated = this.inflateBuffer(data, targetLogicalSizeBytes);

    await writeFile(outputPath, inflated.data);
    logger.info(
      `Created: ${outputPath} (${inflated.data.length} bytes physical)`,
      LogEventType.IMAGE_WRITTEN,
      { path: outputPath, size: inflated.data.length },
    );

    return {
      inputPath,
      outputPath,
      previous: inflated.previous,
      superblock: inflated.superblock,
      inputSize,
      outputSize: inflated.data.length,
    };
  }
}

/**
 * Inflate an image with the default 100 MiB physical floor
 */
export function inflateImage(
  inputPath: string,
  outputPath: string,
  targetLogicalSizeBytes: number,
  config?: InflateConfig,
): Promise<InflateResult> {
  return new SizeInflator(config).inflate(
    inputPath,
    outputPath,
    targetLogicalSizeBytes,
  );
}
