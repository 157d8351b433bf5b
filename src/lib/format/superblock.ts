/**
 * XFS superblock codec
 *
 * Only the fields the recovery scanner inspects are modelled. All numeric
 * fields are big-endian, as on a real XFS volume:
 *
 * ```
 * [0-3]    magic "XFSB" (uint32 BE 0x58465342)
 * [4-7]    block size in bytes (uint32 BE)
 * [8-15]   data block count (uint64 BE)
 * [84-87]  blocks per allocation group (uint32 BE)
 * [88-91]  allocation group count (uint32 BE)
 * [94-95]  inode size (uint16 BE)
 * ```
 *
 * Every other byte of the 4096-byte header region is zero.
 */

import { HEADER_SIZE, XFS_MAGIC_BYTES } from "./constants.ts";
import {
  FieldRangeError,
  HeaderTooShortError,
  ImageFormatError,
} from "../utils/errors.ts";

export interface Superblock {
  magic: number;
  blockSize: number;
  /** Logical block count; `dataBlockCount * blockSize` is the claimed size */
  dataBlockCount: bigint;
  allocationGroupBlockCount: number;
  allocationGroupCount: number;
  inodeSize: number;
}

export type SuperblockField = keyof Superblock;

export interface FieldLayout {
  offset: number;
  /** Width in bytes */
  width: 2 | 4 | 8;
}

export const SUPERBLOCK_LAYOUT: Readonly<Record<SuperblockField, FieldLayout>> =
  {
    magic: { offset: 0, width: 4 },
    blockSize: { offset: 4, width: 4 },
    dataBlockCount: { offset: 8, width: 8 },
    allocationGroupBlockCount: { offset: 84, width: 4 },
    allocationGroupCount: { offset: 88, width: 4 },
    inodeSize: { offset: 94, width: 2 },
  };

export const SUPERBLOCK_FIELDS: readonly SuperblockField[] = [
  "magic",
  "blockSize",
  "dataBlockCount",
  "allocationGroupBlockCount",
  "allocationGroupCount",
  "inodeSize",
];

export interface Geometry {
  dataBlockCount: bigint;
  allocationGroupBlockCount: number;
}

/**
 * Derive block and allocation group counts for a logical size.
 * An allocation group count of zero puts every block in a single group.
 */
export function computeGeometry(
  logicalSizeBytes: number,
  blockSize: number,
  allocationGroupCount: number,
): Geometry {
  const dataBlockCount =
    BigInt(Math.floor(logicalSizeBytes)) / BigInt(blockSize);
  const groupBlocks =
    allocationGroupCount > 0
      ? dataBlockCount / BigInt(allocationGroupCount)
      : dataBlockCount;

  return {
    dataBlockCount,
    allocationGroupBlockCount: Number(groupBlocks),
  };
}

export class SuperblockCodec {
  /**
   * Build the 4096-byte header region for a superblock
   * @throws FieldRangeError when a value does not fit its field
   */
  static build(superblock: Superblock): Buffer {
    const header = Buffer.alloc(HEADER_SIZE);

    for (const field of SUPERBLOCK_FIELDS) {
      this.writeField(header, field, superblock[field]);
    }

    return header;
  }

  /**
   * Decode the superblock fields from the start of an image
   * @throws HeaderTooShortError when the buffer does not hold a full header region
   */
  static parse(data: Buffer): Superblock {
    this.requireHeader(data);

    return {
      magic: Number(this.readField(data, "magic")),
      blockSize: Number(this.readField(data, "blockSize")),
      dataBlockCount: this.readField(data, "dataBlockCount"),
      allocationGroupBlockCount: Number(
        this.readField(data, "allocationGroupBlockCount"),
      ),
      allocationGroupCount: Number(
        this.readField(data, "allocationGroupCount"),
      ),
      inodeSize: Number(this.readField(data, "inodeSize")),
    };
  }

  /**
   * Overwrite selected fields in place, leaving every other byte untouched.
   * All values are range-checked before the first byte is written.
   */
  static patch(data: Buffer, changes: Partial<Superblock>): void {
    this.requireHeader(data);

    const scratch = Buffer.alloc(HEADER_SIZE);
    const fields = SUPERBLOCK_FIELDS.filter(
      (field) => changes[field] !== undefined,
    );

    for (const field of fields) {
      const value = changes[field];
      if (value !== undefined) {
        this.writeField(scratch, field, value);
      }
    }

    for (const field of fields) {
      const { offset, width } = SUPERBLOCK_LAYOUT[field];
      scratch.copy(data, offset, offset, offset + width);
    }
  }

  /**
   * Check for the XFS signature at offset 0
   */
  static hasMagic(data: Buffer): boolean {
    if (data.length < XFS_MAGIC_BYTES.length) {
      return false;
    }
    return data.subarray(0, XFS_MAGIC_BYTES.length).equals(XFS_MAGIC_BYTES);
  }

  /**
   * Decode a header region, rejecting anything that is not a usable image.
   * The signature is checked before the length.
   *
   * @throws ImageFormatError when the signature does not match or the block size is zero
   * @throws HeaderTooShortError when the buffer does not hold a full header region
   */
  static validate(data: Buffer): Superblock {
    if (!this.hasMagic(data)) {
      const found = data.subarray(0, XFS_MAGIC_BYTES.length).toString("hex");
      throw new ImageFormatError(
        `Not a valid XFS image (magic: 0x${found.padStart(8, "0")})`,
        found,
      );
    }

    const superblock = this.parse(data);
    if (superblock.blockSize === 0) {
      throw new ImageFormatError("Invalid XFS image: block size is zero");
    }
    return superblock;
  }

  private static requireHeader(data: Buffer): void {
    if (data.length < HEADER_SIZE) {
      throw new HeaderTooShortError(data.length, HEADER_SIZE);
    }
  }

  private static readField(data: Buffer, field: SuperblockField): bigint {
    const { offset, width } = SUPERBLOCK_LAYOUT[field];

    switch (width) {
      case 2:
        return BigInt(data.readUInt16BE(offset));
      case 4:
        return BigInt(data.readUInt32BE(offset));
      case 8:
        return data.readBigUInt64BE(offset);
    }
  }

  private static writeField(
    target: Buffer,
    field: SuperblockField,
    value: number | bigint,
  ): void {
    const { offset, width } = SUPERBLOCK_LAYOUT[field];

    if (typeof value === "number" && !Number.isInteger(value)) {
      throw new FieldRangeError(
        field,
        `${field} must be an integer, got ${value}`,
      );
    }

    const encoded = BigInt(value);
    const max = (1n << BigInt(width * 8)) - 1n;
    if (encoded < 0n || encoded > max) {
      throw new FieldRangeError(
        field,
        `${field} value ${encoded} does not fit in ${width} bytes`,
      );
    }

    switch (width) {
      case 2:
        target.writeUInt16BE(Number(encoded), offset);
        break;
      case 4:
        target.writeUInt32BE(Number(encoded), offset);
        break;
      case 8:
        target.writeBigUInt64BE(encoded, offset);
        break;
    }
  }
}
