import { BYTES_PER_GIB, BYTES_PER_MIB } from "./constants.ts";

export function megabytesToBytes(megabytes: number): number {
  return megabytes * BYTES_PER_MIB;
}

export function gigabytesToBytes(gigabytes: number): number {
  return gigabytes * BYTES_PER_GIB;
}

/**
 * Logical size claimed by a superblock, in bytes
 */
export function logicalSizeOf(superblock: {
  blockSize: number;
  dataBlockCount: bigint;
}): bigint {
  return superblock.dataBlockCount * BigInt(superblock.blockSize);
}
