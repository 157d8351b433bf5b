/**
 * XFS superblock magic number, "XFSB" when written big-endian
 */
export const XFS_MAGIC = 0x58465342;

/**
 * Signature bytes as they appear at offset 0 of every image
 */
export const XFS_MAGIC_BYTES = Buffer.from("XFSB", "ascii");

/**
 * Size of the superblock header region in bytes (4096 bytes)
 *
 * Every field lives inside this region; the remainder is zero-filled.
 */
export const HEADER_SIZE = 4096;

export const BYTES_PER_MIB = 1024 * 1024;
export const BYTES_PER_GIB = 1024 * 1024 * 1024;

/**
 * Physical size an inflated image is zero-extended to when smaller (100 MiB)
 */
export const MIN_PHYSICAL_SIZE = 100 * BYTES_PER_MIB;
