import { HEADER_SIZE } from "./constants.ts";
import { SeedLayoutError } from "../utils/errors.ts";

export type SeedKind = "text" | "json" | "config" | "png" | "jpeg";

/**
 * A payload placed at a fixed offset to simulate a deleted file
 */
export interface SeedEntry {
  /** File name the scanner is expected to report */
  label: string;
  kind: SeedKind;
  /** Absolute byte offset in the image, beyond the header region */
  offset: number;
  payload: Buffer;
}

const text = (value: string): Buffer => Buffer.from(value, "utf-8");

/**
 * Recoverable content written into every generated image.
 *
 * Entries sit on 4 KiB block boundaries starting at block 2, one per block.
 */
export const SEED_TABLE: readonly SeedEntry[] = [
  {
    label: "document.txt",
    kind: "text",
    offset: 8192,
    payload: text(
      "Field notes for the spring survey.\nThree sites visited, two pending.\nWritten by the fixture generator.\n",
    ),
  },
  {
    label: "inventory.json",
    kind: "json",
    offset: 12288,
    payload: text(
      '{"items": [{"sku": "A-100", "qty": 12}, {"sku": "B-200", "qty": 0}], "meta": {"warehouse": "north"}}',
    ),
  },
  {
    label: "settings.ini",
    kind: "config",
    offset: 16384,
    payload: text(
      "[Settings]\nversion=1.0\ndebug=true\nmax_files=1000\n\n[Database]\nhost=localhost\nport=5432\n",
    ),
  },
  {
    label: "image.png",
    kind: "png",
    offset: 20480,
    // Signature followed by the start of an IHDR chunk for a 16x16 image
    payload: Buffer.from([
      0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x00, 0x00, 0x00, 0x0d,
      0x49, 0x48, 0x44, 0x52, 0x00, 0x00, 0x00, 0x10, 0x00, 0x00, 0x00, 0x10,
    ]),
  },
  {
    label: "photo.jpg",
    kind: "jpeg",
    offset: 24576,
    // SOI + APP0 "JFIF"
    payload: Buffer.from([
      0xff, 0xd8, 0xff, 0xe0, 0x00, 0x10, 0x4a, 0x46, 0x49, 0x46,
    ]),
  },
];

/**
 * End offset (exclusive) of a seed's payload
 */
export function seedEnd(entry: SeedEntry): number {
  return entry.offset + entry.payload.length;
}

/**
 * Check that no entry overlaps the header region or another entry
 * and that labels are unique.
 * @throws SeedLayoutError describing the first conflict found
 */
export function validateSeedTable(entries: readonly SeedEntry[]): void {
  const labels = new Set<string>();

  for (const entry of entries) {
    if (labels.has(entry.label)) {
      throw new SeedLayoutError(`Duplicate seed label: ${entry.label}`);
    }
    labels.add(entry.label);

    if (entry.offset < HEADER_SIZE) {
      throw new SeedLayoutError(
        `Seed ${entry.label} at offset ${entry.offset} overlaps the ${HEADER_SIZE}-byte header region`,
      );
    }
  }

  const sorted = [...entries].sort((a, b) => a.offset - b.offset);
  for (let i = 1; i < sorted.length; i++) {
    const previous = sorted[i - 1];
    const current = sorted[i];
    if (previous && current && current.offset < seedEnd(previous)) {
      throw new SeedLayoutError(
        `Seed ${current.label} at offset ${current.offset} overlaps ${previous.label} (ends at ${seedEnd(previous)})`,
      );
    }
  }
}

/**
 * Check whether a seed's payload is present verbatim in an image region
 * @param region Bytes read from the image starting at `entry.offset`
 */
export function matchesSeed(entry: SeedEntry, region: Buffer): boolean {
  return region.equals(entry.payload);
}
