import { afterEach, beforeEach, describe, test, expect } from "vitest";
import { readFile, writeFile } from "node:fs/promises";
import { inspectImage } from "./image-inspector.ts";
import { createImage } from "./image-builder.ts";
import { inflateImage } from "./size-inflator.ts";
import { SEED_TABLE } from "../format/seed-table.ts";
import { gigabytesToBytes, megabytesToBytes } from "../format/units.ts";
import { HeaderTooShortError, ImageFormatError } from "../utils/errors.ts";
import { makeTempDir } from "../../__tests__/utils/test-helpers.ts";

describe("inspectImage()", () => {
  let tmp: Awaited<ReturnType<typeof makeTempDir>>;

  beforeEach(async () => {
    tmp = await makeTempDir();
  });

  afterEach(async () => {
    await tmp.cleanup();
  });

  test("reports a freshly built image", async () => {
    const path = tmp.path("t.img");
    await createImage(path, megabytesToBytes(1));

    const report = await inspectImage(path);

    expect(report.physicalSize).toBe(1048576);
    expect(report.logicalSize).toBe(1048576n);
    expect(report.superblock.dataBlockCount).toBe(256n);
    expect(report.seeds).toEqual(
      SEED_TABLE.map((seed) => ({
        label: seed.label,
        kind: seed.kind,
        offset: seed.offset,
        present: true,
      })),
    );
  });

  test("reports the claimed size of an inflated image", async () => {
    const input = tmp.path("t.img");
    const output = tmp.path("big.img");
    await createImage(input, megabytesToBytes(1));
    await inflateImage(input, output, gigabytesToBytes(150), {
      minPhysicalSize: megabytesToBytes(2),
    });

    const report = await inspectImage(output);

    expect(report.physicalSize).toBe(2097152);
    expect(report.logicalSize).toBe(161061273600n);
    expect(report.seeds.every((seed) => seed.present)).toBe(true);
  });

  test("flags a damaged seed", async () => {
    const path = tmp.path("t.img");
    await createImage(path, megabytesToBytes(1));
    const image = await readFile(path);
    image[12288] = 0x00;
    await writeFile(path, image);

    const report = await inspectImage(path);
    const json = report.seeds.find((seed) => seed.kind === "json");
    expect(json?.present).toBe(false);
    expect(report.seeds.filter((seed) => seed.present)).toHaveLength(
      SEED_TABLE.length - 1,
    );
  });

  test("seeds past the end of the file are absent", async () => {
    const path = tmp.path("odd.img");
    await createImage(path, 10000);

    const report = await inspectImage(path);
    expect(
      report.seeds.filter((seed) => seed.present).map((seed) => seed.label),
    ).toEqual(["document.txt"]);
  });

  test("rejects a file without the signature", async () => {
    const path = tmp.path("zeros.img");
    await writeFile(path, Buffer.alloc(8192));

    await expect(inspectImage(path)).rejects.toThrow(
      "Not a valid XFS image (magic: 0x00000000)",
    );
    await expect(inspectImage(path)).rejects.toBeInstanceOf(ImageFormatError);
  });

  test("rejects a header with a zero block size", async () => {
    const path = tmp.path("zero.img");
    const header = Buffer.alloc(8192);
    header.write("XFSB", 0, "ascii");
    await writeFile(path, header);

    await expect(inspectImage(path)).rejects.toThrow(
      "Invalid XFS image: block size is zero",
    );
  });

  test("rejects a file shorter than the header", async () => {
    const path = tmp.path("short.img");
    await writeFile(path, Buffer.from("XFSB"));

    await expect(inspectImage(path)).rejects.toBeInstanceOf(
      HeaderTooShortError,
    );
  });
});
