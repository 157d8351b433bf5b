import { describe, test, expect } from "vitest";
import * as xfsforge from "./index.ts";

describe("package entry", () => {
  test("exposes the builder, inflator and inspector", () => {
    expect(typeof xfsforge.createImage).toBe("function");
    expect(typeof xfsforge.inflateImage).toBe("function");
    expect(typeof xfsforge.inspectImage).toBe("function");
  });

  test("exposes the format schema and defaults", () => {
    expect(xfsforge.HEADER_SIZE).toBe(4096);
    expect(xfsforge.XFS_MAGIC).toBe(0x58465342);
    expect(xfsforge.DEFAULT_IMAGE_CONFIG.seeds).toBe(xfsforge.SEED_TABLE);
    expect(xfsforge.DEFAULT_INFLATE_CONFIG.minPhysicalSize).toBe(104857600);
  });

  test("exposes the error hierarchy", () => {
    expect(new xfsforge.ImageFormatError()).toBeInstanceOf(
      xfsforge.XfsForgeError,
    );
  });
});
