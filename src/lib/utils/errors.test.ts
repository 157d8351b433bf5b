import { describe, test, expect } from "vitest";
import {
  XfsForgeError,
  ImageFormatError,
  HeaderTooShortError,
  FieldRangeError,
  SeedLayoutError,
  InvalidArgumentError,
} from "./errors.ts";

describe("Error Classes", () => {
  describe("error hierarchy", () => {
    test("XfsForgeError extends Error", () => {
      const error = new XfsForgeError("test");
      expect(error instanceof Error).toBe(true);
    });

    test("all custom errors extend XfsForgeError", () => {
      expect(new ImageFormatError() instanceof XfsForgeError).toBe(true);
      expect(new HeaderTooShortError(10, 4096) instanceof XfsForgeError).toBe(
        true,
      );
      expect(
        new FieldRangeError("inodeSize", "test") instanceof XfsForgeError,
      ).toBe(true);
      expect(new SeedLayoutError("test") instanceof XfsForgeError).toBe(true);
      expect(new InvalidArgumentError("test") instanceof XfsForgeError).toBe(
        true,
      );
    });

    test("instanceof works correctly", () => {
      const error = new ImageFormatError();
      expect(error instanceof ImageFormatError).toBe(true);
      expect(error instanceof XfsForgeError).toBe(true);
      expect(error instanceof Error).toBe(true);
      expect(error instanceof HeaderTooShortError).toBe(false);
    });
  });

  describe("error names", () => {
    test.each([
      [new XfsForgeError("test"), "XfsForgeError"],
      [new ImageFormatError(), "ImageFormatError"],
      [new HeaderTooShortError(0, 4096), "HeaderTooShortError"],
      [new FieldRangeError("blockSize", "test"), "FieldRangeError"],
      [new SeedLayoutError("test"), "SeedLayoutError"],
      [new InvalidArgumentError("test"), "InvalidArgumentError"],
    ])("%s has name %s", (error, name) => {
      expect(error.name).toBe(name);
    });
  });

  describe("messages and details", () => {
    test("ImageFormatError default: 'Not a valid XFS image'", () => {
      const error = new ImageFormatError();
      expect(error.message).toBe("Not a valid XFS image");
      expect(error.found).toBeUndefined();
    });

    test("ImageFormatError keeps the signature that was found", () => {
      const error = new ImageFormatError("bad magic", "00000000");
      expect(error.message).toBe("bad magic");
      expect(error.found).toBe("00000000");
    });

    test("HeaderTooShortError describes both lengths", () => {
      const error = new HeaderTooShortError(512, 4096);
      expect(error.length).toBe(512);
      expect(error.message).toBe(
        "Image is 512 bytes, superblock header requires 4096 bytes",
      );
    });

    test("FieldRangeError names the field", () => {
      const error = new FieldRangeError("dataBlockCount", "too large");
      expect(error.field).toBe("dataBlockCount");
      expect(error.message).toBe("too large");
    });
  });

  describe("error throwing and catching", () => {
    test("can throw and catch XfsForgeError", () => {
      expect(() => {
        throw new XfsForgeError("test");
      }).toThrow(XfsForgeError);
    });

    test("can catch as base XfsForgeError", () => {
      try {
        throw new SeedLayoutError("overlap");
      } catch (e) {
        if (e instanceof XfsForgeError) {
          expect(e.message).toBe("overlap");
        } else {
          throw new Error("Should be XfsForgeError");
        }
      }
    });
  });
});
