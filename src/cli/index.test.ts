import { afterEach, beforeEach, describe, test, expect, vi } from "vitest";
import { stat } from "node:fs/promises";
import { fail, setupCLI } from "./index.tsx";
import { ImageFormatError } from "../lib/utils/errors.ts";
import { makeTempDir } from "../__tests__/utils/test-helpers.ts";

class ExitCalled extends Error {
  constructor(readonly code: string | number | null | undefined) {
    super(`process.exit(${code})`);
  }
}

describe("CLI", () => {
  let tmp: Awaited<ReturnType<typeof makeTempDir>>;

  beforeEach(async () => {
    tmp = await makeTempDir();
    vi.spyOn(process, "exit").mockImplementation((code): never => {
      throw new ExitCalled(code);
    });
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await tmp.cleanup();
  });

  const run = (...args: string[]) =>
    setupCLI().parseAsync(["node", "xfsforge", ...args]);

  describe("fail()", () => {
    test("prints the message of a known error and exits with 1", () => {
      expect(() =>
        fail(new ImageFormatError("Not a valid XFS image (magic: 0x00000000)")),
      ).toThrow(new ExitCalled(1));
      expect(console.error).toHaveBeenCalledWith(
        "Error: Not a valid XFS image (magic: 0x00000000)",
      );
    });

    test("prints other errors as strings and exits with 1", () => {
      expect(() => fail(new Error("disk full"))).toThrow(new ExitCalled(1));
      expect(console.error).toHaveBeenCalledWith("Error: Error: disk full");
    });
  });

  describe("option validation", () => {
    test("create --size 0 exits with 1 and writes nothing", async () => {
      const output = tmp.path("t.img");

      await expect(run("create", output, "--size", "0")).rejects.toThrow(
        new ExitCalled(1),
      );
      expect(console.error).toHaveBeenCalledWith(
        'Error: --size must be a positive integer, got "0"',
      );
      await expect(stat(output)).rejects.toMatchObject({ code: "ENOENT" });
    });

    test("inflate with a non-numeric --target exits with 1", async () => {
      await expect(
        run(
          "inflate",
          tmp.path("t.img"),
          tmp.path("big.img"),
          "--target",
          "lots",
        ),
      ).rejects.toThrow(new ExitCalled(1));
      expect(console.error).toHaveBeenCalledWith(
        'Error: --target must be a positive integer, got "lots"',
      );
    });
  });
});
