import { describe, test, expect } from "vitest";
import {
  exitCodeForStatus,
  formatBytes,
  parsePositiveInteger,
  updateStepStatus,
} from "./app-utils.ts";
import type { TaskStep } from "../components/index.ts";
import { InvalidArgumentError } from "../lib/utils/errors.ts";

describe("formatBytes()", () => {
  test("zero", () => {
    expect(formatBytes(0)).toBe("0 B");
  });

  test("50 MB", () => {
    expect(formatBytes(52428800)).toBe("50.00 MB");
  });

  test("150 GB as bigint", () => {
    expect(formatBytes(161061273600n)).toBe("150.00 GB");
  });

  test("sizes past petabytes stay in PB", () => {
    expect(formatBytes(1024 ** 6)).toBe("1024.00 PB");
  });
});

describe("parsePositiveInteger()", () => {
  test("parses digits", () => {
    expect(parsePositiveInteger("150", "--target")).toBe(150);
  });

  test("trims whitespace", () => {
    expect(parsePositiveInteger(" 50 ", "--size")).toBe(50);
  });

  test.each(["0", "-1", "1.5", "abc", "", "1e3"])("rejects %j", (value) => {
    expect(() => parsePositiveInteger(value, "--size")).toThrow(
      InvalidArgumentError,
    );
  });

  test("error names the option", () => {
    expect(() => parsePositiveInteger("abc", "--size")).toThrow(
      '--size must be a positive integer, got "abc"',
    );
  });
});

describe("updateStepStatus()", () => {
  const steps: TaskStep[] = [
    { id: "read", label: "Reading image", status: "active" },
    { id: "verify", label: "Verifying signature", status: "pending" },
    { id: "write", label: "Writing image", status: "pending" },
  ];

  test("completes a step and activates the next", () => {
    expect(
      updateStepStatus(steps, "read", "complete", "verify").map(
        (step) => step.status,
      ),
    ).toEqual(["complete", "active", "pending"]);
  });

  test("does not mutate the input", () => {
    updateStepStatus(steps, "read", "complete", "verify");
    expect(steps[0]?.status).toBe("active");
  });
});

describe("exitCodeForStatus()", () => {
  test("success exits with 0", () => {
    expect(exitCodeForStatus("success")).toBe(0);
  });

  test("error exits with 1", () => {
    expect(exitCodeForStatus("error")).toBe(1);
  });

  test("running has no exit code yet", () => {
    expect(exitCodeForStatus("running")).toBeUndefined();
  });
});
