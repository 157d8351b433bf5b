import type { TaskStep } from "../components/index.ts";
import type { TaskStatus } from "../hooks/useImageTask.ts";
import { InvalidArgumentError } from "../lib/utils/errors.ts";

export function formatBytes(bytes: number | bigint): string {
  const value = Number(bytes);
  if (value === 0) return "0 B";
  const units = ["B", "KB", "MB", "GB", "TB", "PB"];
  const k = 1024;
  const i = Math.min(
    Math.floor(Math.log(value) / Math.log(k)),
    units.length - 1,
  );
  return `${(value / k ** i).toFixed(2)} ${units[i]}`;
}

/**
 * Parse a command line value that must be a whole number greater than zero
 * @throws InvalidArgumentError naming the option when the value is unusable
 */
export function parsePositiveInteger(value: string, name: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError(
      `${name} must be a positive integer, got "${value}"`,
    );
  }

  const parsed = Number(value.trim());
  if (parsed === 0 || !Number.isSafeInteger(parsed)) {
    throw new InvalidArgumentError(
      `${name} must be a positive integer, got "${value}"`,
    );
  }
  return parsed;
}

export function updateStepStatus(
  steps: TaskStep[],
  stepId: string,
  status: TaskStep["status"],
  nextStepId?: string,
): TaskStep[] {
  return steps.map((step): TaskStep => {
    if (step.id === stepId) return { ...step, status };
    if (nextStepId && step.id === nextStepId)
      return { ...step, status: "active" };
    return step;
  });
}

/**
 * Process exit code for a settled task, `undefined` while it is still running
 */
export function exitCodeForStatus(status: TaskStatus): number | undefined {
  switch (status) {
    case "success":
      return 0;
    case "error":
      return 1;
    case "running":
      return undefined;
  }
}
