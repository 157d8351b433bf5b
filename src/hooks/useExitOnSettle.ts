import { useEffect } from "react";
import { useApp } from "ink";
import type { TaskStatus } from "./useImageTask.ts";
import { exitCodeForStatus } from "../utils/app-utils.ts";

/**
 * Unmount the Ink app once the task has settled and set the exit code
 */
export function useExitOnSettle(status: TaskStatus): void {
  const { exit } = useApp();
  const code = exitCodeForStatus(status);

  useEffect(() => {
    if (code === undefined) return;

    // Give time for the final render, then exit
    const timer = setTimeout(() => {
      process.exitCode = code;
      exit();
    }, 100);
    return () => clearTimeout(timer);
  }, [code, exit]);
}
