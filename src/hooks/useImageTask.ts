import { useEffect, useRef, useState } from "react";
import type { TaskStep } from "../components/index.ts";
import { XfsForgeError } from "../lib/utils/errors.ts";
import { type LogEventType, logger } from "../lib/utils/logger.ts";
import { updateStepStatus } from "../utils/app-utils.ts";

export type TaskStatus = "running" | "success" | "error";

/**
 * Step transition triggered by a logger event
 */
export interface StepTransition {
  complete: string;
  next?: string;
}

export type StepEvents = Partial<Record<LogEventType, StepTransition>>;

/**
 * Runs an image task once per mount and tracks its steps from the
 * events the library logs while it works.
 */
export function useImageTask<T>(
  run: () => Promise<T>,
  initialSteps: TaskStep[],
  stepEvents: StepEvents,
  runningMessage: string,
) {
  const [status, setStatus] = useState<TaskStatus>("running");
  const [message, setMessage] = useState<string>(runningMessage);
  const [result, setResult] = useState<T | null>(null);
  const [steps, setSteps] = useState<TaskStep[]>(() =>
    initialSteps.map((step, index): TaskStep =>
      index === 0 ? { ...step, status: "active" } : step,
    ),
  );

  const runRef = useRef(run);
  const eventsRef = useRef(stepEvents);

  useEffect(() => {
    const unsubscribe = logger.onLog((entry) => {
      if (!entry.eventType) return;

      const transition = eventsRef.current[entry.eventType];
      if (transition) {
        setSteps((prev) =>
          updateStepStatus(
            prev,
            transition.complete,
            "complete",
            transition.next,
          ),
        );
      }
    });

    return unsubscribe;
  }, []);

  useEffect(() => {
    const runTask = async () => {
      try {
        const value = await runRef.current();
        setResult(value);
        setStatus("success");
        setMessage("Done");
      } catch (error) {
        setSteps((prev) =>
          prev.map((step): TaskStep =>
            step.status === "active"
              ? {
                  ...step,
                  status: "error",
                  error: error instanceof Error ? error.name : undefined,
                }
              : step,
          ),
        );
        setStatus("error");
        if (error instanceof XfsForgeError) {
          setMessage(error.message);
        } else {
          setMessage(String(error));
        }
      }
    };

    void runTask();
  }, []);

  return { status, message, result, steps };
}
