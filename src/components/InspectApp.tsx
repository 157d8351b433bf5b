import type React from "react";
import { Box } from "ink";
import {
  Header,
  SeedReport,
  StepStatus,
  SuperblockSummary,
  TaskProgress,
} from "./index.ts";
import type { TaskStep } from "./index.ts";
import { useExitOnSettle } from "../hooks/useExitOnSettle.ts";
import { type StepEvents, useImageTask } from "../hooks/useImageTask.ts";
import { inspectImage } from "../lib/image/image-inspector.ts";
import { LogEventType } from "../lib/utils/logger.ts";
import type { InspectOptions } from "../cli/types.ts";

export interface InspectAppProps {
  options: InspectOptions;
}

const STEPS: TaskStep[] = [
  { id: "read", label: "Reading header", status: "pending" },
  { id: "verify", label: "Verifying signature", status: "pending" },
];

const STEP_EVENTS: StepEvents = {
  [LogEventType.IMAGE_READ]: { complete: "read", next: "verify" },
  [LogEventType.MAGIC_VERIFIED]: { complete: "verify" },
};

export const InspectApp: React.FC<InspectAppProps> = ({ options }) => {
  const { status, message, result, steps } = useImageTask(
    () => inspectImage(options.image),
    STEPS,
    STEP_EVENTS,
    `Inspecting ${options.image}...`,
  );
  useExitOnSettle(status);

  return (
    <Box flexDirection="column" padding={1}>
      <Header />
      <TaskProgress
        status={status}
        message={status === "success" ? options.image : message}
      />
      <StepStatus steps={steps} />

      {result && (
        <>
          <SuperblockSummary
            title="Superblock"
            superblock={result.superblock}
            physicalSize={result.physicalSize}
          />
          <SeedReport seeds={result.seeds} />
        </>
      )}
    </Box>
  );
};
