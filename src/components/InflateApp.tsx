import { Box, Text } from "ink";
import type React from "react";
import {
  Header,
  StepStatus,
  SuperblockSummary,
  TaskProgress,
} from "./index.ts";
import type { TaskStep } from "./index.ts";
import { useExitOnSettle } from "../hooks/useExitOnSettle.ts";
import { type StepEvents, useImageTask } from "../hooks/useImageTask.ts";
import { inflateImage } from "../lib/image/size-inflator.ts";
import { gigabytesToBytes, megabytesToBytes } from "../lib/format/units.ts";
import { LogEventType } from "../lib/utils/logger.ts";
import type { InflateOptions } from "../cli/types.ts";

export interface InflateAppProps {
  options: InflateOptions;
}

const STEPS: TaskStep[] = [
  { id: "read", label: "Reading image", status: "pending" },
  { id: "verify", label: "Verifying signature", status: "pending" },
  { id: "rewrite", label: "Rewriting size fields", status: "pending" },
  { id: "write", label: "Writing inflated image", status: "pending" },
];

const STEP_EVENTS: StepEvents = {
  [LogEventType.IMAGE_READ]: { complete: "read", next: "verify" },
  [LogEventType.MAGIC_VERIFIED]: { complete: "verify", next: "rewrite" },
  [LogEventType.HEADER_REWRITTEN]: { complete: "rewrite", next: "write" },
  [LogEventType.IMAGE_WRITTEN]: { complete: "write" },
};

export const InflateApp: React.FC<InflateAppProps> = ({ options }) => {
  const { status, message, result, steps } = useImageTask(
    () =>
      inflateImage(
        options.input,
        options.output,
        gigabytesToBytes(options.target),
        { minPhysicalSize: megabytesToBytes(options.minPhysical) },
      ),
    STEPS,
    STEP_EVENTS,
    `Expanding ${options.input} to appear as ${options.target} GB...`,
  );
  useExitOnSettle(status);

  return (
    <Box flexDirection="column" padding={1}>
      <Header />
      <TaskProgress
        status={status}
        message={status === "success" ? `Created: ${options.output}` : message}
      />
      <StepStatus steps={steps} />

      {result && (
        <>
          <SuperblockSummary
            title="Before"
            superblock={result.previous}
            physicalSize={result.inputSize}
          />
          <SuperblockSummary
            title="After"
            superblock={result.superblock}
            physicalSize={result.outputSize}
          />
        </>
      )}

      {status === "error" && (
        <Box marginTop={1}>
          <Text color="red">No output was written.</Text>
        </Box>
      )}
    </Box>
  );
};
