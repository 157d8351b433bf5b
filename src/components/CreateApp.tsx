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
import { createImage } from "../lib/image/image-builder.ts";
import { megabytesToBytes } from "../lib/format/units.ts";
import { LogEventType } from "../lib/utils/logger.ts";
import type { CreateOptions } from "../cli/types.ts";

export interface CreateAppProps {
  options: CreateOptions;
}

const STEPS: TaskStep[] = [
  { id: "header", label: "Writing superblock", status: "pending" },
  { id: "seeds", label: "Seeding recoverable content", status: "pending" },
  { id: "extend", label: "Extending to logical size", status: "pending" },
];

const STEP_EVENTS: StepEvents = {
  [LogEventType.HEADER_WRITTEN]: { complete: "header", next: "seeds" },
  [LogEventType.SEEDS_WRITTEN]: { complete: "seeds", next: "extend" },
  [LogEventType.IMAGE_EXTENDED]: { complete: "extend" },
};

export const CreateApp: React.FC<CreateAppProps> = ({ options }) => {
  const { status, message, result, steps } = useImageTask(
    () => createImage(options.output, megabytesToBytes(options.size)),
    STEPS,
    STEP_EVENTS,
    `Creating ${options.output} (${options.size} MB)...`,
  );
  useExitOnSettle(status);

  return (
    <Box flexDirection="column" padding={1}>
      <Header />
      <TaskProgress
        status={status}
        message={
          status === "success"
            ? `Created XFS test image: ${options.output}`
            : message
        }
      />
      <StepStatus steps={steps} />

      {result && (
        <>
          <SuperblockSummary
            title="Superblock"
            superblock={result.superblock}
            physicalSize={result.logicalSize}
          />
          <Box marginTop={1}>
            <Text color="dim">
              {result.seeds.length} seed blocks written:{" "}
              {result.seeds.map((seed) => seed.label).join(", ")}
            </Text>
          </Box>
        </>
      )}
    </Box>
  );
};
