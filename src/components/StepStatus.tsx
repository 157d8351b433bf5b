import { Box, Text } from "ink";
import type React from "react";

export interface TaskStep {
  id: string;
  label: string;
  status: "pending" | "active" | "complete" | "error";
  error?: string;
}

interface StepStatusProps {
  steps: TaskStep[];
}

const StepLine: React.FC<{ step: TaskStep }> = ({ step }) => {
  switch (step.status) {
    case "complete":
      return <Text color="green">✓ {step.label}</Text>;
    case "active":
      return (
        <Box>
          <Text color="cyan">{step.label}</Text>
          <Text color="dim">...</Text>
        </Box>
      );
    case "error":
      return (
        <Box>
          <Text color="red">✗ {step.label} failed</Text>
          {step.error && <Text color="dim"> ({step.error})</Text>}
        </Box>
      );
    case "pending":
      return <Text color="gray">  {step.label}</Text>;
  }
};

export const StepStatus: React.FC<StepStatusProps> = ({ steps }) => {
  return (
    <Box flexDirection="column" marginTop={1}>
      {steps.map((step) => (
        <StepLine key={step.id} step={step} />
      ))}
    </Box>
  );
};
