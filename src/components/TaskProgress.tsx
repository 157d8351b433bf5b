import { Box, Text } from "ink";
import Spinner from "ink-spinner";
import type React from "react";
import type { TaskStatus } from "../hooks/useImageTask.ts";

interface TaskProgressProps {
  status: TaskStatus;
  message: string;
}

export const TaskProgress: React.FC<TaskProgressProps> = ({
  status,
  message,
}) => {
  const getStatusColor = () => {
    switch (status) {
      case "running":
        return "cyan";
      case "success":
        return "green";
      case "error":
        return "red";
    }
  };

  return (
    <Box>
      {status === "running" && (
        <Text color={getStatusColor()}>
          <Spinner type="dots" />
        </Text>
      )}
      {status === "success" && <Text color={getStatusColor()}>✓</Text>}
      {status === "error" && <Text color={getStatusColor()}>✗</Text>}
      <Box marginLeft={1}>
        <Text color={getStatusColor()} bold>
          {message}
        </Text>
      </Box>
    </Box>
  );
};
