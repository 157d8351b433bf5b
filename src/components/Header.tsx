import { Box, Text } from "ink";
import BigText from "ink-big-text";
import type React from "react";

export const Header: React.FC = () => {
  return (
    <Box flexDirection="column" marginBottom={1}>
      <BigText text="xfsforge" font="tiny" />
      <Text color="white">Synthetic XFS images for recovery testing</Text>
    </Box>
  );
};
