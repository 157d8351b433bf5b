import { Box, Text } from "ink";
import type React from "react";
import type { SeedPresence } from "../lib/image/image-inspector.ts";

interface SeedReportProps {
  seeds: SeedPresence[];
}

export const SeedReport: React.FC<SeedReportProps> = ({ seeds }) => {
  const found = seeds.filter((seed) => seed.present).length;

  return (
    <Box flexDirection="column" marginTop={1}>
      <Text color="cyan" bold>
        Seed content ({found}/{seeds.length} present)
      </Text>
      <Box paddingLeft={2} flexDirection="column">
        {seeds.map((seed) => (
          <Box key={seed.label}>
            <Box width={3}>
              <Text color={seed.present ? "green" : "red"}>
                {seed.present ? "✓" : "✗"}
              </Text>
            </Box>
            <Box width={18}>
              <Text>{seed.label}</Text>
            </Box>
            <Box width={8}>
              <Text color="dim">{seed.kind}</Text>
            </Box>
            <Text color="gray">
              0x{seed.offset.toString(16).padStart(5, "0")}
            </Text>
          </Box>
        ))}
      </Box>
    </Box>
  );
};
