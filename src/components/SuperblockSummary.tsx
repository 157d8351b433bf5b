import { Box, Text } from "ink";
import type React from "react";
import type { Superblock } from "../lib/format/superblock.ts";
import { logicalSizeOf } from "../lib/format/units.ts";
import { formatBytes } from "../utils/app-utils.ts";

interface SuperblockSummaryProps {
  title: string;
  superblock: Superblock;
  physicalSize: number;
}

/**
 * Share of the claimed logical size that is physically backed
 */
const BackingBar: React.FC<{ physical: number; logical: bigint }> = ({
  physical,
  logical,
}) => {
  const ratio = logical > 0n ? Math.min(physical / Number(logical), 1) : 1;
  const barLength = 20;
  const filledLength = Math.round(ratio * barLength);
  const filled = "█".repeat(filledLength);
  const empty = "░".repeat(barLength - filledLength);

  return (
    <Box marginTop={1}>
      <Text color="dim">[</Text>
      <Text color="green">{filled}</Text>
      <Text color="dim">{empty}]</Text>
      <Text color="dim"> {(ratio * 100).toFixed(2)}% backed</Text>
    </Box>
  );
};

const Row: React.FC<{ label: string; children: React.ReactNode }> = ({
  label,
  children,
}) => (
  <Box>
    <Box width={16}>
      <Text color="gray">{label}</Text>
    </Box>
    {children}
  </Box>
);

export const SuperblockSummary: React.FC<SuperblockSummaryProps> = ({
  title,
  superblock,
  physicalSize,
}) => {
  const logicalSize = logicalSizeOf(superblock);

  return (
    <Box flexDirection="column" marginTop={1}>
      <Text color="cyan" bold>
        {title}
      </Text>
      <Box paddingLeft={2} flexDirection="column">
        <Row label="Block size:">
          <Text>{superblock.blockSize} bytes</Text>
        </Row>
        <Row label="Blocks:">
          <Text>{superblock.dataBlockCount.toString()}</Text>
        </Row>
        <Row label="AG count:">
          <Text>{superblock.allocationGroupCount}</Text>
        </Row>
        <Row label="AG blocks:">
          <Text>{superblock.allocationGroupBlockCount}</Text>
        </Row>
        <Row label="Inode size:">
          <Text>{superblock.inodeSize} bytes</Text>
        </Row>
        <Row label="Logical size:">
          <Text color="yellow">{formatBytes(logicalSize)}</Text>
        </Row>
        <Row label="Physical size:">
          <Text color="green">{formatBytes(physicalSize)}</Text>
        </Row>
        <BackingBar physical={physicalSize} logical={logicalSize} />
      </Box>
    </Box>
  );
};
