import { Box, Text } from "ink";
import { MAX_DRIVE } from "../../protocol/constants";

interface DrivePanelProps {
  mounted: readonly boolean[];
  headLoaded: readonly boolean[];
  selected: number | null;
  track: number;
  autoStat: boolean;
  statIntervalMs: number;
}

/** Mount LEDs per drive (green mounted, red not), head-load marker, and current drive/track parameters. */
export function DrivePanel({ mounted, headLoaded, selected, track, autoStat, statIntervalMs }: DrivePanelProps): JSX.Element {
  const drives = Array.from({ length: MAX_DRIVE }, (_, drive) => drive);
  return (
    <Box flexDirection="column">
      <Box gap={2}>
        {drives.map((drive) => (
          <Text key={drive} inverse={drive === selected}>
            <Text color={mounted[drive] ? "green" : "red"}>●</Text> {drive}
            {headLoaded[drive] ? " H" : "  "}
          </Text>
        ))}
      </Box>
      <Box gap={2}>
        <Text>Drive: {selected === null ? "none" : selected}</Text>
        <Text>Track: {track}</Text>
        <Text>
          STAT: {autoStat ? `auto every ${statIntervalMs} ms` : "manual"}
        </Text>
      </Box>
    </Box>
  );
}
