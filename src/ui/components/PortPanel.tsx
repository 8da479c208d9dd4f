import { Box, Text } from "ink";
import type { Geometry } from "../../protocol/types";

interface PortPanelProps {
  portLabel: string;
  connected: boolean;
  baudRate: number;
  geometry: Geometry;
}

/** Serial connection and disk format line. */
export function PortPanel({ portLabel, connected, baudRate, geometry }: PortPanelProps): JSX.Element {
  return (
    <Box gap={2}>
      <Text>
        Port: <Text color={connected ? "green" : "red"}>{portLabel}</Text>
      </Text>
      <Text>Baud: {(baudRate / 1000).toFixed(1)}K</Text>
      <Text>
        Disk: {geometry.label} ({geometry.trackLength} bytes/track, {geometry.trackCount} tracks)
      </Text>
    </Box>
  );
}
