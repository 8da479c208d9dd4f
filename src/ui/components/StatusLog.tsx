import { Box, Text } from "ink";
import type { LogEntry } from "../../App";

interface StatusLogProps {
  logs: LogEntry[];
  limit?: number;
}

/** Shows the most recent protocol log lines, errors in red, or a placeholder before any activity. */
export function StatusLog({ logs, limit = 12 }: StatusLogProps): JSX.Element {
  if (logs.length === 0) {
    return <Text dimColor>No protocol logs yet.</Text>;
  }

  return (
    <Box flexDirection="column" borderStyle="single" paddingX={1}>
      {logs.slice(-limit).map((log, index) => (
        <Text key={index} color={log.level === "error" ? "red" : undefined} wrap="truncate-end">
          <Text dimColor>[{log.timestamp}]</Text> {log.message}
        </Text>
      ))}
    </Box>
  );
}
