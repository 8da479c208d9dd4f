import { Text } from "ink";

interface CommandBarProps {
  busy: boolean;
  autoStat: boolean;
}

/** Key bindings; STAT is disabled while auto polling owns it. */
export function CommandBar({ busy, autoStat }: CommandBarProps): JSX.Element {
  if (busy) {
    return <Text color="yellow">Working...</Text>;
  }
  return (
    <Text dimColor>
      {autoStat ? "" : "[s] STAT  "}[r] READ  [w] WRIT  [a] auto  [+/-] interval  [0-3] drive  [x] none  [h] head  [↑/↓] track  [g] disk  [q] quit
    </Text>
  );
}
