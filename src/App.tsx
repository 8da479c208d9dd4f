import { useEffect, useMemo, useRef, useState } from "react";
import { Box, Text, useApp, useInput } from "ink";
import { GEOMETRIES } from "./protocol/geometry";
import type { FdcSession } from "./protocol/session";
import { describeError, describeRead, describeStat, describeWrite } from "./protocol/status";
import type { Settings } from "./storage/settings";
import { CommandBar } from "./ui/components/CommandBar";
import { DrivePanel } from "./ui/components/DrivePanel";
import { PortPanel } from "./ui/components/PortPanel";
import { StatusLog } from "./ui/components/StatusLog";
import { friendlyErrorMessage } from "./ui/errorMessages";
import { adjustStatInterval, STAT_INTERVAL_STEP_MS, StatPoller } from "./ui/statPoller";

export interface LogEntry {
  timestamp: string;
  level: "info" | "error";
  message: string;
}

type Command = "STAT" | "READ" | "WRIT";

const MAX_LOG_ENTRIES = 200;

interface AppProps {
  /** Builds the session once; the callback routes engine log lines into the dialog. */
  createSession: (log: (line: string) => void) => FdcSession;
  portLabel: string;
  connected: boolean;
  settings: Settings;
  onSettingsChange?: (settings: Settings) => void;
}

/** Terminal counterpart of the drive-simulator dialog: parameters, LEDs, commands and a log. */
export default function App({ createSession, portLabel, connected, settings, onSettingsChange }: AppProps): JSX.Element {
  const { exit } = useApp();
  const [logs, setLogs] = useState<LogEntry[]>([]);
  const [message, setMessage] = useState<{ text: string; ok: boolean } | null>(null);
  const [busy, setBusy] = useState(false);
  const [autoStat, setAutoStat] = useState(settings.autoStat);
  const [currentSettings, setCurrentSettings] = useState(settings);
  // DriveState is mutable; bumping this re-renders after it changes.
  const [, setRevision] = useState(0);
  const refresh = (): void => setRevision((value) => value + 1);

  /** Appends a timestamped log line, keeping only the most recent entries. */
  const appendLog = (line: string, level: LogEntry["level"] = "info"): void => {
    const entry = { timestamp: new Date().toISOString(), level, message: line };
    setLogs((prev) => [...prev.slice(-(MAX_LOG_ENTRIES - 1)), entry]);
  };

  // Frame-level logging from background polls would flood the log at 10 Hz.
  const quietRef = useRef(false);
  const session = useMemo(
    () =>
      createSession((line) => {
        if (!quietRef.current) {
          appendLog(line);
        }
      }),
    []
  );
  const state = session.state;

  const updateSettings = (patch: Partial<Settings>): void => {
    const next = { ...currentSettings, ...patch };
    setCurrentSettings(next);
    onSettingsChange?.(next);
  };

  /** Runs one transaction; quiet polls only surface failures, like the dialog's auto STAT. */
  const runCommand = async (command: Command, quiet = false): Promise<void> => {
    if (session.busy) {
      // Usually an auto STAT poll still in flight.
      if (!quiet) {
        const text = describeError({ kind: "TransportBusy" });
        setMessage({ text, ok: false });
        appendLog(text, "error");
      }
      return;
    }
    setBusy(!quiet);
    quietRef.current = quiet;
    try {
      let line: string;
      let ok: boolean;
      if (command === "STAT") {
        const result = await session.stat();
        line = describeStat(result);
        ok = result.ok;
      } else if (command === "READ") {
        const result = await session.read();
        line = describeRead(result);
        ok = result.ok && result.value.checksumValid;
      } else {
        const result = await session.write();
        line = describeWrite(result);
        ok = result.ok;
      }
      if (!quiet || !ok) {
        setMessage({ text: line, ok });
        appendLog(line, ok ? "info" : "error");
      }
    } catch (commandError) {
      const text = friendlyErrorMessage(commandError);
      setMessage({ text, ok: false });
      appendLog(text, "error");
    } finally {
      quietRef.current = false;
      setBusy(false);
      refresh();
    }
  };

  const pollerRef = useRef<StatPoller | null>(null);

  useEffect(() => {
    if (!autoStat || !connected) {
      return;
    }
    const poller = new StatPoller(() => runCommand("STAT", true), currentSettings.statIntervalMs, (pollError) => {
      appendLog(friendlyErrorMessage(pollError), "error");
    });
    pollerRef.current = poller;
    poller.start();
    return () => {
      poller.stop();
      pollerRef.current = null;
    };
  }, [autoStat, connected]);

  useEffect(() => {
    const poller = pollerRef.current;
    if (poller?.active) {
      poller.setInterval(currentSettings.statIntervalMs);
    }
  }, [currentSettings.statIntervalMs]);

  const stepStatInterval = (deltaMs: number): void => {
    const statIntervalMs = adjustStatInterval(currentSettings.statIntervalMs, deltaMs);
    updateSettings({ statIntervalMs });
    appendLog(`STAT interval ${statIntervalMs} ms`);
  };

  useInput((input, key) => {
    if (input === "q") {
      exit();
      return;
    }
    if (busy) {
      return;
    }

    if (input === "s" && !autoStat) {
      void runCommand("STAT");
    } else if (input === "r") {
      void runCommand("READ");
    } else if (input === "w") {
      void runCommand("WRIT");
    } else if (input === "a") {
      const enabled = !autoStat;
      setAutoStat(enabled);
      updateSettings({ autoStat: enabled });
      appendLog(`Auto STAT ${enabled ? "on" : "off"}`);
    } else if (/^[0-3]$/.test(input)) {
      state.selectDrive(Number(input));
      refresh();
    } else if (input === "x") {
      state.selectDrive(null);
      refresh();
    } else if (input === "h") {
      const drive = state.drive;
      if (drive !== null) {
        state.setHeadLoaded(drive, !state.headLoaded[drive]);
        refresh();
      }
    } else if (key.upArrow && state.track < state.geometry.trackCount - 1) {
      state.setTrack(state.track + 1);
      refresh();
    } else if (key.downArrow && state.track > 0) {
      state.setTrack(state.track - 1);
      refresh();
    } else if (input === "+" || input === "=") {
      stepStatInterval(STAT_INTERVAL_STEP_MS);
    } else if (input === "-") {
      stepStatInterval(-STAT_INTERVAL_STEP_MS);
    } else if (input === "g") {
      const next = GEOMETRIES.find((geometry) => geometry.id !== state.geometry.id) ?? state.geometry;
      session.setGeometry(next);
      updateSettings({ geometry: next.id });
      appendLog(`Disk type ${next.label}`);
      refresh();
    }
  });

  return (
    <Box flexDirection="column" paddingX={1}>
      <Text bold>FDC+ Serial Drive Simulator</Text>
      <PortPanel portLabel={portLabel} connected={connected} baudRate={currentSettings.baudRate} geometry={state.geometry} />
      <DrivePanel
        mounted={state.mountedFlags()}
        headLoaded={state.headLoaded}
        selected={state.drive}
        track={state.track}
        autoStat={autoStat}
        statIntervalMs={currentSettings.statIntervalMs}
      />
      <CommandBar busy={busy} autoStat={autoStat} />
      {message ? <Text color={message.ok ? "green" : "yellow"}>{message.text}</Text> : null}
      <StatusLog logs={logs} />
    </Box>
  );
}
