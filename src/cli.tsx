import { render } from "ink";
import { z } from "zod";
import App from "./App";
import { parseCliArgs } from "./cliArgs";
import type { CliArgs } from "./cliArgs";
import { MAX_DRIVE, MIN_STAT_INTERVAL_MS } from "./protocol/constants";
import { DriveState } from "./protocol/driveState";
import { FdcProtocolEngine } from "./protocol/engine";
import { bytesToHex } from "./protocol/frame";
import { findGeometry } from "./protocol/geometry";
import { FdcSession } from "./protocol/session";
import { SimulatedFdcServer } from "./protocol/simulatedServer";
import { describeRead, describeStat, describeWrite } from "./protocol/status";
import type { Geometry, SerialTransport } from "./protocol/types";
import { listSerialPorts, NodeSerialPort } from "./serial/nodeSerialPort";
import { loadSettings, saveSettings, settingsPath } from "./storage/settings";
import type { Settings } from "./storage/settings";
import { friendlyErrorMessage } from "./ui/errorMessages";

interface OpenTransport {
  transport: SerialTransport;
  label: string;
  close: () => Promise<void>;
}

async function openTransport(args: CliArgs, settings: Settings, geometry: Geometry, log?: (line: string) => void): Promise<OpenTransport> {
  if (args.simulate) {
    const server = new SimulatedFdcServer({ log });
    server.mount(0, geometry);
    server.mount(1, geometry);
    return { transport: server, label: "simulated", close: async () => server.close() };
  }

  const portPath = args.port ?? settings.portPath;
  if (!portPath) {
    throw new Error("No serial port selected");
  }
  const port = new NodeSerialPort();
  await port.open(portPath, settings.baudRate);
  return { transport: port, label: portPath, close: () => port.close() };
}

function stderrLog(line: string): void {
  process.stderr.write(`[${new Date().toISOString()}] ${line}\n`);
}

/** Runs one CLI invocation and returns the process exit code. */
export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  let args: CliArgs;
  try {
    args = parseCliArgs(argv);
  } catch (error) {
    if (error instanceof z.ZodError) {
      for (const issue of error.issues) {
        const field = issue.path.length > 0 ? `--${issue.path.join(".").replace(/_/g, "-")}` : "arguments";
        process.stderr.write(`fdc-serial-sim: ${field}: ${issue.message}\n`);
      }
      return 1;
    }
    throw error;
  }

  if (args.command === "ports") {
    const ports = await listSerialPorts();
    for (const port of ports) {
      process.stdout.write(`${port.path}${port.manufacturer ? `\t${port.manufacturer}` : ""}\n`);
    }
    return 0;
  }

  const file = settingsPath();
  const stored = loadSettings(file);
  const settings: Settings = {
    ...stored,
    portPath: args.simulate ? stored.portPath : args.port ?? stored.portPath,
    baudRate: args.baud ?? stored.baudRate,
    geometry: args.geometry ?? stored.geometry,
    statIntervalMs: Math.max(MIN_STAT_INTERVAL_MS, args.interval ?? stored.statIntervalMs)
  };
  const geometry = findGeometry(settings.geometry);
  const log = args.verbose ? stderrLog : undefined;

  let opened: OpenTransport;
  try {
    opened = await openTransport(args, settings, geometry, log);
  } catch (error) {
    process.stderr.write(`${friendlyErrorMessage(error)}\n`);
    return 1;
  }

  if (!saveSettings(settings, file)) {
    process.stderr.write(`Could not save settings to ${file}\n`);
  }

  const context: CommandContext = {
    args,
    opened,
    settings,
    settingsFile: file,
    geometry,
    createEngine: (engineLog) =>
      new FdcProtocolEngine(opened.transport, {
        frameTimeoutMs: args.frame_timeout,
        dataTimeoutMs: args.data_timeout,
        log: engineLog
      })
  };
  try {
    return await runCommand(context, log);
  } finally {
    await opened.close();
  }
}

interface CommandContext {
  args: CliArgs;
  opened: OpenTransport;
  settings: Settings;
  settingsFile: string;
  geometry: Geometry;
  createEngine: (log?: (line: string) => void) => FdcProtocolEngine;
}

async function runCommand(context: CommandContext, log?: (line: string) => void): Promise<number> {
  const { args, opened, settings, geometry } = context;
  switch (args.command) {
    case "stat": {
      const state = new DriveState();
      state.setGeometry(geometry);
      if (args.drive !== null && args.drive !== undefined) {
        if (args.drive >= MAX_DRIVE) {
          process.stderr.write(`Invalid drive number ${args.drive}\n`);
          return 1;
        }
        state.selectDrive(args.drive);
      }
      for (const drive of args.head ?? []) {
        state.setHeadLoaded(drive, true);
      }
      const result = await context.createEngine(log).doStat(state);
      process.stdout.write(`${describeStat(result)}\n`);
      if (result.ok) {
        process.stdout.write(`Mounted drives: ${result.value.mountedDrives.join(", ") || "none"}\n`);
      }
      return result.ok ? 0 : 1;
    }
    case "read": {
      const result = await context.createEngine(log).doRead(args.drive ?? null, args.track ?? 0, geometry);
      process.stdout.write(`${describeRead(result)}\n`);
      if (result.ok) {
        process.stdout.write(`${bytesToHex(result.value.data.subarray(0, 16))}...\n`);
      }
      return result.ok && result.value.checksumValid ? 0 : 1;
    }
    case "write": {
      const data = new Uint8Array(geometry.trackLength).fill(args.fill ?? 0xe5);
      const result = await context.createEngine(log).doWrit(args.drive ?? null, args.track ?? 0, geometry, data);
      process.stdout.write(`${describeWrite(result)}\n`);
      return result.ok ? 0 : 1;
    }
    case "ui": {
      const instance = render(
        <App
          createSession={(dialogLog) => {
            const session = new FdcSession(context.createEngine(dialogLog));
            session.setGeometry(geometry);
            return session;
          }}
          portLabel={opened.label}
          connected={opened.transport.isOpen}
          settings={settings}
          onSettingsChange={(next) => {
            saveSettings(next, context.settingsFile);
          }}
        />
      );
      await instance.waitUntilExit();
      return 0;
    }
    case "ports":
      return 0;
  }
}
