import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { z } from "zod";
import { BAUD_RATES, DEFAULT_BAUD_RATE, MIN_STAT_INTERVAL_MS } from "../protocol/constants";

const BaudRateSchema = z.number().int().refine((value) => BAUD_RATES.some((rate) => rate === value), {
  message: `baud rate must be one of ${BAUD_RATES.join(", ")}`
});

export const SettingsSchema = z.object({
  portPath: z.string().min(1).nullable(),
  baudRate: BaudRateSchema,
  geometry: z.union([z.literal("8inch"), z.literal("minidisk")]),
  statIntervalMs: z.number().int().min(MIN_STAT_INTERVAL_MS),
  autoStat: z.boolean()
});

export type Settings = z.infer<typeof SettingsSchema>;

export const DEFAULT_SETTINGS: Settings = {
  portPath: null,
  baudRate: DEFAULT_BAUD_RATE,
  geometry: "8inch",
  statIntervalMs: MIN_STAT_INTERVAL_MS,
  autoStat: false
};

/** Settings file location, overridable with FDC_SIM_SETTINGS. */
export function settingsPath(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.FDC_SIM_SETTINGS?.trim();
  if (override) {
    return override;
  }
  return path.join(os.homedir(), ".config", "fdc-serial-sim", "settings.json");
}

function pick<T>(schema: z.ZodType<T>, value: unknown, fallback: T): T {
  const parsed = schema.safeParse(value);
  return parsed.success ? parsed.data : fallback;
}

function safeReadFile(file: string): string | null {
  try {
    return fs.readFileSync(file, "utf8");
  } catch {
    return null;
  }
}

function safeWriteFile(file: string, contents: string): boolean {
  try {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, contents, "utf8");
    return true;
  } catch {
    // Callers report the failure; a read-only home must not stop the tool.
    return false;
  }
}

/** Reads persisted settings; fields that are missing or invalid fall back to defaults one by one. */
export function loadSettings(file = settingsPath()): Settings {
  const text = safeReadFile(file);
  if (text === null) {
    return { ...DEFAULT_SETTINGS };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    return { ...DEFAULT_SETTINGS };
  }

  const record = z.record(z.unknown()).safeParse(raw);
  if (!record.success) {
    return { ...DEFAULT_SETTINGS };
  }

  const fields = record.data;
  const shape = SettingsSchema.shape;
  return {
    portPath: pick(shape.portPath, fields.portPath, DEFAULT_SETTINGS.portPath),
    baudRate: pick(shape.baudRate, fields.baudRate, DEFAULT_SETTINGS.baudRate),
    geometry: pick(shape.geometry, fields.geometry, DEFAULT_SETTINGS.geometry),
    statIntervalMs: pick(shape.statIntervalMs, fields.statIntervalMs, DEFAULT_SETTINGS.statIntervalMs),
    autoStat: pick(shape.autoStat, fields.autoStat, DEFAULT_SETTINGS.autoStat)
  };
}

/** Persists settings as pretty JSON; false when the file could not be written. */
export function saveSettings(settings: Settings, file = settingsPath()): boolean {
  const validated = SettingsSchema.parse(settings);
  return safeWriteFile(file, `${JSON.stringify(validated, null, 2)}\n`);
}
