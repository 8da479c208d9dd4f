import { ArgumentParser } from "argparse";
import { z } from "zod";
import { BAUD_RATES, DATA_TIMEOUT_MS, FRAME_TIMEOUT_MS, MAX_DRIVE } from "./protocol/constants";

const ByteSchema = z
  .string()
  .regex(/^(0x[0-9a-f]{1,2}|\d{1,3})$/i, "expected a byte such as 0xE5 or 229")
  .transform((value) => (value.toLowerCase().startsWith("0x") ? parseInt(value.slice(2), 16) : parseInt(value, 10)))
  .refine((value) => value <= 0xff, "byte must be 0-255");

export const CliArgsSchema = z.object({
  command: z.enum(["ports", "stat", "read", "write", "ui"]),
  port: z.string().min(1).nullish(),
  baud: z
    .number()
    .int()
    .refine((value) => BAUD_RATES.some((rate) => rate === value), `baud rate must be one of ${BAUD_RATES.join(", ")}`)
    .nullish(),
  geometry: z.enum(["8inch", "minidisk"]).nullish(),
  simulate: z.boolean(),
  verbose: z.boolean(),
  frame_timeout: z.number().int().min(1),
  data_timeout: z.number().int().min(1),
  // Range is left to the engine so an out-of-range drive is reported the same way as from the dialog.
  drive: z.number().int().min(0).max(0xff).nullish(),
  track: z.number().int().min(0).max(0xfff).nullish(),
  head: z.array(z.number().int().min(0).max(MAX_DRIVE - 1)).nullish(),
  fill: ByteSchema.nullish(),
  interval: z.number().int().nullish()
});

export type CliArgs = z.infer<typeof CliArgsSchema>;

function createArgumentParser(): ArgumentParser {
  const parser = new ArgumentParser({
    prog: "fdc-serial-sim",
    description: "FDC+ serial drive protocol tool: issues STAT, READ and WRIT to a drive server."
  });
  parser.add_argument("--port", { help: "serial port path (default: last used)" });
  parser.add_argument("--baud", { type: "int", help: `baud rate: ${BAUD_RATES.join(", ")}` });
  parser.add_argument("--geometry", { choices: ["8inch", "minidisk"], help: "disk type" });
  parser.add_argument("--simulate", { action: "store_true", help: "talk to an in-process drive server" });
  parser.add_argument("--frame-timeout", {
    type: "int",
    dest: "frame_timeout",
    default: FRAME_TIMEOUT_MS,
    help: `ms to wait for each part of a response frame (default ${FRAME_TIMEOUT_MS})`
  });
  parser.add_argument("--data-timeout", {
    type: "int",
    dest: "data_timeout",
    default: DATA_TIMEOUT_MS,
    help: `ms of silence that ends a track transfer (default ${DATA_TIMEOUT_MS})`
  });
  parser.add_argument("-v", "--verbose", { action: "store_true", help: "log frames to stderr" });

  const commands = parser.add_subparsers({ dest: "command" });
  commands.add_parser("ports", { help: "list serial ports" });

  const stat = commands.add_parser("stat", { help: "request drive mount status" });
  stat.add_argument("--drive", { type: "int", help: "selected drive (default: none)" });
  stat.add_argument("--head", { type: "int", action: "append", help: "drive with head loaded (repeatable)" });

  for (const name of ["read", "write"]) {
    const sub = commands.add_parser(name, { help: `${name} one track` });
    sub.add_argument("--drive", { type: "int", required: true });
    sub.add_argument("--track", { type: "int", required: true });
    if (name === "write") {
      sub.add_argument("--fill", { default: "0xE5", help: "byte the track is filled with (default 0xE5)" });
    }
  }

  const ui = commands.add_parser("ui", { help: "interactive terminal dialog" });
  ui.add_argument("--interval", { type: "int", help: "auto STAT interval in ms (min 100)" });
  return parser;
}

/** Parses and validates argv; throws a ZodError on values argparse accepts but the protocol does not. */
export function parseCliArgs(argv: string[]): CliArgs {
  const raw: unknown = createArgumentParser().parse_args(argv);
  return CliArgsSchema.parse(raw);
}
