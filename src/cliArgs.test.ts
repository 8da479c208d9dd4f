import { describe, expect, it } from "vitest";
import { ZodError } from "zod";
import { parseCliArgs } from "./cliArgs";

describe("parseCliArgs", () => {
  it("parses a read with global options", () => {
    const args = parseCliArgs(["--simulate", "--geometry", "minidisk", "read", "--drive", "1", "--track", "5"]);
    expect(args).toMatchObject({
      command: "read",
      simulate: true,
      geometry: "minidisk",
      drive: 1,
      track: 5,
      frame_timeout: 500,
      data_timeout: 100
    });
  });

  it("turns the write fill into a byte", () => {
    expect(parseCliArgs(["write", "--drive", "0", "--track", "1"]).fill).toBe(0xe5);
    expect(parseCliArgs(["write", "--drive", "0", "--track", "1", "--fill", "7"]).fill).toBe(7);
  });

  it("collects head-load flags for STAT", () => {
    expect(parseCliArgs(["stat", "--drive", "2", "--head", "0", "--head", "2"]).head).toEqual([0, 2]);
  });

  it("rejects baud rates the interface does not offer", () => {
    expect(() => parseCliArgs(["--baud", "9600", "stat"])).toThrow(ZodError);
  });

  it("rejects a fill that is not a byte", () => {
    expect(() => parseCliArgs(["write", "--drive", "0", "--track", "1", "--fill", "0x1ff"])).toThrow(ZodError);
  });
});
