import { describe, expect, it } from "vitest";
import { friendlyErrorMessage } from "./errorMessages";

describe("friendlyErrorMessage", () => {
  it("explains a missing port selection", () => {
    expect(friendlyErrorMessage(new Error("No serial port selected"))).toBe(
      "No serial port selected. Pass --port (see the 'ports' command) or run with --simulate."
    );
  });

  it("maps operating system errors", () => {
    expect(friendlyErrorMessage(new Error("Error: No such file or directory, cannot open /dev/ttyUSB9"))).toBe(
      "Serial port not found. Check the adapter is plugged in and the port name is right."
    );
    expect(friendlyErrorMessage(new Error("Error Resource temporarily unavailable Cannot lock port"))).toBe(
      "Serial port is in use by another program. Close it and try again."
    );
    expect(friendlyErrorMessage(new Error("Error: Permission denied, cannot open /dev/ttyS0"))).toBe(
      "Permission denied. On Linux, add your user to the 'dialout' group."
    );
  });

  it("keeps unknown messages", () => {
    expect(friendlyErrorMessage("weird")).toBe("Error: weird");
  });
});
