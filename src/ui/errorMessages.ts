/**
 * Maps technical serial-layer error messages to operator explanations.
 * Protocol failures never reach here; they come back as results with their own status text.
 */
export function friendlyErrorMessage(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);

  // No port chosen yet
  if (message.includes("No serial port") || message.includes("\"path\" is not defined")) {
    return "No serial port selected. Pass --port (see the 'ports' command) or run with --simulate.";
  }

  // Port missing or unplugged
  if (message.includes("No such file") || message.includes("ENOENT") || message.includes("File not found")) {
    return "Serial port not found. Check the adapter is plugged in and the port name is right.";
  }

  // Port held by another program
  if (message.includes("Resource busy") || message.includes("EBUSY") || message.includes("Cannot lock port")) {
    return "Serial port is in use by another program. Close it and try again.";
  }

  // Permission errors
  if (message.includes("Permission denied") || message.includes("EACCES") || message.includes("Access denied")) {
    return "Permission denied. On Linux, add your user to the 'dialout' group.";
  }

  // Baud rate rejected by the driver
  if (message.includes("baud") || message.includes("Baud")) {
    return "The serial driver rejected the baud rate. Try 230400, the rate most PC ports support.";
  }

  if (message.includes("Serial port not open") || message.includes("Port is not open")) {
    return "Serial port not open.";
  }

  // Generic fallback with original message
  return `Error: ${message}`;
}
