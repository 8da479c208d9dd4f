import { RESPONSE_CODE } from "./constants";
import type { FdcError, ReadResult, StatResult, TransactionResult, WriteResult } from "./types";

function hex4(value: number): string {
  return value.toString(16).padStart(4, "0");
}

/** Operator wording for a response code, "UNKNOWN" for anything outside the defined set. */
export function responseCodeName(code: number): string {
  switch (code) {
    case RESPONSE_CODE.OK:
      return "OK";
    case RESPONSE_CODE.NOT_READY:
      return "NOT READY";
    case RESPONSE_CODE.CHECKSUM_ERROR:
      return "CHECKSUM ERROR";
    case RESPONSE_CODE.WRITE_ERROR:
      return "WRITE ERROR";
    default:
      return "UNKNOWN";
  }
}

/** One status line per failure, carrying the expected/actual context. */
export function describeError(error: FdcError): string {
  switch (error.kind) {
    case "TransportNotOpen":
      return "Serial port not open";
    case "TransportBusy":
      return "Another command is still in progress";
    case "TransportIOError":
      return `read() error: ${error.message}`;
    case "ResponseTimeout":
      return error.phase === "READ"
        ? `Received ${error.received} of ${error.expected} bytes`
        : `Timed out waiting for '${error.phase}' response (${error.received} of ${error.expected} bytes)`;
    case "TagMismatch":
      return `Did not receive '${error.expected}' response '${error.actual}'`;
    case "ChecksumInvalid":
      return error.scope === "frame"
        ? `Invalid checksum on '${error.tag ?? "????"}' response (0x${hex4(error.actual)} != 0x${hex4(error.expected)})`
        : `Track checksum mismatch (0x${hex4(error.actual)} != 0x${hex4(error.expected)})`;
    case "InvalidDriveNumber":
      return `Invalid drive number ${error.drive}`;
    case "InvalidTrackNumber":
      return `Invalid track number ${error.track} (0-${error.max})`;
    case "InvalidTrackLength":
      return `Track buffer is ${error.length} bytes, expected ${error.expected}`;
    case "ServerNotReady":
      return `Received NOT READY ${error.phase} response`;
    case "ServerChecksumError":
      return `Received CHECKSUM ERROR ${error.phase} response`;
    case "ServerWriteError":
      return `Received WRITE ERROR ${error.phase} response`;
    case "UnknownResponseCode":
      return `Received UNKNOWN ${error.phase} response (0x${hex4(error.code)})`;
  }
}

export function describeStat(result: TransactionResult<StatResult>): string {
  if (!result.ok) {
    return describeError(result.error);
  }
  return `Received 'STAT' response 0x${hex4(result.value.mountBitmap)}`;
}

export function describeRead(result: TransactionResult<ReadResult>): string {
  if (!result.ok) {
    return describeError(result.error);
  }
  const { byteCount, checksumValid, computedChecksum, receivedChecksum } = result.value;
  if (!checksumValid) {
    return `Received ${byteCount} byte track with bad checksum (0x${hex4(receivedChecksum)} != 0x${hex4(computedChecksum)})`;
  }
  return `Received ${byteCount} byte track`;
}

export function describeWrite(result: TransactionResult<WriteResult>): string {
  if (!result.ok) {
    return describeError(result.error);
  }
  return `Received WSTA ${responseCodeName(result.value.code)} response`;
}
