import type { RESPONSE_CODE } from "./constants";

/** Tags the FDC sends to the drive server. */
export type CommandTag = "STAT" | "READ" | "WRIT";
/** Tags the drive server answers with. */
export type ResponseTag = "STAT" | "WRIT" | "WSTA";

/** Known response code values; anything else on the wire is reported as unknown. */
export type ResponseCode = (typeof RESPONSE_CODE)[keyof typeof RESPONSE_CODE];

/** Both directions share one layout; only the field names differ. */
export interface CommandFrame {
  tag: string;
  param1: number;
  param2: number;
}

export interface ResponseFrame {
  tag: string;
  code: number;
  data: number;
}

/** Raw view of a received frame before any direction is applied. */
export interface DecodedFrame {
  tag: string;
  field1: number;
  field2: number;
  checksum: number;
  checksumValid: boolean;
}

export type GeometryId = "8inch" | "minidisk";

/** Track length and track count of one supported disk format. */
export interface Geometry {
  id: GeometryId;
  label: string;
  trackLength: number;
  trackCount: number;
}

/** Byte-stream contract consumed by the protocol engine. */
export interface SerialTransport {
  readonly isOpen: boolean;
  write(data: Uint8Array): Promise<void>;
  /** Resolves with up to maxBytes as soon as any arrive, or empty after timeoutMs. Rejects on I/O failure. */
  readAtMost(maxBytes: number, timeoutMs: number): Promise<Uint8Array>;
}

export type ResponsePhase = "STAT" | "READ" | "WRIT" | "WSTA";

export type ServerErrorKind = "ServerNotReady" | "ServerChecksumError" | "ServerWriteError";

/** Every way a transaction can fail; each ends only the current transaction. */
export type FdcError =
  | { kind: "TransportNotOpen" }
  | { kind: "TransportBusy" }
  | { kind: "TransportIOError"; message: string }
  | { kind: "ResponseTimeout"; phase: ResponsePhase; received: number; expected: number }
  | { kind: "TagMismatch"; expected: ResponseTag; actual: string }
  | { kind: "ChecksumInvalid"; scope: "frame" | "track"; tag?: string; expected: number; actual: number }
  | { kind: "InvalidDriveNumber"; drive: number }
  | { kind: "InvalidTrackNumber"; track: number; max: number }
  | { kind: "InvalidTrackLength"; length: number; expected: number }
  | { kind: ServerErrorKind; phase: "WRIT" | "WSTA" }
  | { kind: "UnknownResponseCode"; phase: "WRIT" | "WSTA"; code: number };

export type TransactionResult<T> = { ok: true; value: T } | { ok: false; error: FdcError };

export interface StatResult {
  mountBitmap: number;
  mountedDrives: number[];
  /** Field 1 of the STAT response; the FDC ignores it. */
  code: number;
}

export interface ReadResult {
  data: Uint8Array;
  byteCount: number;
  checksumValid: boolean;
  computedChecksum: number;
  receivedChecksum: number;
}

export interface WriteResult {
  code: ResponseCode;
  bytesSent: number;
}

/** Engine timing and optional log sink. */
export interface EngineOptions {
  frameTimeoutMs?: number;
  dataTimeoutMs?: number;
  log?: (line: string) => void;
}
