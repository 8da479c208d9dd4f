import { checksum16 } from "./checksum";
import {
  DATA_TIMEOUT_MS,
  FRAME_CHECKSUM_SPAN,
  FRAME_SIZE,
  FRAME_TIMEOUT_MS,
  MAX_DRIVE,
  NO_DRIVE,
  RESPONSE_CODE,
  TRACK_CHECKSUM_SIZE
} from "./constants";
import { mountedDrives } from "./driveState";
import type { DriveState } from "./driveState";
import { bytesToHex, decodeFrame, encodeCommand, packDriveTrack, packStatParam, toResponseFrame } from "./frame";
import { appendTrackChecksum, verifyTrackBlock } from "./trackBlock";
import type {
  CommandFrame,
  EngineOptions,
  FdcError,
  Geometry,
  ReadResult,
  ResponseFrame,
  ResponseTag,
  SerialTransport,
  StatResult,
  TransactionResult,
  WriteResult
} from "./types";

/** Carries a protocol failure from deep inside a transaction up to its result boundary. */
export class TransactionError extends Error {
  constructor(readonly detail: FdcError) {
    super(detail.kind);
    this.name = "TransactionError";
  }
}

function hex4(value: number): string {
  return value.toString(16).padStart(4, "0");
}

/**
 * FDC side of the FDC+ serial drive protocol. One transaction at a time;
 * failures come back as result values and nothing is retried here.
 */
export class FdcProtocolEngine {
  private busy = false;
  private readonly frameTimeoutMs: number;
  private readonly dataTimeoutMs: number;
  private readonly log?: (line: string) => void;

  constructor(private readonly transport: SerialTransport, options: EngineOptions = {}) {
    this.frameTimeoutMs = options.frameTimeoutMs ?? FRAME_TIMEOUT_MS;
    this.dataTimeoutMs = options.dataTimeoutMs ?? DATA_TIMEOUT_MS;
    this.log = options.log;
  }

  /** True while a transaction owns the transport. */
  get inFlight(): boolean {
    return this.busy;
  }

  async doStat(state: DriveState): Promise<TransactionResult<StatResult>> {
    return this.run("STAT", async () => {
      await this.sendCommand({ tag: "STAT", param1: packStatParam(state.drive, state.headLoaded), param2: 0 });
      const response = await this.expectResponse("STAT");
      this.log?.(`STAT mount bitmap 0x${hex4(response.data)}`);
      return {
        mountBitmap: response.data,
        mountedDrives: mountedDrives(response.data),
        code: response.code
      };
    });
  }

  async doRead(drive: number | null, track: number, geometry: Geometry): Promise<TransactionResult<ReadResult>> {
    return this.run("READ", async () => {
      const target = this.checkTarget(drive, track, geometry);
      await this.sendCommand({ tag: "READ", param1: packDriveTrack(target, track), param2: geometry.trackLength });

      const expected = geometry.trackLength + TRACK_CHECKSUM_SIZE;
      const block = await this.receive(expected, this.dataTimeoutMs);
      this.log?.(`READ received ${block.length} of ${expected} bytes`);
      if (block.length < expected) {
        throw new TransactionError({ kind: "ResponseTimeout", phase: "READ", received: block.length, expected });
      }

      // A bad trailer is reported, not retried; re-issuing READ is the caller's decision.
      const verified = verifyTrackBlock(block, geometry.trackLength);
      if (!verified.valid) {
        this.log?.(`READ track checksum 0x${hex4(verified.received)} != computed 0x${hex4(verified.computed)}`);
      }
      return {
        data: verified.data,
        byteCount: verified.data.length,
        checksumValid: verified.valid,
        computedChecksum: verified.computed,
        receivedChecksum: verified.received
      };
    });
  }

  async doWrit(
    drive: number | null,
    track: number,
    geometry: Geometry,
    trackBytes: Uint8Array
  ): Promise<TransactionResult<WriteResult>> {
    return this.run("WRIT", async () => {
      const target = this.checkTarget(drive, track, geometry);
      if (trackBytes.length !== geometry.trackLength) {
        throw new TransactionError({ kind: "InvalidTrackLength", length: trackBytes.length, expected: geometry.trackLength });
      }

      await this.sendCommand({ tag: "WRIT", param1: packDriveTrack(target, track), param2: geometry.trackLength });
      const grant = await this.expectResponse("WRIT");
      // The server must explicitly grant the transfer before any track data goes out.
      this.checkCode(grant.code, "WRIT");

      const block = appendTrackChecksum(trackBytes);
      this.log?.(`WRIT sending ${block.length} byte track block`);
      await this.transport.write(block);

      const status = await this.expectResponse("WSTA");
      this.checkCode(status.code, "WSTA");
      return { code: RESPONSE_CODE.OK, bytesSent: block.length };
    });
  }

  private async run<T>(label: string, transaction: () => Promise<T>): Promise<TransactionResult<T>> {
    if (!this.transport.isOpen) {
      return { ok: false, error: { kind: "TransportNotOpen" } };
    }
    if (this.busy) {
      return { ok: false, error: { kind: "TransportBusy" } };
    }

    this.busy = true;
    try {
      return { ok: true, value: await transaction() };
    } catch (error) {
      if (error instanceof TransactionError) {
        this.log?.(`${label} failed: ${error.detail.kind}`);
        return { ok: false, error: error.detail };
      }
      const message = error instanceof Error ? error.message : String(error);
      this.log?.(`${label} transport error: ${message}`);
      return { ok: false, error: { kind: "TransportIOError", message } };
    } finally {
      this.busy = false;
    }
  }

  private checkTarget(drive: number | null, track: number, geometry: Geometry): number {
    if (drive === null || !Number.isInteger(drive) || drive < 0 || drive >= MAX_DRIVE) {
      throw new TransactionError({ kind: "InvalidDriveNumber", drive: drive ?? NO_DRIVE });
    }
    if (!Number.isInteger(track) || track < 0 || track >= geometry.trackCount) {
      throw new TransactionError({ kind: "InvalidTrackNumber", track, max: geometry.trackCount - 1 });
    }
    return drive;
  }

  private async sendCommand(command: CommandFrame): Promise<void> {
    const frame = encodeCommand(command);
    this.log?.(`tx ${command.tag} ${bytesToHex(frame)}`);
    await this.transport.write(frame);
  }

  /** Waits for one full response frame and gates it on checksum and tag. */
  private async expectResponse(tag: ResponseTag): Promise<ResponseFrame> {
    const raw = await this.receive(FRAME_SIZE, this.frameTimeoutMs);
    if (raw.length < FRAME_SIZE) {
      this.log?.(`rx ${tag} timeout${raw.length > 0 ? ` (rx=${bytesToHex(raw)})` : ""}`);
      throw new TransactionError({ kind: "ResponseTimeout", phase: tag, received: raw.length, expected: FRAME_SIZE });
    }

    this.log?.(`rx ${bytesToHex(raw)}`);
    const decoded = decodeFrame(raw);
    if (!decoded.checksumValid) {
      throw new TransactionError({
        kind: "ChecksumInvalid",
        scope: "frame",
        tag: decoded.tag,
        expected: checksum16(raw, FRAME_CHECKSUM_SPAN),
        actual: decoded.checksum
      });
    }
    if (decoded.tag !== tag) {
      throw new TransactionError({ kind: "TagMismatch", expected: tag, actual: decoded.tag });
    }
    return toResponseFrame(decoded);
  }

  private checkCode(code: number, phase: "WRIT" | "WSTA"): void {
    switch (code) {
      case RESPONSE_CODE.OK:
        return;
      case RESPONSE_CODE.NOT_READY:
        throw new TransactionError({ kind: "ServerNotReady", phase });
      case RESPONSE_CODE.CHECKSUM_ERROR:
        throw new TransactionError({ kind: "ServerChecksumError", phase });
      case RESPONSE_CODE.WRITE_ERROR:
        throw new TransactionError({ kind: "ServerWriteError", phase });
      default:
        throw new TransactionError({ kind: "UnknownResponseCode", phase, code });
    }
  }

  /**
   * Accumulates up to length bytes. Each attempt waits at most attemptTimeoutMs;
   * an empty attempt means the sender went quiet and ends the wait.
   */
  private async receive(length: number, attemptTimeoutMs: number): Promise<Uint8Array> {
    const buffer = new Uint8Array(length);
    let received = 0;
    while (received < length) {
      const chunk = await this.transport.readAtMost(length - received, attemptTimeoutMs);
      if (chunk.length === 0) {
        break;
      }
      const take = chunk.subarray(0, length - received);
      buffer.set(take, received);
      received += take.length;
    }
    return buffer.slice(0, received);
  }
}
