import { FRAME_SIZE, RESPONSE_CODE, TRACK_CHECKSUM_SIZE } from "./constants";
import { bytesToHex, decodeFrame, encodeResponse, toCommandFrame, unpackDriveTrack, unpackStatParam } from "./frame";
import { appendTrackChecksum, verifyTrackBlock } from "./trackBlock";
import type { CommandFrame, Geometry, ResponseTag, SerialTransport } from "./types";
import { concatBytes, sleep } from "./utils";

interface MountedImage {
  geometry: Geometry;
  tracks: Uint8Array[];
}

interface PendingWrite {
  drive: number;
  track: number;
  length: number;
}

export interface SimulatedServerOptions {
  /** Largest slice handed out per read, to mimic a UART delivering bursts. */
  chunkSize?: number;
  log?: (line: string) => void;
}

/**
 * In-process drive server answering FDC commands over the SerialTransport contract.
 * Images live in memory only. Commands with a bad checksum are ignored, like a real server.
 */
export class SimulatedFdcServer implements SerialTransport {
  private open = true;
  private inbox = new Uint8Array(0);
  private outbox = new Uint8Array(0);
  private pendingWrite: PendingWrite | null = null;
  private corruptNextTrack = false;
  private readonly images = new Map<number, MountedImage>();
  private readonly chunkSize: number;
  private readonly log?: (line: string) => void;

  /** Every well-formed command received, oldest first. */
  readonly commands: CommandFrame[] = [];
  /** Drive selection and head-load flags from the latest STAT. */
  lastStat: { drive: number | null; headLoaded: boolean[] } | null = null;
  /** Track most recently named by a READ or WRIT, per drive. */
  readonly lastTrack = new Map<number, number>();

  constructor(options: SimulatedServerOptions = {}) {
    this.chunkSize = options.chunkSize ?? 256;
    this.log = options.log;
  }

  get isOpen(): boolean {
    return this.open;
  }

  close(): void {
    this.open = false;
    this.inbox = new Uint8Array(0);
    this.outbox = new Uint8Array(0);
    this.pendingWrite = null;
  }

  /** Mounts a blank image whose tracks are filled with the given byte. */
  mount(drive: number, geometry: Geometry, fill = 0xe5): void {
    if (!Number.isInteger(drive) || drive < 0 || drive > 15) {
      throw new RangeError(`Drive number must be 0-15, got ${drive}`);
    }
    const tracks = Array.from({ length: geometry.trackCount }, () => new Uint8Array(geometry.trackLength).fill(fill));
    this.images.set(drive, { geometry, tracks });
  }

  unmount(drive: number): void {
    this.images.delete(drive);
  }

  get mountBitmap(): number {
    let bitmap = 0;
    for (const drive of this.images.keys()) {
      bitmap |= 1 << drive;
    }
    return bitmap;
  }

  trackData(drive: number, track: number): Uint8Array | undefined {
    return this.images.get(drive)?.tracks[track];
  }

  setTrackData(drive: number, track: number, data: Uint8Array): void {
    const image = this.images.get(drive);
    if (!image || track < 0 || track >= image.geometry.trackCount || data.length !== image.geometry.trackLength) {
      throw new RangeError(`Cannot store ${data.length} bytes at drive ${drive} track ${track}`);
    }
    image.tracks[track] = data.slice();
  }

  /** Sends the next READ block with a checksum trailer that does not match its data. */
  corruptNextTrackChecksum(): void {
    this.corruptNextTrack = true;
  }

  async write(data: Uint8Array): Promise<void> {
    if (!this.open) {
      throw new Error("Port is not open");
    }
    this.inbox = concatBytes(this.inbox, data);
    this.process();
  }

  async readAtMost(maxBytes: number, timeoutMs: number): Promise<Uint8Array> {
    if (!this.open) {
      throw new Error("Port is not open");
    }
    if (this.outbox.length === 0) {
      await sleep(timeoutMs);
      if (this.outbox.length === 0) {
        return new Uint8Array(0);
      }
    }
    const count = Math.min(maxBytes, this.chunkSize, this.outbox.length);
    const out = this.outbox.slice(0, count);
    this.outbox = this.outbox.slice(count);
    return out;
  }

  private process(): void {
    for (;;) {
      if (this.pendingWrite) {
        const blockSize = this.pendingWrite.length + TRACK_CHECKSUM_SIZE;
        if (this.inbox.length < blockSize) {
          return;
        }
        const block = this.inbox.slice(0, blockSize);
        this.inbox = this.inbox.slice(blockSize);
        this.finishWrite(this.pendingWrite, block);
        this.pendingWrite = null;
        continue;
      }

      if (this.inbox.length < FRAME_SIZE) {
        return;
      }
      const raw = this.inbox.slice(0, FRAME_SIZE);
      this.inbox = this.inbox.slice(FRAME_SIZE);
      const decoded = decodeFrame(raw);
      if (!decoded.checksumValid) {
        this.log?.(`server ignored command with bad checksum ${bytesToHex(raw)}`);
        continue;
      }
      this.handleCommand(toCommandFrame(decoded));
    }
  }

  private handleCommand(command: CommandFrame): void {
    this.commands.push(command);
    switch (command.tag) {
      case "STAT":
        this.lastStat = unpackStatParam(command.param1);
        this.respond("STAT", RESPONSE_CODE.OK, this.mountBitmap);
        return;
      case "READ": {
        const { drive, track } = unpackDriveTrack(command.param1);
        this.lastTrack.set(drive, track);
        const image = this.images.get(drive);
        if (!image || command.param2 !== image.geometry.trackLength || track >= image.geometry.trackCount) {
          // READ has no error response; the FDC sees silence and times out.
          this.log?.(`server cannot read drive ${drive} track ${track}`);
          return;
        }
        const block = appendTrackChecksum(image.tracks[track]);
        if (this.corruptNextTrack) {
          block[block.length - 1] ^= 0xff;
          this.corruptNextTrack = false;
        }
        this.outbox = concatBytes(this.outbox, block);
        return;
      }
      case "WRIT": {
        const { drive, track } = unpackDriveTrack(command.param1);
        this.lastTrack.set(drive, track);
        const image = this.images.get(drive);
        if (!image || command.param2 !== image.geometry.trackLength || track >= image.geometry.trackCount) {
          this.respond("WRIT", RESPONSE_CODE.NOT_READY, 0);
          return;
        }
        this.pendingWrite = { drive, track, length: command.param2 };
        this.respond("WRIT", RESPONSE_CODE.OK, 0);
        return;
      }
      default:
        this.log?.(`server ignored unknown command '${command.tag}'`);
    }
  }

  private finishWrite(pending: PendingWrite, block: Uint8Array): void {
    const verified = verifyTrackBlock(block, pending.length);
    if (!verified.valid) {
      this.respond("WSTA", RESPONSE_CODE.CHECKSUM_ERROR, 0);
      return;
    }
    this.setTrackData(pending.drive, pending.track, verified.data);
    this.respond("WSTA", RESPONSE_CODE.OK, 0);
  }

  private respond(tag: ResponseTag, code: number, data: number): void {
    this.outbox = concatBytes(this.outbox, encodeResponse({ tag, code, data }));
  }
}
