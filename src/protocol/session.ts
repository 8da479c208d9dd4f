import { DriveState } from "./driveState";
import type { FdcProtocolEngine } from "./engine";
import type { Geometry, ReadResult, StatResult, TransactionResult, WriteResult } from "./types";

/**
 * Binds one engine to one drive/track state and the track buffer that
 * READ fills and WRIT sends.
 */
export class FdcSession {
  private buffer: Uint8Array;

  constructor(private readonly engine: FdcProtocolEngine, readonly state: DriveState = new DriveState()) {
    this.buffer = new Uint8Array(state.geometry.trackLength);
  }

  get trackBuffer(): Uint8Array {
    return this.buffer;
  }

  get busy(): boolean {
    return this.engine.inFlight;
  }

  /** Changes format and resizes the track buffer, discarding its contents. */
  setGeometry(geometry: Geometry): void {
    this.state.setGeometry(geometry);
    if (this.buffer.length !== geometry.trackLength) {
      this.buffer = new Uint8Array(geometry.trackLength);
    }
  }

  fillTrackBuffer(value: number): void {
    this.buffer.fill(value & 0xff);
  }

  async stat(): Promise<TransactionResult<StatResult>> {
    const result = await this.engine.doStat(this.state);
    if (result.ok) {
      this.state.applyMountBitmap(result.value.mountBitmap);
    }
    return result;
  }

  /** Reads the current track, or another one; a successful READ moves the state to that track. */
  async read(track = this.state.track): Promise<TransactionResult<ReadResult>> {
    const result = await this.engine.doRead(this.state.drive, track, this.state.geometry);
    if (result.ok) {
      this.state.setTrack(track);
      this.buffer = result.value.data.slice();
    }
    return result;
  }

  async write(data: Uint8Array = this.buffer): Promise<TransactionResult<WriteResult>> {
    return this.engine.doWrit(this.state.drive, this.state.track, this.state.geometry, data);
  }
}
