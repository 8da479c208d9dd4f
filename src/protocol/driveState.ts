import { MAX_DRIVE } from "./constants";
import { DEFAULT_GEOMETRY } from "./geometry";
import type { Geometry } from "./types";

/**
 * Session parameters shared by the operator and the protocol engine.
 * Setters validate; the engine only reads them, and the session applies STAT/READ refreshes.
 */
export class DriveState {
  private selected: number | null = null;
  private heads: boolean[] = new Array<boolean>(MAX_DRIVE).fill(false);
  private currentTrack = 0;
  private activeGeometry: Geometry = DEFAULT_GEOMETRY;
  private mounts = 0;

  get drive(): number | null {
    return this.selected;
  }

  get track(): number {
    return this.currentTrack;
  }

  get geometry(): Geometry {
    return this.activeGeometry;
  }

  get headLoaded(): readonly boolean[] {
    return this.heads;
  }

  /** Last drive-mount bitmap reported by the server. */
  get mountBitmap(): number {
    return this.mounts;
  }

  selectDrive(drive: number | null): void {
    if (drive !== null && (!Number.isInteger(drive) || drive < 0 || drive >= MAX_DRIVE)) {
      throw new RangeError(`Drive number must be 0-${MAX_DRIVE - 1}, got ${drive}`);
    }
    this.selected = drive;
  }

  setHeadLoaded(drive: number, loaded: boolean): void {
    if (!Number.isInteger(drive) || drive < 0 || drive >= MAX_DRIVE) {
      throw new RangeError(`Drive number must be 0-${MAX_DRIVE - 1}, got ${drive}`);
    }
    this.heads[drive] = loaded;
  }

  setTrack(track: number): void {
    if (!Number.isInteger(track) || track < 0 || track >= this.activeGeometry.trackCount) {
      throw new RangeError(`Track number must be 0-${this.activeGeometry.trackCount - 1}, got ${track}`);
    }
    this.currentTrack = track;
  }

  /** Switching format clamps the current track into the new range. */
  setGeometry(geometry: Geometry): void {
    this.activeGeometry = geometry;
    if (this.currentTrack >= geometry.trackCount) {
      this.currentTrack = geometry.trackCount - 1;
    }
  }

  applyMountBitmap(bitmap: number): void {
    this.mounts = bitmap & 0xffff;
  }

  isMounted(drive: number): boolean {
    return (this.mounts & (1 << drive)) !== 0;
  }

  /** Mounted flag for each addressable drive, for the LED row. */
  mountedFlags(): boolean[] {
    return Array.from({ length: MAX_DRIVE }, (_, drive) => this.isMounted(drive));
  }
}

/** Drive numbers whose bit is set in a STAT mount bitmap. */
export function mountedDrives(bitmap: number): number[] {
  const drives: number[] = [];
  for (let bit = 0; bit < 16; bit += 1) {
    if (bitmap & (1 << bit)) {
      drives.push(bit);
    }
  }
  return drives;
}
