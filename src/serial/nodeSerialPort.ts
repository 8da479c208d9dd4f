import { SerialPort } from "serialport";
import type { SerialTransport } from "../protocol/types";
import { concatBytes } from "../protocol/utils";

type DeviceCallback = (error: Error | null) => void;

/** Subset of the serialport stream API this wrapper drives; lets tests supply a fake device. */
export interface SerialDevice {
  readonly isOpen: boolean;
  open(callback: DeviceCallback): void;
  close(callback: DeviceCallback): void;
  write(data: Buffer, callback: (error: Error | null | undefined) => void): boolean;
  drain(callback: DeviceCallback): void;
  flush(callback: DeviceCallback): void;
  set(options: { dtr?: boolean; rts?: boolean }, callback: DeviceCallback): void;
  on(event: "data", listener: (chunk: Buffer) => void): unknown;
  on(event: "error", listener: (error: Error) => void): unknown;
  on(event: "close", listener: () => void): unknown;
  removeAllListeners(): unknown;
}

/** Line settings for the FDC+ link: 8N1, no flow control. */
export interface SerialOpenOptions {
  path: string;
  baudRate: number;
  dataBits: 8;
  stopBits: 1;
  parity: "none";
  rtscts: false;
  autoOpen: false;
}

export type SerialDeviceFactory = (options: SerialOpenOptions) => SerialDevice;

export interface SerialPortSummary {
  path: string;
  manufacturer?: string;
  serialNumber?: string;
}

const createSerialPortDevice: SerialDeviceFactory = (options) => new SerialPort(options);

/** Enumerates serial ports the OS reports. */
export async function listSerialPorts(): Promise<SerialPortSummary[]> {
  const ports = await SerialPort.list();
  return ports.map((port) => ({
    path: port.path,
    manufacturer: port.manufacturer,
    serialNumber: port.serialNumber
  }));
}

function callbackToPromise(run: (callback: DeviceCallback) => void): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    run((error) => {
      if (error) {
        reject(error);
      } else {
        resolve();
      }
    });
  });
}

/** Node serial port with buffered receive and timeout-bounded reads. */
export class NodeSerialPort implements SerialTransport {
  private device: SerialDevice | null = null;
  private rxBuffer = new Uint8Array(0);
  private failure: Error | null = null;
  private notifyData: (() => void) | null = null;
  private openPath: string | null = null;

  constructor(private readonly createDevice: SerialDeviceFactory = createSerialPortDevice) {}

  get isOpen(): boolean {
    return this.device?.isOpen ?? false;
  }

  get path(): string | null {
    return this.openPath;
  }

  /** Opens 8N1 without flow control, raises DTR/RTS and discards anything already queued. */
  async open(path: string, baudRate: number): Promise<void> {
    if (this.device) {
      await this.close();
    }

    const device = this.createDevice({
      path,
      baudRate,
      dataBits: 8,
      stopBits: 1,
      parity: "none",
      rtscts: false,
      autoOpen: false
    });
    device.on("data", (chunk) => {
      this.rxBuffer = concatBytes(this.rxBuffer, new Uint8Array(chunk));
      this.wake();
    });
    device.on("error", (error) => {
      this.failure = error;
      this.wake();
    });
    device.on("close", () => {
      this.failure = this.failure ?? new Error("Serial port closed");
      this.wake();
    });

    try {
      await callbackToPromise((done) => device.open(done));
      await callbackToPromise((done) => device.set({ dtr: true, rts: true }, done));
      await callbackToPromise((done) => device.flush(done));
    } catch (error) {
      device.removeAllListeners();
      if (device.isOpen) {
        await callbackToPromise((done) => device.close(done));
      }
      throw error;
    }

    this.device = device;
    this.openPath = path;
    this.rxBuffer = new Uint8Array(0);
    this.failure = null;
  }

  /** Writes one buffer and waits until the OS has taken all of it. */
  async write(data: Uint8Array): Promise<void> {
    const device = this.requireDevice();
    await new Promise<void>((resolve, reject) => {
      device.write(Buffer.from(data), (error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
    await callbackToPromise((done) => device.drain(done));
  }

  /** Returns up to maxBytes as soon as any are buffered, or an empty array once timeoutMs passes. */
  async readAtMost(maxBytes: number, timeoutMs: number): Promise<Uint8Array> {
    this.requireDevice();

    if (this.rxBuffer.length === 0 && !this.failure) {
      await this.waitForData(timeoutMs);
    }
    if (this.failure) {
      throw this.failure;
    }

    const count = Math.min(maxBytes, this.rxBuffer.length);
    const out = this.rxBuffer.slice(0, count);
    this.rxBuffer = this.rxBuffer.slice(count);
    return out;
  }

  async close(): Promise<void> {
    const device = this.device;
    this.device = null;
    this.openPath = null;
    this.rxBuffer = new Uint8Array(0);
    // A read waiting on this port must fail rather than time out.
    this.failure = new Error("Serial port closed");
    this.wake();
    if (!device) {
      return;
    }
    device.removeAllListeners();
    if (device.isOpen) {
      await callbackToPromise((done) => device.close(done));
    }
  }

  private requireDevice(): SerialDevice {
    if (!this.device || !this.device.isOpen) {
      throw new Error("Serial port not open");
    }
    return this.device;
  }

  private waitForData(timeoutMs: number): Promise<void> {
    return new Promise<void>((resolve) => {
      const timer = setTimeout(() => {
        this.notifyData = null;
        resolve();
      }, timeoutMs);
      this.notifyData = () => {
        clearTimeout(timer);
        this.notifyData = null;
        resolve();
      };
    });
  }

  private wake(): void {
    this.notifyData?.();
  }
}
