import { EventEmitter } from "node:events";
import { describe, expect, it } from "vitest";
import { DriveState } from "../protocol/driveState";
import { FdcProtocolEngine } from "../protocol/engine";
import type { SerialDevice, SerialOpenOptions } from "./nodeSerialPort";
import { NodeSerialPort } from "./nodeSerialPort";

type DeviceCallback = (error: Error | null) => void;

/** In-memory stand-in for a serialport device; tests push data with emit("data"). */
class FakeDevice extends EventEmitter implements SerialDevice {
  isOpen = false;
  openError: Error | null = null;
  signals: { dtr?: boolean; rts?: boolean } | null = null;
  flushed = false;
  readonly written: Buffer[] = [];

  open(callback: DeviceCallback): void {
    if (this.openError) {
      callback(this.openError);
      return;
    }
    this.isOpen = true;
    callback(null);
  }

  close(callback: DeviceCallback): void {
    this.isOpen = false;
    callback(null);
  }

  write(data: Buffer, callback: (error: Error | null | undefined) => void): boolean {
    this.written.push(data);
    callback(null);
    return true;
  }

  drain(callback: DeviceCallback): void {
    callback(null);
  }

  flush(callback: DeviceCallback): void {
    this.flushed = true;
    callback(null);
  }

  set(options: { dtr?: boolean; rts?: boolean }, callback: DeviceCallback): void {
    this.signals = options;
    callback(null);
  }
}

async function openFake(): Promise<{ port: NodeSerialPort; device: FakeDevice; options: SerialOpenOptions[] }> {
  const device = new FakeDevice();
  const options: SerialOpenOptions[] = [];
  const port = new NodeSerialPort((opts) => {
    options.push(opts);
    return device;
  });
  await port.open("/dev/ttyUSB0", 230400);
  return { port, device, options };
}

describe("NodeSerialPort", () => {
  it("opens 8N1 without flow control and raises DTR/RTS", async () => {
    const { port, device, options } = await openFake();
    expect(options).toEqual([
      {
        path: "/dev/ttyUSB0",
        baudRate: 230400,
        dataBits: 8,
        stopBits: 1,
        parity: "none",
        rtscts: false,
        autoOpen: false
      }
    ]);
    expect(device.signals).toEqual({ dtr: true, rts: true });
    expect(device.flushed).toBe(true);
    expect(port.isOpen).toBe(true);
    expect(port.path).toBe("/dev/ttyUSB0");
  });

  it("hands out buffered bytes up to the requested count", async () => {
    const { port, device } = await openFake();
    device.emit("data", Buffer.from([1, 2, 3]));
    await expect(port.readAtMost(2, 50)).resolves.toEqual(new Uint8Array([1, 2]));
    await expect(port.readAtMost(10, 50)).resolves.toEqual(new Uint8Array([3]));
  });

  it("wakes a pending read when data arrives", async () => {
    const { port, device } = await openFake();
    const pending = port.readAtMost(4, 1000);
    device.emit("data", Buffer.from([9]));
    await expect(pending).resolves.toEqual(new Uint8Array([9]));
  });

  it("returns nothing once the timeout passes", async () => {
    const { port } = await openFake();
    const chunk = await port.readAtMost(4, 10);
    expect(chunk).toHaveLength(0);
  });

  it("rejects reads after a device error", async () => {
    const { port, device } = await openFake();
    device.emit("error", new Error("device lost"));
    await expect(port.readAtMost(4, 50)).rejects.toThrow("device lost");
  });

  it("fails a pending read when the port is closed", async () => {
    const { port } = await openFake();
    const pending = port.readAtMost(4, 1000);
    await port.close();
    await expect(pending).rejects.toThrow("Serial port closed");
  });

  it("ends a transaction with an I/O error when the port closes mid-wait", async () => {
    const { port } = await openFake();
    const engine = new FdcProtocolEngine(port, { frameTimeoutMs: 1000 });
    const pending = engine.doStat(new DriveState());
    await new Promise((resolve) => setTimeout(resolve, 20));
    await port.close();
    expect(await pending).toEqual({ ok: false, error: { kind: "TransportIOError", message: "Serial port closed" } });
  });

  it("writes whole buffers", async () => {
    const { port, device } = await openFake();
    await port.write(new Uint8Array([0x53, 0x54]));
    expect(device.written).toEqual([Buffer.from([0x53, 0x54])]);
  });

  it("refuses I/O before open", async () => {
    const port = new NodeSerialPort(() => new FakeDevice());
    await expect(port.readAtMost(1, 10)).rejects.toThrow("Serial port not open");
    await expect(port.write(new Uint8Array([1]))).rejects.toThrow("Serial port not open");
  });

  it("stays closed when the device cannot be opened", async () => {
    const device = new FakeDevice();
    device.openError = new Error("Cannot lock port");
    const port = new NodeSerialPort(() => device);
    await expect(port.open("/dev/ttyUSB1", 230400)).rejects.toThrow("Cannot lock port");
    expect(port.isOpen).toBe(false);
  });

  it("closes the device", async () => {
    const { port, device } = await openFake();
    await port.close();
    expect(device.isOpen).toBe(false);
    expect(port.isOpen).toBe(false);
    expect(port.path).toBeNull();
  });
});
