import { describe, expect, it } from "vitest";
import { FdcProtocolEngine } from "./engine";
import { GEOMETRIES } from "./geometry";
import { FdcSession } from "./session";
import { SimulatedFdcServer } from "./simulatedServer";
import { describeRead } from "./status";

const [EIGHT_INCH, MINIDISK] = GEOMETRIES;

/** Session wired to an in-process server with short timeouts. */
function createHarness(): { server: SimulatedFdcServer; session: FdcSession } {
  const server = new SimulatedFdcServer();
  server.mount(0, EIGHT_INCH);
  server.mount(1, EIGHT_INCH);
  const engine = new FdcProtocolEngine(server, { frameTimeoutMs: 20, dataTimeoutMs: 20 });
  return { server, session: new FdcSession(engine) };
}

function pattern(length: number): Uint8Array {
  return Uint8Array.from({ length }, (_, i) => i & 0xff);
}

describe("FdcSession against the simulated server", () => {
  it("applies the STAT mount bitmap to the drive state", async () => {
    const { server, session } = createHarness();
    session.state.selectDrive(0);
    session.state.setHeadLoaded(0, true);

    const result = await session.stat();

    expect(result.ok && result.value.mountedDrives).toEqual([0, 1]);
    expect(session.state.mountBitmap).toBe(0x0003);
    expect(server.lastStat).toEqual({ drive: 0, headLoaded: [true, false, false, false] });
  });

  it("reads a track into the buffer and moves to it", async () => {
    const { server, session } = createHarness();
    server.setTrackData(0, 5, pattern(4384));
    session.state.selectDrive(0);

    const result = await session.read(5);

    expect(result.ok && result.value.checksumValid).toBe(true);
    expect(session.state.track).toBe(5);
    expect(session.trackBuffer).toEqual(pattern(4384));
  });

  it("lets the server report the last track asked of each drive", async () => {
    const { server, session } = createHarness();
    session.state.selectDrive(0);
    await session.read(9);
    session.state.selectDrive(1);
    session.state.setTrack(3);
    await session.write();

    expect(server.lastTrack.get(0)).toBe(9);
    expect(server.lastTrack.get(1)).toBe(3);
    expect(server.lastTrack.has(2)).toBe(false);
  });

  it("turns away a READ while a STAT is still in flight", async () => {
    const { session } = createHarness();
    session.state.selectDrive(0);
    const poll = session.stat();

    expect(session.busy).toBe(true);
    const read = await session.read();

    expect(read).toEqual({ ok: false, error: { kind: "TransportBusy" } });
    expect(describeRead(read)).toBe("Another command is still in progress");
    expect((await poll).ok).toBe(true);
  });

  it("writes the buffer back to the current track", async () => {
    const { server, session } = createHarness();
    session.state.selectDrive(1);
    session.state.setTrack(12);
    session.fillTrackBuffer(0x42);

    const result = await session.write();

    expect(result).toEqual({ ok: true, value: { code: 0, bytesSent: 4386 } });
    expect(server.trackData(1, 12)).toEqual(new Uint8Array(4384).fill(0x42));
  });

  it("times out reading a drive with nothing mounted", async () => {
    const { session } = createHarness();
    session.state.selectDrive(2);
    session.state.setTrack(7);

    const result = await session.read();

    expect(result).toEqual({
      ok: false,
      error: { kind: "ResponseTimeout", phase: "READ", received: 0, expected: 4386 }
    });
    expect(session.state.track).toBe(7);
  });

  it("is refused writing to a drive with nothing mounted", async () => {
    const { server, session } = createHarness();
    session.state.selectDrive(3);

    const result = await session.write();

    expect(result).toEqual({ ok: false, error: { kind: "ServerNotReady", phase: "WRIT" } });
    expect(server.commands.map((command) => command.tag)).toEqual(["WRIT"]);
  });

  it("surfaces a corrupted track trailer", async () => {
    const { server, session } = createHarness();
    server.corruptNextTrackChecksum();
    session.state.selectDrive(0);

    const corrupted = await session.read();
    const clean = await session.read();

    expect(corrupted.ok && corrupted.value.checksumValid).toBe(false);
    expect(clean.ok && clean.value.checksumValid).toBe(true);
  });

  it("resizes the buffer when the format changes", () => {
    const { session } = createHarness();
    session.state.setTrack(50);
    session.setGeometry(MINIDISK);
    expect(session.trackBuffer).toHaveLength(2192);
    expect(session.state.track).toBe(34);
  });

  it("reports the closed port", async () => {
    const { server, session } = createHarness();
    server.close();
    expect(await session.stat()).toEqual({ ok: false, error: { kind: "TransportNotOpen" } });
  });
});
