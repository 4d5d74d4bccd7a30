import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { createClassroomSession, type ClassroomSession } from "@src/client/session.js";
import { FakeRelayServer, createFakeView, silentLogger } from "../helpers/clientFakes.js";
import { FakeMediaPlatform, FakeSinks, FakeStream, mediaError } from "../helpers/mediaFakes.js";

const OPTIONS = {
  relayUrl: "https://relay.example.test",
  roomId: "room1",
  token: "test-token",
  identity: { id: "u1", displayName: "Ada" },
};

describe("createClassroomSession", () => {
  let server: FakeRelayServer;
  let platform: FakeMediaPlatform;
  let view: ReturnType<typeof createFakeView>;
  let session: ClassroomSession<FakeStream>;

  beforeEach(() => {
    server = new FakeRelayServer();
    platform = new FakeMediaPlatform();
    view = createFakeView();
    session = createClassroomSession(OPTIONS, {
      view,
      media: { platform, sinks: new FakeSinks() },
      connector: server.connector,
      logger: silentLogger,
    });
  });

  afterEach(() => {
    session.leave();
  });

  it("fills in the option defaults", () => {
    expect(session.options.identity.role).toBe("participant");
    expect(session.options.reconnect).toEqual({ maxAttempts: 5, delayMs: 3000 });
    expect(session.options.layout).toEqual({ rows: 5, columns: 6 });
  });

  it("starts voice, then connects and joins", async () => {
    const voice = await session.start();
    server.current.open();

    expect(voice).toEqual({ ok: true, muted: true });
    expect(view.setVoiceStatus.mock.calls).toEqual([
      [{ kind: "initializing" }],
      [{ kind: "active", muted: true }],
    ]);
    expect(server.current.sentMessages()).toEqual([{ type: "join" }]);
  });

  it("still joins the classroom without a microphone", async () => {
    platform.captureError = mediaError("NotFoundError");

    const voice = await session.start();

    expect(voice).toEqual({ ok: false, reason: "device_not_found" });
    expect(view.setVoiceStatus).toHaveBeenLastCalledWith({
      kind: "disabled",
      reason: "device_not_found",
    });
    expect(view.notify).toHaveBeenCalledWith(
      "Voice chat is unavailable; you can still take a seat.",
      "warning",
    );
    expect(server.attempts).toBe(1);
  });

  it("starts once", async () => {
    await session.start();
    const again = await session.start();

    expect(again).toEqual({ ok: true, muted: true });
    expect(platform.getUserMedia).toHaveBeenCalledTimes(1);
    expect(server.attempts).toBe(1);
  });

  it("shows the mute state it toggles to", async () => {
    await session.start();

    expect(session.toggleMute()).toBe(false);
    expect(view.setVoiceStatus).toHaveBeenLastCalledWith({ kind: "active", muted: false });
  });

  it("releases the relay and the microphone on leave", async () => {
    await session.start();
    server.current.open();
    const connection = server.current;

    session.leave();
    session.leave();

    expect(session.relay.state).toBe("closed");
    expect(connection.closed).toBe(true);
    expect(session.media.isClosed).toBe(true);
    expect(platform.stream.tracks[0]?.stopped).toBe(true);
  });

  it("does not connect when left during the microphone prompt", async () => {
    let grant: (stream: FakeStream) => void = () => undefined;
    platform.getUserMedia.mockImplementationOnce(
      () => new Promise<FakeStream>((resolve) => (grant = resolve)),
    );

    const starting = session.start();
    session.leave();
    grant(platform.stream);

    await expect(starting).resolves.toEqual({ ok: false, reason: "unavailable" });
    expect(server.attempts).toBe(0);
  });
});
