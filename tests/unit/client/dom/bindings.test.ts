// @vitest-environment jsdom
import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";
import { bindKeyboard, bindPageVisibility } from "@src/client/dom/bindings.js";
import { ClassroomController } from "@src/client/classroom/classroomController.js";
import { RelayClient } from "@src/client/relay/relayClient.js";
import { FakeRelayServer, createFakeView, silentLogger } from "../../helpers/clientFakes.js";

function press(target: EventTarget, key: string, repeat = false): void {
  target.dispatchEvent(new KeyboardEvent("keydown", { key, repeat, bubbles: true }));
}

describe("bindKeyboard", () => {
  let controller: ClassroomController;
  let interact: MockInstance<() => void>;
  let unbind: () => void;

  beforeEach(() => {
    document.body.innerHTML = '<input id="chat" /><textarea id="notes"></textarea>';
    const relay = new RelayClient(new FakeRelayServer().connector, {
      roomId: "room1",
      logger: silentLogger,
    });
    controller = new ClassroomController({
      relay,
      view: createFakeView(),
      self: { id: "u1", displayName: "Ada", role: "participant" },
      layout: { rows: 5, columns: 6 },
      logger: silentLogger,
    });
    interact = vi.spyOn(controller, "interact");
    unbind = bindKeyboard(document, controller);
  });

  afterEach(() => {
    unbind();
  });

  it("interacts on e and E", () => {
    press(document.body, "e");
    press(document.body, "E");

    expect(interact).toHaveBeenCalledTimes(2);
  });

  it("ignores other keys and held keys", () => {
    press(document.body, "w");
    press(document.body, "e", true);

    expect(interact).not.toHaveBeenCalled();
  });

  it("leaves typing in form fields alone", () => {
    for (const id of ["chat", "notes"]) {
      const field = document.getElementById(id);
      if (!field) throw new Error(`Missing #${id}`);
      press(field, "e");
    }

    expect(interact).not.toHaveBeenCalled();
  });

  it("stops listening once unbound", () => {
    unbind();
    press(document.body, "e");

    expect(interact).not.toHaveBeenCalled();
  });
});

describe("bindPageVisibility", () => {
  let server: FakeRelayServer;
  let relay: RelayClient;
  let visibility: DocumentVisibilityState;

  beforeEach(() => {
    visibility = "hidden";
    Object.defineProperty(document, "visibilityState", {
      configurable: true,
      get: () => visibility,
    });
    server = new FakeRelayServer();
    relay = new RelayClient(server.connector, {
      roomId: "room1",
      maxReconnectAttempts: 0,
      logger: silentLogger,
    });
  });

  afterEach(() => {
    relay.close();
  });

  function showPage(): void {
    visibility = "visible";
    document.dispatchEvent(new Event("visibilitychange"));
  }

  it("retries a relay that gave up when the page is shown", () => {
    const unbind = bindPageVisibility(document, relay);
    relay.connect();
    server.current.drop();
    expect(relay.state).toBe("unavailable");

    showPage();
    unbind();

    expect(relay.state).toBe("connecting");
    expect(server.attempts).toBe(2);
  });

  it("leaves a live connection alone", () => {
    const unbind = bindPageVisibility(document, relay);
    relay.connect();
    server.current.open();

    showPage();
    unbind();

    expect(server.attempts).toBe(1);
  });

  it("does nothing while the page stays hidden or after unbinding", () => {
    const unbind = bindPageVisibility(document, relay);
    relay.connect();
    server.current.drop();

    document.dispatchEvent(new Event("visibilitychange"));
    unbind();
    showPage();

    expect(relay.state).toBe("unavailable");
    expect(server.attempts).toBe(1);
  });
});
