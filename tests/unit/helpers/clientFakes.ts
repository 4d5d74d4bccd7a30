/**
 * In-process relay transport and view for client tests
 */
import { vi } from "vitest";
import { pino } from "pino";
import type { RelayConnectionEvents, RelayConnector } from "@src/client/relay/transport.js";
import type { ClassroomView } from "@src/client/classroom/types.js";
import type { ClientMessage, ServerMessage } from "@src/protocol/messages.js";
import { encodeMessage } from "@src/protocol/codec.js";

export const silentLogger = pino({ level: "silent" });

export class FakeConnection {
  readonly sent: string[] = [];
  closed = false;

  constructor(readonly events: RelayConnectionEvents) {}

  send(frame: string): void {
    this.sent.push(frame);
  }

  close(): void {
    this.closed = true;
  }

  open(): void {
    this.events.onOpen();
  }

  drop(reason = "transport close"): void {
    this.events.onClose(reason);
  }

  push(message: ServerMessage): void {
    this.events.onMessage(encodeMessage(message));
  }

  pushRaw(frame: unknown): void {
    this.events.onMessage(frame);
  }

  sentMessages(): ClientMessage[] {
    return this.sent.map((frame): ClientMessage => JSON.parse(frame));
  }
}

/**
 * Every connection attempt is recorded; tests open or drop them explicitly
 */
export class FakeRelayServer {
  readonly connections: FakeConnection[] = [];

  readonly connector: RelayConnector = (events) => {
    const connection = new FakeConnection(events);
    this.connections.push(connection);
    return connection;
  };

  get attempts(): number {
    return this.connections.length;
  }

  get current(): FakeConnection {
    const connection = this.connections[this.connections.length - 1];
    if (!connection) throw new Error("No connection attempt yet");
    return connection;
  }
}

export function createFakeView() {
  return {
    renderSeat: vi.fn(),
    renderOccupants: vi.fn(),
    renderLocalState: vi.fn(),
    renderHand: vi.fn(),
    renderSpeaking: vi.fn(),
    notify: vi.fn(),
    setConnectionStatus: vi.fn(),
    setNearbyInteractable: vi.fn(),
    openInteractable: vi.fn(),
    setVoiceStatus: vi.fn(),
    showSharedContent: vi.fn(),
    renderRound: vi.fn(),
  } satisfies ClassroomView;
}
