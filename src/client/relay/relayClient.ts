/**
 * Signaling relay client
 *
 * Owns one connection to the room's relay at a time. A connection that
 * closes, including one that never opened, schedules a single reconnect
 * after a fixed delay; after `maxReconnectAttempts` consecutive failures the
 * client stops in `unavailable`. There is no jitter and no backoff growth.
 */
import type { ClientMessage, ServerMessageMap, ServerMessageType } from "../../protocol/messages.js";
import { decodeServerMessage, encodeMessage } from "../../protocol/codec.js";
import type { ClientLogger } from "../logger.js";
import type { RelayConnection, RelayConnector } from "./transport.js";

export type RelayStatus =
  | "idle"
  | "connecting"
  | "open"
  | "reconnecting"
  | "unavailable"
  | "closed";

export type ServerMessageHandlers = {
  [K in ServerMessageType]?: (message: ServerMessageMap[K]) => void | Promise<void>;
};

export type RelayStatusListener = (status: RelayStatus) => void;

export interface RelayClientOptions {
  roomId: string;
  maxReconnectAttempts?: number;
  reconnectDelayMs?: number;
  logger: ClientLogger;
}

export class RelayClient {
  readonly roomId: string;
  private readonly maxReconnectAttempts: number;
  private readonly reconnectDelayMs: number;
  private readonly logger: ClientLogger;

  private status: RelayStatus = "idle";
  private connection: RelayConnection | null = null;
  // Bumped whenever a connection is abandoned; events from older ones are ignored
  private generation = 0;
  private attempts = 0;
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;

  private readonly subscribers = new Set<ServerMessageHandlers>();
  private readonly statusListeners = new Set<RelayStatusListener>();

  constructor(
    private readonly connector: RelayConnector,
    options: RelayClientOptions,
  ) {
    this.roomId = options.roomId;
    this.maxReconnectAttempts = options.maxReconnectAttempts ?? 5;
    this.reconnectDelayMs = options.reconnectDelayMs ?? 3000;
    this.logger = options.logger.child({ component: "relay", roomId: options.roomId });
  }

  get state(): RelayStatus {
    return this.status;
  }

  /** Reconnect attempts made since the last successful open */
  get reconnectAttempts(): number {
    return this.attempts;
  }

  connect(): void {
    if (this.status !== "idle") {
      this.logger.debug({ status: this.status }, "connect() ignored");
      return;
    }
    this.openConnection("connecting");
  }

  /**
   * Start over after the client gave up. Only valid in `unavailable`.
   */
  retry(): boolean {
    if (this.status !== "unavailable") return false;
    this.attempts = 0;
    this.logger.info("Retrying relay connection");
    this.openConnection("connecting");
    return true;
  }

  /**
   * Write one envelope. Delivery is at most once: nothing is queued while
   * the connection is down.
   */
  send(message: ClientMessage): boolean {
    if (this.status !== "open" || !this.connection) {
      this.logger.debug({ type: message.type, status: this.status }, "Dropped message, relay not open");
      return false;
    }

    try {
      this.connection.send(encodeMessage(message));
      return true;
    } catch (err) {
      this.logger.warn({ err, type: message.type }, "Failed to write message");
      return false;
    }
  }

  subscribe(handlers: ServerMessageHandlers): () => void {
    this.subscribers.add(handlers);
    return () => {
      this.subscribers.delete(handlers);
    };
  }

  onStatus(listener: RelayStatusListener): () => void {
    this.statusListeners.add(listener);
    return () => {
      this.statusListeners.delete(listener);
    };
  }

  close(): void {
    if (this.status === "closed") return;

    this.clearReconnectTimer();
    this.generation++;

    const connection = this.connection;
    this.connection = null;
    if (connection) {
      try {
        connection.close();
      } catch (err) {
        this.logger.warn({ err }, "Error closing relay connection");
      }
    }

    this.setStatus("closed");
    this.subscribers.clear();
    this.statusListeners.clear();
  }

  // ─── Connection lifecycle ─────────────────────────────────────

  private openConnection(status: "connecting" | "reconnecting"): void {
    const generation = ++this.generation;
    this.setStatus(status);

    let connection: RelayConnection;
    try {
      connection = this.connector({
        onOpen: () => {
          if (generation !== this.generation) return;
          this.attempts = 0;
          this.logger.info("Relay connected");
          this.setStatus("open");
        },
        onMessage: (frame) => {
          if (generation !== this.generation) return;
          this.dispatch(frame);
        },
        onClose: (reason) => {
          if (generation !== this.generation) return;
          this.generation++;
          this.connection = null;
          this.handleClose(reason);
        },
      });
    } catch (err) {
      this.logger.warn({ err }, "Relay connector threw");
      if (generation !== this.generation) return;
      this.generation++;
      this.handleClose("connector_error");
      return;
    }

    // The connector may have reported a close synchronously
    if (generation === this.generation) {
      this.connection = connection;
    }
  }

  private handleClose(reason: string): void {
    if (this.attempts >= this.maxReconnectAttempts) {
      this.logger.warn(
        { reason, attempts: this.attempts },
        "Relay unavailable, giving up",
      );
      this.setStatus("unavailable");
      return;
    }

    this.logger.info(
      { reason, attempt: this.attempts + 1, delayMs: this.reconnectDelayMs },
      "Relay closed, scheduling reconnect",
    );
    this.setStatus("reconnecting");

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.attempts++;
      this.openConnection("reconnecting");
    }, this.reconnectDelayMs);
  }

  private clearReconnectTimer(): void {
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
  }

  private setStatus(status: RelayStatus): void {
    if (this.status === status) return;
    this.status = status;

    for (const listener of [...this.statusListeners]) {
      try {
        listener(status);
      } catch (err) {
        this.logger.error({ err, status }, "Status listener failed");
      }
    }
  }

  // ─── Dispatch ─────────────────────────────────────────────────

  private dispatch(frame: unknown): void {
    const decoded = decodeServerMessage(frame);
    if (!decoded.ok) {
      this.logger.warn(
        { reason: decoded.reason, type: decoded.type, detail: decoded.detail },
        "Ignoring relay frame",
      );
      return;
    }

    const { message } = decoded;
    for (const handlers of [...this.subscribers]) {
      this.deliver(handlers, message.type, message);
    }
  }

  private deliver<K extends ServerMessageType>(
    handlers: ServerMessageHandlers,
    type: K,
    message: ServerMessageMap[K],
  ): void {
    const handler = handlers[type];
    if (!handler) return;

    const fail = (err: unknown) => {
      this.logger.error({ err, type }, "Relay handler failed");
    };

    try {
      Promise.resolve(handler(message)).catch(fail);
    } catch (err) {
      fail(err);
    }
  }
}
