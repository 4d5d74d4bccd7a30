/**
 * Transport port of the relay client. One call to a connector is one
 * connection attempt; it reports back through the events it was given.
 */
export interface RelayConnectionEvents {
  onOpen(): void;
  onMessage(frame: unknown): void;
  /** Fired once, whether or not the connection ever opened */
  onClose(reason: string): void;
}

export interface RelayConnection {
  send(frame: string): void;
  close(): void;
}

export type RelayConnector = (events: RelayConnectionEvents) => RelayConnection;
