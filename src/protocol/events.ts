/**
 * socket.io event maps shared by relay and client. Envelopes travel as JSON
 * text on a single `message` event in both directions.
 */
export interface ClientToServerEvents {
  message: (frame: string) => void;
}

export interface ServerToClientEvents {
  message: (frame: string) => void;
}
