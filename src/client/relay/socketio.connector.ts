import { io, type Socket } from "socket.io-client";
import type { ClientToServerEvents, ServerToClientEvents } from "../../protocol/events.js";
import type { RelayConnector } from "./transport.js";

export interface SocketIoConnectorOptions {
  url: string;
  path?: string;
  roomId: string;
  token: string;
  timeoutMs?: number;
}

/**
 * socket.io transport with its own reconnection switched off: the relay
 * client's fixed-delay policy is the only one in play.
 */
export function createSocketIoConnector(options: SocketIoConnectorOptions): RelayConnector {
  return (events) => {
    const socket: Socket<ServerToClientEvents, ClientToServerEvents> = io(options.url, {
      path: options.path ?? "/socket.io",
      reconnection: false,
      timeout: options.timeoutMs ?? 10_000,
      transports: ["websocket"],
      query: { roomId: options.roomId },
      auth: { token: options.token },
    });

    let finished = false;
    const finish = (reason: string) => {
      if (finished) return;
      finished = true;
      socket.off();
      socket.disconnect();
      events.onClose(reason);
    };

    socket.on("connect", () => events.onOpen());
    socket.on("message", (frame) => events.onMessage(frame));
    socket.on("connect_error", (err) => finish(err.message));
    socket.on("disconnect", (reason) => finish(reason));

    return {
      send: (frame) => {
        socket.emit("message", frame);
      },
      close: () => {
        finished = true;
        socket.off();
        socket.disconnect();
      },
    };
  };
}
