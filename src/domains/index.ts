/**
 * Domain Registry - one handler per client message type
 *
 * The table is exhaustive over the client vocabulary: adding a message type
 * to the protocol without a handler fails to compile.
 */
import type { ClientMessageType } from "../protocol/messages.js";
import type { MessageHandler } from "../shared/handler.utils.js";
import { joinHandler } from "./room/index.js";
import { updateSeatHandler, leaveSeatHandler } from "./seat/index.js";
import { offerHandler, answerHandler, iceCandidateHandler } from "./signaling/signaling.handler.js";
import { handRaiseHandler, pingHandler } from "./presence/presence.handler.js";
import { sharedContentHandler, updateRoundHandler } from "./activity/activity.handler.js";

export type MessageHandlerTable = {
  [K in ClientMessageType]: MessageHandler<K>;
};

export const messageHandlers: MessageHandlerTable = {
  join: joinHandler,
  update_seat: updateSeatHandler,
  leave_seat: leaveSeatHandler,
  offer: offerHandler,
  answer: answerHandler,
  "ice-candidate": iceCandidateHandler,
  hand_raise: handRaiseHandler,
  shared_content: sharedContentHandler,
  update_round: updateRoundHandler,
  ping: pingHandler,
};

/** Types accepted before the socket has joined */
export const PRE_JOIN_TYPES: ReadonlySet<ClientMessageType> = new Set(["join", "ping"]);
