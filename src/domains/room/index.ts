/**
 * Room Domain - Barrel Export
 */
export { joinHandler, handleDisconnect, buildSnapshot, profileOf } from "./room.handler.js";
