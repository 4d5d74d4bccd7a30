/**
 * Barrel exports for the wire protocol shared by relay and client
 */
export * from "./messages.js";
export * from "./codec.js";
export * from "./seats.js";
export * from "./events.js";
