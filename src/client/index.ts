export * from "./config.js";
export * from "./logger.js";
export * from "./session.js";
export * from "./relay/transport.js";
export * from "./relay/relayClient.js";
export * from "./relay/socketio.connector.js";
export * from "./classroom/types.js";
export * from "./classroom/interaction.js";
export * from "./classroom/seatReconciler.js";
export * from "./classroom/classroomController.js";
export * from "./media/types.js";
export * from "./media/voiceActivity.js";
export * from "./media/peerLink.js";
export * from "./media/peerMediaController.js";
export * from "./media/browserPlatform.js";
export * from "./media/audioSinks.js";
export * from "./dom/domView.js";
export * from "./dom/bindings.js";
