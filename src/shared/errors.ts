/**
 * Shared error message constants for consistent error responses
 */
export const Errors = {
  // General
  INVALID_JSON: "Invalid JSON format",
  UNKNOWN_MESSAGE: "Unknown message type",
  INVALID_PAYLOAD: "Invalid payload",
  INTERNAL_ERROR: "Internal server error",
  RATE_LIMITED: "Too many requests",

  // Room
  ROOM_REQUIRED: "Room id is required",
  ROOM_FULL: "Classroom is full",
  NOT_JOINED: "Join the classroom first",

  // Seat
  SEAT_TAKEN: "This seat is already taken by another student.",
  SEAT_INVALID: "Invalid seat",
  NOT_SEATED: "You are not seated in this seat",

  // Signaling
  INVALID_TARGET: "Cannot signal yourself",

  // Activity
  HOST_ONLY: "Only the host can run update rounds",

  // Auth
  ORIGIN_NOT_ALLOWED: "Origin not allowed",
  AUTH_REQUIRED: "Authentication required",
  INVALID_CREDENTIALS: "Invalid credentials",
  AUTH_FAILED: "Authentication failed",
} as const;

export type ErrorCode = (typeof Errors)[keyof typeof Errors];
