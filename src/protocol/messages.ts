/**
 * Relay message envelope
 *
 * Every frame is one JSON object discriminated by `type`. Client and server
 * vocabularies are separate unions: `offer`, `answer` and `ice-candidate`
 * exist in both but carry `target_id` outbound and `sender_id` inbound.
 */
import { z } from "zod";
import { seatIdSchema } from "./seats.js";

// ─────────────────────────────────────────────────────────────────
// Shared payloads
// ─────────────────────────────────────────────────────────────────

export const participantRoleSchema = z.enum(["host", "participant"]);

const userIdSchema = z.string().min(1).max(64);

export const participantSchema = z.object({
  id: userIdSchema,
  display_name: z.string().min(1).max(100),
  role: participantRoleSchema,
  seat_id: seatIdSchema.nullable(),
});

/** Session description as produced by the browser's offer/answer API */
export const sessionDescriptionSchema = z.object({
  type: z.enum(["offer", "answer", "pranswer", "rollback"]),
  sdp: z.string().max(100_000).optional(),
});

export const iceCandidateSchema = z.object({
  candidate: z.string().max(2_000),
  sdpMid: z.string().nullable().optional(),
  sdpMLineIndex: z.number().int().nonnegative().nullable().optional(),
  usernameFragment: z.string().nullable().optional(),
});

/** What a participant can put up from their seat's laptop */
export const sharedContentTypeSchema = z.enum(["screenshot", "file", "link"]);

const contentUrlSchema = z
  .string()
  .max(2_048)
  .url()
  .refine((value) => /^https?:\/\//i.test(value), "Only http and https links can be shared");

/** Host-run update round: each seated participant gets a timed turn */
export const roundStatusSchema = z.enum(["waiting", "active", "ended"]);

const roundFields = {
  status: roundStatusSchema,
  current_user_id: userIdSchema.nullable(),
  time_remaining: z.number().int().nonnegative().max(86_400),
  completed_user_ids: z.array(userIdSchema).max(200),
};

// ─────────────────────────────────────────────────────────────────
// Client → server
// ─────────────────────────────────────────────────────────────────

export const clientMessageSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("join") }),
  z.object({ type: z.literal("update_seat"), seat_id: seatIdSchema }),
  z.object({ type: z.literal("leave_seat"), seat_id: seatIdSchema }),
  z.object({
    type: z.literal("offer"),
    target_id: userIdSchema,
    description: sessionDescriptionSchema,
  }),
  z.object({
    type: z.literal("answer"),
    target_id: userIdSchema,
    description: sessionDescriptionSchema,
  }),
  z.object({
    type: z.literal("ice-candidate"),
    target_id: userIdSchema,
    candidate: iceCandidateSchema,
  }),
  z.object({ type: z.literal("hand_raise"), raised: z.boolean() }),
  z.object({
    type: z.literal("shared_content"),
    content_type: sharedContentTypeSchema,
    content_url: contentUrlSchema,
    description: z.string().max(500).optional(),
  }),
  z.object({ type: z.literal("update_round"), ...roundFields }),
  z.object({ type: z.literal("ping") }),
]);

// ─────────────────────────────────────────────────────────────────
// Server → client
// ─────────────────────────────────────────────────────────────────

export const serverMessageSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("connection_established"), room_id: z.string() }),
  z.object({
    type: z.literal("participants_list"),
    participants: z.array(participantSchema),
  }),
  z.object({ type: z.literal("participant_joined"), participant: participantSchema }),
  z.object({ type: z.literal("participant_left"), user_id: userIdSchema }),
  z.object({
    type: z.literal("seat_updated"),
    seat_id: seatIdSchema,
    user: participantSchema,
  }),
  z.object({
    type: z.literal("seat_left"),
    seat_id: seatIdSchema,
    user_id: userIdSchema,
  }),
  z.object({
    type: z.literal("seat_occupied"),
    seat_id: seatIdSchema,
    occupant_id: userIdSchema.nullable().optional(),
    message: z.string().optional(),
  }),
  z.object({
    type: z.literal("offer"),
    sender_id: userIdSchema,
    description: sessionDescriptionSchema,
  }),
  z.object({
    type: z.literal("answer"),
    sender_id: userIdSchema,
    description: sessionDescriptionSchema,
  }),
  z.object({
    type: z.literal("ice-candidate"),
    sender_id: userIdSchema,
    candidate: iceCandidateSchema,
  }),
  z.object({
    type: z.literal("hand_raised"),
    user_id: userIdSchema,
    raised: z.boolean(),
  }),
  z.object({
    type: z.literal("content_shared"),
    user_id: userIdSchema,
    display_name: z.string(),
    content_type: sharedContentTypeSchema,
    content_url: contentUrlSchema,
    description: z.string(),
  }),
  z.object({ type: z.literal("round_updated"), ...roundFields }),
  z.object({ type: z.literal("pong") }),
  z.object({ type: z.literal("error"), message: z.string() }),
]);

export type ParticipantRole = z.infer<typeof participantRoleSchema>;
export type Participant = z.infer<typeof participantSchema>;
export type SessionDescriptionPayload = z.infer<typeof sessionDescriptionSchema>;
export type IceCandidatePayload = z.infer<typeof iceCandidateSchema>;
export type SharedContentType = z.infer<typeof sharedContentTypeSchema>;
export type RoundStatus = z.infer<typeof roundStatusSchema>;

export type ClientMessage = z.infer<typeof clientMessageSchema>;
export type ClientMessageType = ClientMessage["type"];
export type ClientMessageMap = {
  [K in ClientMessageType]: Extract<ClientMessage, { type: K }>;
};

export type ServerMessage = z.infer<typeof serverMessageSchema>;
export type ServerMessageType = ServerMessage["type"];
export type ServerMessageMap = {
  [K in ServerMessageType]: Extract<ServerMessage, { type: K }>;
};
