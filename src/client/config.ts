/**
 * Classroom client options, validated once when a session is created
 */
import { z } from "zod";
import { participantRoleSchema } from "../protocol/messages.js";
import { DEFAULT_SEAT_LAYOUT, seatLayoutSchema } from "../protocol/seats.js";

export const DEFAULT_ICE_SERVERS = [
  { urls: "stun:stun.l.google.com:19302" },
  { urls: "stun:stun1.l.google.com:19302" },
  { urls: "stun:stun2.l.google.com:19302" },
];

export const clientLogLevelSchema = z.enum([
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
]);

const iceServerSchema = z.object({
  urls: z.union([z.string(), z.array(z.string()).nonempty()]),
  username: z.string().optional(),
  credential: z.string().optional(),
});

export const clientOptionsSchema = z.object({
  relayUrl: z.string().url(),
  relayPath: z.string().startsWith("/").default("/socket.io"),
  roomId: z.string().min(1),
  /** Identity token minted by the hosting page */
  token: z.string().min(1),
  identity: z.object({
    id: z.string().min(1),
    displayName: z.string().min(1),
    role: participantRoleSchema.default("participant"),
  }),
  layout: seatLayoutSchema.default({ ...DEFAULT_SEAT_LAYOUT }),
  reconnect: z
    .object({
      maxAttempts: z.number().int().nonnegative().default(5),
      delayMs: z.number().int().nonnegative().default(3000),
    })
    .default({}),
  iceServers: z.array(iceServerSchema).default(DEFAULT_ICE_SERVERS),
  /** Defaults to muted for participants, unmuted for the host */
  startMuted: z.boolean().optional(),
  logLevel: clientLogLevelSchema.default("info"),
});

export type ClassroomClientOptions = z.input<typeof clientOptionsSchema>;
export type ResolvedClientOptions = z.output<typeof clientOptionsSchema>;
export type ClientIdentity = ResolvedClientOptions["identity"];
export type IceServerConfig = z.output<typeof iceServerSchema>;
export type ClientLogLevel = z.output<typeof clientLogLevelSchema>;

export function resolveClientOptions(options: ClassroomClientOptions): ResolvedClientOptions {
  return clientOptionsSchema.parse(options);
}
