import { z } from "zod";
import { participantRoleSchema } from "../protocol/messages.js";
import type { ParticipantRole } from "../protocol/messages.js";

/**
 * Claims the hosting site signs into the identity token.
 * `sub` may be numeric on the issuing side, it is always a string here.
 */
export const tokenClaimsSchema = z.object({
  sub: z.union([z.string().min(1), z.number().int()]).transform(String),
  name: z.string().min(1).max(100),
  role: participantRoleSchema.default("participant"),
  exp: z.number().optional(),
  iat: z.number().optional(),
});

export type TokenClaims = z.infer<typeof tokenClaimsSchema>;

/**
 * Authenticated identity attached to every relay socket
 */
export interface ClassroomUser {
  id: string;
  displayName: string;
  role: ParticipantRole;
}
