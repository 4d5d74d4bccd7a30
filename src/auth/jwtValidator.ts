/**
 * JWT Validator: local HMAC-SHA256 signature verification
 *
 * Flow:
 *   1. Decode JWT (header.payload.signature)
 *   2. Verify HMAC-SHA256 signature with shared secret
 *   3. Check expiry (exp claim, or iat + max age)
 *   4. Parse claims through Zod
 *   5. Check Redis revocation list
 */
import { createHmac, timingSafeEqual } from "node:crypto";
import type { Redis } from "ioredis";
import { config } from "../config/index.js";
import { tokenClaimsSchema } from "./types.js";
import type { ClassroomUser } from "./types.js";
import type { Logger } from "../infrastructure/logger.js";
import { hashToken } from "../shared/crypto.js";

/**
 * Base64URL decode (RFC 7515)
 */
function base64UrlDecode(input: string): Buffer {
  const base64 = input.replace(/-/g, "+").replace(/_/g, "/");
  const padded = base64 + "=".repeat((4 - (base64.length % 4)) % 4);
  return Buffer.from(padded, "base64");
}

export const revocationKey = (token: string): string =>
  `auth:revoked:${hashToken(token)}`;

/**
 * Verify a JWT and extract the classroom identity.
 * Uses HMAC-SHA256 with timing-safe comparison.
 *
 * @returns The validated user or null if verification fails
 */
export async function verifyJwt(
  token: string,
  redis: Redis,
  logger: Logger,
): Promise<ClassroomUser | null> {
  // 1. Split JWT into parts
  const [headerB64, payloadB64, signatureB64, ...rest] = token.split(".");
  if (
    headerB64 === undefined ||
    payloadB64 === undefined ||
    signatureB64 === undefined ||
    rest.length > 0
  ) {
    logger.debug("JWT: Invalid format (expected 3 parts)");
    return null;
  }

  // 2. Reject anything but HS256 before touching the signature
  let header: unknown;
  try {
    header = JSON.parse(base64UrlDecode(headerB64).toString("utf-8"));
  } catch (err) {
    logger.debug({ err }, "JWT: Failed to decode header");
    return null;
  }
  if (
    typeof header !== "object" ||
    header === null ||
    !("alg" in header) ||
    header.alg !== "HS256"
  ) {
    logger.debug("JWT: Unsupported algorithm");
    return null;
  }

  // 3. Verify signature (HMAC-SHA256, timing-safe)
  const expectedSignature = createHmac("sha256", config.JWT_SECRET)
    .update(`${headerB64}.${payloadB64}`)
    .digest();
  const receivedSignature = base64UrlDecode(signatureB64);

  if (
    expectedSignature.length !== receivedSignature.length ||
    !timingSafeEqual(expectedSignature, receivedSignature)
  ) {
    logger.debug("JWT: Signature verification failed");
    return null;
  }

  // 4. Decode and validate claims
  let payload: unknown;
  try {
    payload = JSON.parse(base64UrlDecode(payloadB64).toString("utf-8"));
  } catch (err) {
    logger.debug({ err }, "JWT: Failed to decode payload");
    return null;
  }

  const parseResult = tokenClaimsSchema.safeParse(payload);
  if (!parseResult.success) {
    logger.debug(
      { errors: parseResult.error.format() },
      "JWT: Payload validation failed",
    );
    return null;
  }

  const claims = parseResult.data;

  // 5. Check expiry
  const now = Math.floor(Date.now() / 1000);

  if (claims.exp !== undefined && claims.exp < now) {
    logger.debug("JWT: Token expired");
    return null;
  }

  // Fallback: if no exp claim, check iat + max age
  if (
    claims.exp === undefined &&
    claims.iat !== undefined &&
    claims.iat + config.JWT_MAX_AGE_SECONDS < now
  ) {
    logger.debug("JWT: Token exceeds max age (no exp claim)");
    return null;
  }

  // 6. Check revocation (fail-closed on Redis error)
  try {
    const isRevoked = await redis.exists(revocationKey(token));
    if (isRevoked) {
      logger.warn({ userId: claims.sub }, "JWT: Attempted use of revoked token");
      return null;
    }
  } catch (err) {
    logger.error({ err }, "JWT: Redis error during revocation check");
    return null;
  }

  return { id: claims.sub, displayName: claims.name, role: claims.role };
}
