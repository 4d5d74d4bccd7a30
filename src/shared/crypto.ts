/**
 * Shared cryptographic utilities
 */
import { randomBytes, createHash } from "node:crypto";

/**
 * Generate a unique correlation/request ID for tracing a message through logs
 */
export function generateCorrelationId(): string {
  return randomBytes(8).toString("hex");
}

/**
 * SHA-256 of a token, used for revocation keys so raw tokens never hit Redis
 */
export const hashToken = (token: string): string =>
  createHash("sha256").update(token).digest("hex");
