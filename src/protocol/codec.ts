/**
 * Text codec for relay envelopes
 */
import { z } from "zod";
import {
  clientMessageSchema,
  serverMessageSchema,
  type ClientMessage,
  type ServerMessage,
} from "./messages.js";

export type DecodeFailure =
  | "malformed_json"
  | "not_an_envelope"
  | "unknown_type"
  | "invalid_payload";

export type DecodeResult<T> =
  | { ok: true; message: T }
  | { ok: false; reason: DecodeFailure; type?: string; detail?: string };

const envelopeSchema = z.object({ type: z.string() }).passthrough();

export function encodeMessage(message: ClientMessage | ServerMessage): string {
  return JSON.stringify(message);
}

function decodeWith<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  knownTypes: ReadonlySet<string>,
  raw: unknown,
): DecodeResult<T> {
  if (typeof raw !== "string") {
    return { ok: false, reason: "malformed_json", detail: "Frame is not text" };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    return {
      ok: false,
      reason: "malformed_json",
      detail: err instanceof Error ? err.message : String(err),
    };
  }

  const envelope = envelopeSchema.safeParse(parsed);
  if (!envelope.success) {
    return { ok: false, reason: "not_an_envelope" };
  }

  const { type } = envelope.data;
  if (!knownTypes.has(type)) {
    return { ok: false, reason: "unknown_type", type };
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    return {
      ok: false,
      reason: "invalid_payload",
      type,
      detail: result.error.issues
        .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
        .join("; "),
    };
  }

  return { ok: true, message: result.data };
}

const CLIENT_TYPES: ReadonlySet<string> = new Set(
  clientMessageSchema.options.map((option) => option.shape.type.value),
);

const SERVER_TYPES: ReadonlySet<string> = new Set(
  serverMessageSchema.options.map((option) => option.shape.type.value),
);

export function decodeClientMessage(raw: unknown): DecodeResult<ClientMessage> {
  return decodeWith(clientMessageSchema, CLIENT_TYPES, raw);
}

export function decodeServerMessage(raw: unknown): DecodeResult<ServerMessage> {
  return decodeWith(serverMessageSchema, SERVER_TYPES, raw);
}
