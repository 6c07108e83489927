import { z } from "zod";
import { DecodeError } from "../errors";
import { describeIssues, isRecord, normalizeChatMessage, type DecodedChat } from "./normalize";

export type OutboundFrame =
  | { type: "AUTH"; nonce: string; data: { token: string } }
  | { type: "JOIN"; nonce: string; data: { channel_id: string } }
  | { type: "PING"; nonce: string };

export type InboundFrame =
  | { kind: "ack"; nonce: string | null }
  | { kind: "error"; nonce: string | null; code: number | null; message: string }
  | { kind: "pong"; nonce: string | null; gap: number | null }
  | { kind: "chat"; channelId: string | null; eid: string | null; items: DecodedChat[] }
  | { kind: "unknown"; type: string; raw: Record<string, unknown> };

export type FrameDecodeResult = { ok: true; frame: InboundFrame } | { ok: false; error: DecodeError };

const encode = (frame: OutboundFrame) => JSON.stringify(frame);

export const encodeAuth = (nonce: string, token: string) => encode({ type: "AUTH", nonce, data: { token } });

export const encodeJoin = (nonce: string, channelId: string) =>
  encode({ type: "JOIN", nonce, data: { channel_id: channelId } });

export const encodePing = (nonce: string) => encode({ type: "PING", nonce });

const nonceField = z
  .union([z.string(), z.number().transform(String)])
  .nullish()
  .catch(null);

const EnvelopeSchema = z
  .object({
    type: z.string().min(1),
    nonce: nonceField
  })
  .passthrough();

const ResponseSchema = z.object({
  error: z.string().nullish().catch(null),
  code: z.number().int().nullish().catch(null),
  message: z.string().nullish().catch(null)
});

const PongSchema = z.object({
  data: z
    .object({ gap: z.number().nonnegative().nullish().catch(null) })
    .nullish()
    .catch(null)
});

const ChatSchema = z.object({
  channel_info: z
    .object({ channel_id: z.union([z.string(), z.number().transform(String)]).nullish().catch(null) })
    .nullish()
    .catch(null),
  data: z.object({
    eid: z.union([z.string(), z.number().transform(String)]).nullish().catch(null),
    chats: z.array(z.unknown()).nullish().catch(null)
  })
});

const parseJson = (raw: string): unknown => {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
};

const failure = (message: string, raw: unknown): FrameDecodeResult => ({
  ok: false,
  error: new DecodeError(message, raw)
});

export const decodeFrame = (raw: string): FrameDecodeResult => {
  const json = parseJson(raw);
  if (json === undefined) return failure("Chat frame is not valid JSON.", raw);

  const envelope = EnvelopeSchema.safeParse(json);
  if (!envelope.success) return failure(`Malformed chat frame: ${describeIssues(envelope.error)}`, json);
  const nonce = envelope.data.nonce ?? null;

  switch (envelope.data.type) {
    case "RESPONSE": {
      const response = ResponseSchema.parse(json);
      if (response.error || (response.code !== null && response.code !== undefined && response.code !== 0)) {
        return {
          ok: true,
          frame: {
            kind: "error",
            nonce,
            code: response.code ?? null,
            message: response.error || response.message || "Unknown chat error"
          }
        };
      }
      return { ok: true, frame: { kind: "ack", nonce } };
    }
    case "PONG": {
      const pong = PongSchema.parse(json);
      return { ok: true, frame: { kind: "pong", nonce, gap: pong.data?.gap ?? null } };
    }
    case "CHAT": {
      const chat = ChatSchema.safeParse(json);
      if (!chat.success) return failure(`Malformed chat batch: ${describeIssues(chat.error)}`, json);
      const channelId = chat.data.channel_info?.channel_id ?? null;
      const chats = chat.data.data.chats ?? [];
      return {
        ok: true,
        frame: {
          kind: "chat",
          channelId,
          eid: chat.data.data.eid ?? null,
          items: chats.map((entry) => normalizeChatMessage(entry, channelId))
        }
      };
    }
    default:
      return {
        ok: true,
        frame: { kind: "unknown", type: envelope.data.type, raw: isRecord(json) ? json : {} }
      };
  }
};
