import { z } from "zod";
import { DecodeError } from "../errors";
import type { ChatEmote, ChatMessage } from "../types";

export type DecodedChat = { ok: true; message: ChatMessage } | { ok: false; error: DecodeError };

// Optional platform fields degrade to null when absent or of the wrong type.
const optionalString = z.string().nullish().catch(null);

// Ids beyond 2^53 cannot be represented exactly and degrade to null.
const optionalInteger = z
  .union([
    z.number().int().safe(),
    z
      .string()
      .regex(/^-?\d+$/)
      .transform(Number)
      .pipe(z.number().int().safe())
  ])
  .nullish()
  .catch(null);

const stringList = z
  .array(z.unknown())
  .nullish()
  .catch(null)
  .transform((items) => (items ?? []).filter((item): item is string => typeof item === "string"));

const RawEmoteSchema = z.object({
  id: z.union([z.string(), z.number().transform(String)]).nullish().catch(null),
  name: z.string().min(1),
  url: optionalString,
  gif: optionalString,
  webp: optionalString
});

const toEmote = (emote: z.infer<typeof RawEmoteSchema>): ChatEmote => ({
  id: emote.id ?? null,
  name: emote.name,
  url: emote.url || null,
  gifUrl: emote.gif || null,
  webpUrl: emote.webp || null
});

const emoteList = z
  .array(z.unknown())
  .nullish()
  .catch(null)
  .transform((items) => {
    if (!items) return null;
    return items.flatMap((item) => {
      const parsed = RawEmoteSchema.safeParse(item);
      return parsed.success ? [toEmote(parsed.data)] : [];
    });
  });

const RawChatMessageSchema = z.object({
  type: z.number().int(),
  content: z.string(),
  nick_name: z.string(),
  message_id: z.union([z.string().min(1), z.number().transform(String)]),
  sender_id: optionalInteger,
  user_name: optionalString,
  send_time: optionalInteger,
  avatar: optionalString,
  sub_lv: optionalString,
  sub_tier: optionalString,
  medals: stringList,
  decos: stringList,
  roles: stringList,
  emotes: emoteList,
  content_data: z.record(z.unknown()).nullish().catch(null),
  custom_role: optionalString
});

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export const describeIssues = (error: z.ZodError) =>
  error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");

const toIsoTime = (seconds: number | null | undefined): string | null => {
  if (seconds === null || seconds === undefined) return null;
  const date = new Date(seconds * 1000);
  return Number.isNaN(date.getTime()) ? null : date.toISOString();
};

/**
 * Decode one entry of a CHAT batch. Failure is scoped to this entry only.
 */
export const normalizeChatMessage = (raw: unknown, channelId: string | null): DecodedChat => {
  const parsed = RawChatMessageSchema.safeParse(raw);
  if (!parsed.success) {
    return {
      ok: false,
      error: new DecodeError(`Malformed chat message: ${describeIssues(parsed.error)}`, raw, {
        issues: parsed.error.issues
      })
    };
  }

  const data = parsed.data;
  return {
    ok: true,
    message: {
      id: data.message_id,
      type: data.type,
      channelId,
      senderId: data.sender_id ?? null,
      username: data.user_name || null,
      nickname: data.nick_name,
      content: data.content,
      sentAt: toIsoTime(data.send_time),
      avatarUrl: data.avatar || null,
      subscriptionLevel: data.sub_lv || null,
      subscriptionTier: data.sub_tier || null,
      medals: data.medals,
      decorations: data.decos,
      roles: data.roles,
      emotes: data.emotes,
      contentData: data.content_data ?? {},
      customRole: data.custom_role || null,
      raw: isRecord(raw) ? raw : {}
    }
  };
};
