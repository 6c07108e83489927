import { z } from "zod";
import { ConfigurationError } from "./errors";

export const TROVO_CHAT_URL = "wss://open-chat.trovo.live/chat";

/**
 * Chat session settings. Heartbeat interval and staleness window are exposed
 * here rather than fixed so callers on slow links can widen them.
 */
const ChatSessionConfigSchema = z
  .object({
    url: z
      .string()
      .url()
      .refine((value) => /^wss?:\/\//i.test(value), "Chat URL must use the ws: or wss: scheme")
      .default(TROVO_CHAT_URL),
    heartbeatIntervalMs: z.number().int().positive().default(30_000),
    // Three missed heartbeats.
    stalenessWindowMs: z.number().int().positive().default(90_000),
    responseTimeoutMs: z.number().int().positive().default(10_000),
    reconnectBaseDelayMs: z.number().int().nonnegative().default(1_000),
    reconnectMaxDelayMs: z.number().int().nonnegative().default(30_000),
    connectTimeoutMs: z.number().int().positive().default(10_000),
    closeTimeoutMs: z.number().int().positive().default(5_000),
    bufferSize: z.number().int().positive().default(32),
    adoptServerPingGap: z.boolean().default(false)
  })
  .refine((config) => config.reconnectMaxDelayMs >= config.reconnectBaseDelayMs, {
    message: "reconnectMaxDelayMs must not be lower than reconnectBaseDelayMs",
    path: ["reconnectMaxDelayMs"]
  });

export type ChatSessionConfig = z.infer<typeof ChatSessionConfigSchema>;
export type ChatSessionSettings = z.input<typeof ChatSessionConfigSchema>;

export const resolveChatSessionConfig = (settings: ChatSessionSettings = {}): ChatSessionConfig => {
  const parsed = ChatSessionConfigSchema.safeParse(settings);
  if (!parsed.success) {
    const summary = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new ConfigurationError(`Invalid chat session settings: ${summary}`, parsed.error.issues);
  }
  return parsed.data;
};
