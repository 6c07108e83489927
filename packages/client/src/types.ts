import type { ChatError } from "./errors";

export type Logger = (message: string) => void;

export const ChatMessageType = {
  Normal: 0,
  Spell: 5,
  MagicSuperCap: 6,
  MagicColorful: 7,
  MagicSpell: 8,
  MagicBulletScreen: 9,
  Subscription: 5001,
  System: 5002,
  Follow: 5003,
  Welcome: 5004,
  GiftSub: 5005,
  GiftSubDetailed: 5006,
  Event: 5007,
  Raid: 5008,
  CustomSpell: 5009
} as const;

export type KnownChatMessageType = (typeof ChatMessageType)[keyof typeof ChatMessageType];

export type ChatEmote = {
  id: string | null;
  name: string;
  url: string | null;
  gifUrl: string | null;
  webpUrl: string | null;
};

export type ChatMessage = {
  id: string;
  /** One of {@link ChatMessageType}; types the platform adds later pass through as plain numbers. */
  type: number;
  channelId: string | null;
  senderId: number | null;
  username: string | null;
  nickname: string;
  content: string;
  sentAt: string | null;
  avatarUrl: string | null;
  subscriptionLevel: string | null;
  subscriptionTier: string | null;
  medals: string[];
  decorations: string[];
  roles: string[];
  emotes: ChatEmote[] | null;
  contentData: Record<string, unknown>;
  customRole: string | null;
  raw: Record<string, unknown>;
};

export type ChatStreamItem = { ok: true; message: ChatMessage } | { ok: false; error: ChatError };

export type ChatSessionStatus =
  | "idle"
  | "connecting"
  | "authenticating"
  | "joining"
  | "active"
  | "reconnecting"
  | "closed";

export type ChatToken = {
  token: string;
};
