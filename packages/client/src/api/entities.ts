import { z } from "zod";

/** Platform error codes the client branches on. */
export const ErrorStatus = {
  InternalFetch: -1201,
  InternalTimeout: -1000,
  InvalidParameters: 1002,
  InternalUnknown: 1111,
  AuthorizationFailed: 10703,
  AccountBlocked: 11400,
  InvalidHeader: 11701,
  InvalidScope: 11703,
  InvalidAccessToken: 11704,
  RateLimitExceeded: 11706,
  RefreshTokenExpired: 11712,
  InvalidRefreshToken: 11713,
  AccessTokenExpired: 11714,
  InvalidGrantType: 11715,
  InvalidClientSecret: 11717,
  UnauthorizedScope: 11730,
  Unknown: 20000
} as const;

export const CREDENTIAL_REJECTION_STATUSES: ReadonlySet<number> = new Set([
  ErrorStatus.AuthorizationFailed,
  ErrorStatus.AccountBlocked,
  ErrorStatus.InvalidScope,
  ErrorStatus.InvalidAccessToken,
  ErrorStatus.RefreshTokenExpired,
  ErrorStatus.InvalidRefreshToken,
  ErrorStatus.AccessTokenExpired,
  ErrorStatus.InvalidGrantType,
  ErrorStatus.InvalidClientSecret,
  ErrorStatus.UnauthorizedScope
]);

export const ApiErrorSchema = z.object({
  status: z.number().int(),
  message: z.string().catch("Unknown or uncategorized error")
});

export const UserSchema = z
  .object({
    user_id: z.string(),
    channel_id: z.string(),
    username: z.string(),
    nickname: z.string()
  })
  .transform((user) => ({
    userId: user.user_id,
    channelId: user.channel_id,
    username: user.username,
    nickname: user.nickname
  }));

export type User = z.output<typeof UserSchema>;

export const GetUsersResponseSchema = z.object({
  users: z.array(UserSchema).catch([])
});

const epochSeconds = z
  .union([z.number(), z.string()])
  .nullish()
  .transform((value) => {
    const seconds = Number(value ?? 0);
    return Number.isFinite(seconds) && seconds > 0 ? new Date(seconds * 1000).toISOString() : null;
  });

const count = z.coerce.number().catch(0);

export const ChannelInfoSchema = z
  .object({
    is_live: z.boolean().catch(false),
    category_id: z.string().catch(""),
    category_name: z.string().catch(""),
    live_title: z.string().catch(""),
    audi_type: z.string().catch(""),
    language_code: z.string().catch(""),
    thumbnail: z.string().catch(""),
    current_viewers: count,
    followers: count,
    streamer_info: z.string().catch(""),
    profile_pic: z.string().catch(""),
    channel_url: z.string().catch(""),
    created_at: epochSeconds,
    subscriber_num: count,
    username: z.string().catch(""),
    social_links: z.array(z.object({ type: z.string(), url: z.string() })).catch([]),
    started_at: epochSeconds,
    ended_at: epochSeconds
  })
  .transform((channel) => ({
    isLive: channel.is_live,
    categoryId: channel.category_id,
    categoryName: channel.category_name,
    liveTitle: channel.live_title,
    audienceType: channel.audi_type,
    languageCode: channel.language_code,
    thumbnail: channel.thumbnail,
    currentViewers: channel.current_viewers,
    followers: channel.followers,
    streamerInfo: channel.streamer_info,
    profilePic: channel.profile_pic,
    channelUrl: channel.channel_url,
    createdAt: channel.created_at,
    subscriberCount: channel.subscriber_num,
    username: channel.username,
    socialLinks: channel.social_links,
    startedAt: channel.started_at,
    endedAt: channel.ended_at
  }));

export type ChannelInfo = z.output<typeof ChannelInfoSchema>;

export const ChatTokenSchema = z.object({
  token: z.string().min(1)
});

export const TokenGrantSchema = z
  .object({
    access_token: z.string().min(1),
    refresh_token: z.string().catch(""),
    expires_in: z.coerce.number().int().positive(),
    token_type: z.string().nullish().catch(null)
  })
  .transform((grant) => ({
    accessToken: grant.access_token,
    refreshToken: grant.refresh_token,
    expiresIn: grant.expires_in,
    tokenType: grant.token_type ?? null
  }));
