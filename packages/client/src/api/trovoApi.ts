import type { z } from "zod";
import type { AccessTokenProvider, TokenGrant, TokenRefresher } from "../auth/tokenProviders";
import { ChatSession, type ChatSessionOptions, type ChatTokenSource } from "../chat/chatSession";
import { AuthenticatedRequestError, RequestError, type ApiErrorBody } from "../errors";
import type { ChatToken, Logger } from "../types";
import {
  ApiErrorSchema,
  ChannelInfoSchema,
  ChatTokenSchema,
  CREDENTIAL_REJECTION_STATUSES,
  ErrorStatus,
  GetUsersResponseSchema,
  TokenGrantSchema,
  type ChannelInfo,
  type User
} from "./entities";

const TROVO_API_BASE_URL = "https://open-api.trovo.live/openplatform";
const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;
const MAX_CHAT_MESSAGE_LENGTH = 500;

export type TrovoApiClientOptions = {
  clientId: string;
  fetch?: typeof fetch;
  baseUrl?: string;
  timeoutMs?: number;
  logger?: Logger;
};

type ApiRequest = {
  method?: "GET" | "POST";
  body?: unknown;
  accessToken?: string;
  signal?: AbortSignal;
};

type ApiResponse = {
  ok: boolean;
  status: number;
  payload: unknown;
  apiError: ApiErrorBody | null;
};

const parseJson = (raw: string): unknown => {
  try {
    return JSON.parse(raw);
  } catch {
    return null;
  }
};

// The platform only returns its JSON error body on these statuses.
const canHandleStatus = (status: number) => status === 400 || status === 401 || status === 500;

export class TrovoApiClient implements ChatTokenSource {
  readonly clientId: string;
  private readonly fetchImpl: typeof fetch;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly logger?: Logger;

  constructor(options: TrovoApiClientOptions) {
    this.clientId = options.clientId;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.baseUrl = (options.baseUrl ?? TROVO_API_BASE_URL).replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.logger = options.logger;
  }

  private async send(path: string, request: ApiRequest, source: string): Promise<ApiResponse> {
    const headers: Record<string, string> = {
      Accept: "application/json",
      "Client-ID": this.clientId
    };
    if (request.accessToken) {
      headers.Authorization = `OAuth ${request.accessToken}`;
    }
    if (request.body !== undefined) {
      headers["Content-Type"] = "application/json";
    }

    try {
      const response = await this.fetchImpl(`${this.baseUrl}${path}`, {
        method: request.method ?? "GET",
        headers,
        body: request.body === undefined ? undefined : JSON.stringify(request.body),
        signal: request.signal
          ? AbortSignal.any([request.signal, AbortSignal.timeout(this.timeoutMs)])
          : AbortSignal.timeout(this.timeoutMs)
      });
      const text = await response.text();
      const payload = text ? parseJson(text) : null;
      const apiError = !response.ok && canHandleStatus(response.status) ? ApiErrorSchema.safeParse(payload) : null;
      return {
        ok: response.ok,
        status: response.status,
        payload,
        apiError: apiError?.success ? apiError.data : null
      };
    } catch (error) {
      this.logger?.(`${source} request failed: ${String(error)}`);
      throw new RequestError(`${source} request failed: ${error instanceof Error ? error.message : String(error)}`, {
        cause: error
      });
    }
  }

  private describe(response: ApiResponse, source: string) {
    return response.apiError
      ? `${source} failed (${response.apiError.status}): ${response.apiError.message}`
      : `${source} request failed (${response.status}).`;
  }

  private assertOk(response: ApiResponse, source: string) {
    if (response.ok) return;
    throw new RequestError(this.describe(response, source), {
      httpStatus: response.status,
      apiError: response.apiError ?? undefined
    });
  }

  /**
   * Like {@link assertOk}, but a rejected access token surfaces as
   * {@link AuthenticatedRequestError} so callers can stop retrying.
   */
  private assertAuthenticatedOk(response: ApiResponse, source: string) {
    if (response.ok) return;
    const init = { httpStatus: response.status, apiError: response.apiError ?? undefined };
    const rejected =
      response.status === 401 ||
      (response.apiError !== null && CREDENTIAL_REJECTION_STATUSES.has(response.apiError.status));
    if (rejected) {
      throw new AuthenticatedRequestError(this.describe(response, source), init);
    }
    throw new RequestError(this.describe(response, source), init);
  }

  private read<S extends z.ZodTypeAny>(response: ApiResponse, schema: S, source: string): z.output<S> {
    this.assertOk(response, source);
    return this.parse(response, schema, source);
  }

  private readAuthenticated<S extends z.ZodTypeAny>(response: ApiResponse, schema: S, source: string): z.output<S> {
    this.assertAuthenticatedOk(response, source);
    return this.parse(response, schema, source);
  }

  private parse<S extends z.ZodTypeAny>(response: ApiResponse, schema: S, source: string): z.output<S> {
    const parsed = schema.safeParse(response.payload);
    if (!parsed.success) {
      throw new RequestError(`${source} returned an unexpected response.`, {
        httpStatus: response.status,
        cause: parsed.error
      });
    }
    return parsed.data;
  }

  /**
   * Look up users by username. The platform answers "invalid parameters" when
   * any one of the names is unknown, which is reported as an empty list.
   */
  async users(usernames: string[]): Promise<User[]> {
    const response = await this.send("/getusers", { method: "POST", body: { user: usernames } }, "Trovo user lookup");
    if (response.apiError?.status === ErrorStatus.InvalidParameters) {
      return [];
    }
    return this.read(response, GetUsersResponseSchema, "Trovo user lookup").users;
  }

  async user(username: string): Promise<User | null> {
    const [user] = await this.users([username]);
    return user ?? null;
  }

  async channelById(channelId: string): Promise<ChannelInfo | null> {
    const response = await this.send(
      "/channels/id",
      { method: "POST", body: { channel_id: channelId } },
      "Trovo channel lookup"
    );
    const channel = this.read(response, ChannelInfoSchema, "Trovo channel lookup");
    // Unknown channels come back as a blank record.
    return channel.username ? channel : null;
  }

  async chatTokenForChannel(channelId: string): Promise<ChatToken> {
    const response = await this.send(
      `/chat/channel-token/${encodeURIComponent(channelId)}`,
      {},
      "Trovo channel chat token"
    );
    return this.read(response, ChatTokenSchema, "Trovo channel chat token");
  }

  async chatTokenForUser(provider: AccessTokenProvider): Promise<ChatToken> {
    const { token } = await provider.accessToken();
    const response = await this.send("/chat/token", { accessToken: token }, "Trovo user chat token");
    return this.readAuthenticated(response, ChatTokenSchema, "Trovo user chat token");
  }

  async exchangeChatToken(accessToken: string, channelId: string, signal?: AbortSignal): Promise<ChatToken> {
    const response = await this.send(
      `/chat/channel-token/${encodeURIComponent(channelId)}`,
      { accessToken, signal },
      "Trovo chat token exchange"
    );
    return this.readAuthenticated(response, ChatTokenSchema, "Trovo chat token exchange");
  }

  /**
   * Send a chat message. Without `channelId` the message goes to the
   * authenticated user's own channel.
   */
  async sendChatMessage(provider: AccessTokenProvider, message: string, channelId?: string) {
    const content = message.trim();
    if (!content) return;
    if (content.length > MAX_CHAT_MESSAGE_LENGTH) {
      throw new Error("Message is too long.");
    }

    const { token } = await provider.accessToken();
    const body = channelId ? { content, channel_id: channelId } : { content };
    const response = await this.send("/chat/send", { method: "POST", body, accessToken: token }, "Trovo chat send");
    this.assertAuthenticatedOk(response, "Trovo chat send");
  }

  async refreshAccessToken(options: { clientSecret: string; refreshToken: string }): Promise<TokenGrant> {
    const response = await this.send(
      "/refreshtoken",
      {
        method: "POST",
        body: {
          client_secret: options.clientSecret,
          grant_type: "refresh_token",
          refresh_token: options.refreshToken
        }
      },
      "Trovo token refresh"
    );
    return this.readAuthenticated(response, TokenGrantSchema, "Trovo token refresh");
  }

  async exchangeAuthorizationCode(options: {
    clientSecret: string;
    code: string;
    redirectUri: string;
  }): Promise<TokenGrant> {
    const response = await this.send(
      "/exchangetoken",
      {
        method: "POST",
        body: {
          client_secret: options.clientSecret,
          grant_type: "authorization_code",
          code: options.code,
          redirect_uri: options.redirectUri
        }
      },
      "Trovo authorization code exchange"
    );
    return this.readAuthenticated(response, TokenGrantSchema, "Trovo authorization code exchange");
  }

  createTokenRefresher(clientSecret: string): TokenRefresher {
    return (refreshToken) => this.refreshAccessToken({ clientSecret, refreshToken });
  }

  openChat(channelId: string, tokenProvider: AccessTokenProvider, options: ChatSessionOptions = {}): ChatSession {
    return new ChatSession({ logger: this.logger, ...options, channelId, tokenProvider, tokenSource: this });
  }
}
