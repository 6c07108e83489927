import { AuthError, AuthenticatedRequestError } from "../errors";
import type { Logger } from "../types";

export type AccessToken = {
  token: string;
  /** Epoch milliseconds, or null when the expiry is unknown. */
  expiresAt: number | null;
};

export interface AccessTokenProvider {
  readonly clientId: string;
  accessToken(): Promise<AccessToken>;
  refreshIfNeeded(): Promise<void>;
}

export type TokenGrant = {
  accessToken: string;
  refreshToken: string;
  expiresIn: number;
  tokenType: string | null;
};

export type TokenRefresher = (refreshToken: string) => Promise<TokenGrant>;

type Clock = () => number;

/**
 * A fixed access token. Requests fail with an {@link AuthError} once it expires.
 */
export class AccessTokenOnly implements AccessTokenProvider {
  readonly clientId: string;
  private readonly token: string;
  private readonly expiresAt: number | null;
  private readonly now: Clock;

  constructor(options: { clientId: string; accessToken: string; expiresAt?: number | null; now?: Clock }) {
    this.clientId = options.clientId;
    this.token = options.accessToken;
    this.expiresAt = options.expiresAt ?? null;
    this.now = options.now ?? Date.now;
  }

  async refreshIfNeeded() {}

  async accessToken(): Promise<AccessToken> {
    if (!this.token) {
      throw new AuthError("No access token configured.", "MISSING_TOKEN");
    }
    if (this.expiresAt !== null && this.now() >= this.expiresAt) {
      throw new AuthError("Access token expired and does not support refreshing.", "TOKEN_EXPIRED");
    }
    return { token: this.token, expiresAt: this.expiresAt };
  }
}

export type RefreshingTokenProviderOptions = {
  clientId: string;
  refreshToken: string;
  refresh: TokenRefresher;
  accessToken?: string;
  expiresAt?: number | null;
  /** Refresh this long before the recorded expiry. */
  refreshSkewMs?: number;
  onRefresh?: (grant: TokenGrant) => void;
  logger?: Logger;
  now?: Clock;
};

const DEFAULT_REFRESH_SKEW_MS = 60_000;

export class RefreshingTokenProvider implements AccessTokenProvider {
  readonly clientId: string;
  private token: string;
  private refreshToken: string;
  private expiresAt: number | null;
  private inflight: Promise<void> | null = null;
  private readonly refresher: TokenRefresher;
  private readonly refreshSkewMs: number;
  private readonly onRefresh?: (grant: TokenGrant) => void;
  private readonly logger?: Logger;
  private readonly now: Clock;

  constructor(options: RefreshingTokenProviderOptions) {
    this.clientId = options.clientId;
    this.token = options.accessToken ?? "";
    this.refreshToken = options.refreshToken;
    this.expiresAt = options.expiresAt ?? null;
    this.refresher = options.refresh;
    this.refreshSkewMs = options.refreshSkewMs ?? DEFAULT_REFRESH_SKEW_MS;
    this.onRefresh = options.onRefresh;
    this.logger = options.logger;
    this.now = options.now ?? Date.now;
  }

  private needsRefresh() {
    if (!this.token) return true;
    return this.expiresAt !== null && this.now() >= this.expiresAt - this.refreshSkewMs;
  }

  async refreshIfNeeded() {
    if (!this.needsRefresh()) return;
    if (!this.inflight) {
      this.inflight = this.refresh().finally(() => {
        this.inflight = null;
      });
    }
    await this.inflight;
  }

  async accessToken(): Promise<AccessToken> {
    await this.refreshIfNeeded();
    if (!this.token) {
      throw new AuthError("Refresh did not produce an access token.", "MISSING_TOKEN");
    }
    return { token: this.token, expiresAt: this.expiresAt };
  }

  private async refresh() {
    if (!this.refreshToken) {
      throw new AuthError("No refresh token available.", "REFRESH_REJECTED");
    }

    let grant: TokenGrant;
    try {
      grant = await this.refresher(this.refreshToken);
    } catch (error) {
      if (error instanceof AuthenticatedRequestError || error instanceof AuthError) {
        throw new AuthError(`Refresh token was rejected: ${error.message}`, "REFRESH_REJECTED", { cause: error });
      }
      throw error;
    }

    this.token = grant.accessToken;
    this.refreshToken = grant.refreshToken || this.refreshToken;
    this.expiresAt = this.now() + grant.expiresIn * 1000;
    this.logger?.(`Trovo access token refreshed, valid for ${grant.expiresIn}s.`);
    this.onRefresh?.(grant);
  }
}
