import EventEmitter from "eventemitter3";
import type { AccessTokenProvider } from "../auth/tokenProviders";
import { resolveChatSessionConfig, type ChatSessionConfig, type ChatSessionSettings } from "../config";
import { LinkError, isFatalChatError, toChatError } from "../errors";
import type { ChatSessionStatus, ChatStreamItem, ChatToken, Logger } from "../types";
import { MessageChannel } from "./messageChannel";
import { decodeFrame, encodeAuth, encodeJoin, encodePing, type InboundFrame } from "./protocol";
import { reconnectDelay, sleep, startTimer, untilAborted } from "./timing";
import { WebSocketLink, type TransportLink, type TransportLinkFactory } from "./transportLink";

export interface ChatTokenSource {
  exchangeChatToken(accessToken: string, channelId: string, signal?: AbortSignal): Promise<ChatToken>;
}

const closedError = () => new LinkError("Chat session was closed.", "closed");

export type ChatSessionOptions = ChatSessionSettings & {
  logger?: Logger;
  linkFactory?: TransportLinkFactory;
  signal?: AbortSignal;
};

export type ChatSessionInit = ChatSessionOptions & {
  channelId: string;
  tokenProvider: AccessTokenProvider;
  tokenSource: ChatTokenSource;
};

/**
 * A live chat subscription for one channel.
 *
 * Iterating the session connects lazily and yields decoded messages across
 * any number of reconnects. Transient failures are retried forever with capped
 * exponential backoff; a rejected credential ends the sequence with one error
 * item. Breaking out of the iteration, calling {@link close}, or aborting the
 * `signal` option tears the link down.
 */
export class ChatSession implements AsyncIterable<ChatStreamItem> {
  private emitter = new EventEmitter();
  private state: ChatSessionStatus = "idle";
  private readonly channelId: string;
  private readonly tokenProvider: AccessTokenProvider;
  private readonly tokenSource: ChatTokenSource;
  private readonly config: ChatSessionConfig;
  private readonly linkFactory: TransportLinkFactory;
  private readonly logger?: Logger;
  private readonly output: MessageChannel<ChatStreamItem>;
  private readonly abort = new AbortController();
  private running: Promise<void> | null = null;
  private link: TransportLink | null = null;
  private pendingReceive: Promise<string> | null = null;
  private reconnectAttempts = 0;
  private lastFrameAt = 0;
  private lastHeartbeatAt: number | null = null;
  private heartbeatIntervalMs: number;
  private pingIteration = 0;
  private pingAcknowledged = 0;
  private nonceCounter = 0;

  constructor(init: ChatSessionInit) {
    this.channelId = init.channelId;
    this.tokenProvider = init.tokenProvider;
    this.tokenSource = init.tokenSource;
    this.logger = init.logger;
    this.config = resolveChatSessionConfig(init);
    this.heartbeatIntervalMs = this.config.heartbeatIntervalMs;
    this.output = new MessageChannel(this.config.bufferSize);
    this.linkFactory =
      init.linkFactory ??
      ((url, signal) =>
        WebSocketLink.connect(url, {
          connectTimeoutMs: this.config.connectTimeoutMs,
          closeTimeoutMs: this.config.closeTimeoutMs,
          logger: this.logger,
          signal
        }));

    if (init.signal?.aborted) {
      void this.close();
    } else {
      init.signal?.addEventListener("abort", () => void this.close(), { once: true });
    }
  }

  get status() {
    return this.state;
  }

  get channel() {
    return this.channelId;
  }

  /** Epoch milliseconds of the last PING sent, or null before the first one. */
  get lastHeartbeat() {
    return this.lastHeartbeatAt;
  }

  get pendingReconnectAttempts() {
    return this.reconnectAttempts;
  }

  /** Heartbeat interval in effect, after any server gap was adopted. */
  get heartbeatInterval() {
    return this.heartbeatIntervalMs;
  }

  /** Nonce of the newest PING the server answered, 0 before the first PONG. */
  get lastAcknowledgedPing() {
    return this.pingAcknowledged;
  }

  onStatus(handler: (status: ChatSessionStatus) => void) {
    this.emitter.on("status", handler);
    return () => {
      this.emitter.off("status", handler);
    };
  }

  private setStatus(status: ChatSessionStatus) {
    if (this.state === status) return;
    this.state = status;
    this.emitter.emit("status", status);
  }

  [Symbol.asyncIterator](): AsyncIterator<ChatStreamItem, undefined> {
    return {
      next: () => {
        this.start();
        return this.output.pull();
      },
      return: async () => {
        await this.close();
        return { value: undefined, done: true };
      }
    };
  }

  /**
   * Cancel the session. Resolves once the link is closed and no heartbeat or
   * reconnect work remains. Calling it again has no further effect.
   */
  async close() {
    if (!this.abort.signal.aborted) {
      this.logger?.(`Closing Trovo chat session for channel ${this.channelId}.`);
      this.abort.abort();
    }
    this.output.cancel();
    if (this.running) {
      await this.running;
      return;
    }
    this.setStatus("closed");
  }

  private start() {
    if (this.running || this.abort.signal.aborted) return;
    this.running = this.run();
  }

  private async run() {
    const { signal } = this.abort;
    try {
      while (!signal.aborted) {
        try {
          const link = await this.connect();
          this.reconnectAttempts = 0;
          await this.pump(link);
        } catch (error) {
          if (signal.aborted) break;
          const failure = toChatError(error);
          if (isFatalChatError(failure)) {
            this.logger?.(`Trovo chat stopped: ${failure.message}`);
            await this.output.push({ ok: false, error: failure });
            break;
          }
          this.logger?.(`Trovo chat link lost: ${failure.message}`);
        } finally {
          await this.teardownLink();
        }

        if (signal.aborted) break;
        const delay = reconnectDelay(
          this.reconnectAttempts,
          this.config.reconnectBaseDelayMs,
          this.config.reconnectMaxDelayMs
        );
        this.reconnectAttempts += 1;
        this.setStatus("reconnecting");
        this.logger?.(`Reconnecting to Trovo chat in ${delay}ms (attempt ${this.reconnectAttempts}).`);
        await sleep(delay, signal);
      }
    } catch (error) {
      this.logger?.(`Trovo chat session failed unexpectedly: ${String(error)}`);
      await this.output.push({ ok: false, error: toChatError(error) });
    } finally {
      await this.teardownLink();
      this.setStatus("closed");
      this.output.end();
    }
  }

  private ensureOpen() {
    if (this.abort.signal.aborted) {
      throw closedError();
    }
  }

  private cancellable<T>(work: Promise<T>) {
    return untilAborted(work, this.abort.signal, closedError);
  }

  private nextNonce(prefix: string) {
    this.nonceCounter += 1;
    return `${prefix}-${this.nonceCounter}`;
  }

  private async connect(): Promise<TransportLink> {
    this.setStatus("connecting");
    this.logger?.(`Connecting to Trovo chat for channel ${this.channelId}...`);

    const { signal } = this.abort;
    await this.cancellable(this.tokenProvider.refreshIfNeeded());
    const accessToken = await this.cancellable(this.tokenProvider.accessToken());

    // Chat tokens are single-use across connections.
    const chatToken = await this.cancellable(
      this.tokenSource.exchangeChatToken(accessToken.token, this.channelId, signal)
    );

    const opening = this.linkFactory(this.config.url, signal);
    const link = await this.cancellable(opening).catch((error: unknown) => {
      if (signal.aborted) this.discardLateLink(opening);
      throw error;
    });
    this.link = link;
    this.ensureOpen();

    this.lastFrameAt = Date.now();
    this.pingIteration = 0;
    this.pingAcknowledged = 0;
    this.heartbeatIntervalMs = this.config.heartbeatIntervalMs;

    this.setStatus("authenticating");
    const authNonce = this.nextNonce("auth");
    await link.send(encodeAuth(authNonce, chatToken.token));
    await this.awaitResponse(link, authNonce, "authentication");

    this.setStatus("joining");
    const joinNonce = this.nextNonce("join");
    await link.send(encodeJoin(joinNonce, this.channelId));
    await this.awaitResponse(link, joinNonce, "channel join");

    this.setStatus("active");
    this.logger?.(`Trovo chat connected to channel ${this.channelId}.`);
    return link;
  }

  private async awaitResponse(link: TransportLink, nonce: string, label: string) {
    const deadline = Date.now() + this.config.responseTimeoutMs;
    for (;;) {
      const raw = await this.receiveUntil(link, deadline);
      this.ensureOpen();
      if (raw === null) {
        throw new LinkError(`Timed out waiting for ${label} response.`, "stale");
      }

      const frame = await this.handleFrame(raw);
      if (frame === null) continue;
      if (frame.kind !== "ack" && frame.kind !== "error") continue;
      if (frame.nonce !== null && frame.nonce !== nonce) continue;
      if (frame.kind === "ack") return;
      throw new LinkError(`Trovo chat rejected ${label}: ${frame.message}`, "protocol", {
        nonce: frame.nonce,
        errorCode: frame.code
      });
    }
  }

  private async pump(link: TransportLink) {
    let nextHeartbeatAt = Date.now() + this.heartbeatIntervalMs;
    while (!this.abort.signal.aborted) {
      const now = Date.now();
      const staleAt = this.lastFrameAt + this.config.stalenessWindowMs;
      if (now >= staleAt) {
        throw new LinkError(`No chat frame received for ${this.config.stalenessWindowMs}ms.`, "stale");
      }
      if (now >= nextHeartbeatAt) {
        await this.sendHeartbeat(link);
        nextHeartbeatAt = now + this.heartbeatIntervalMs;
        continue;
      }

      const raw = await this.receiveUntil(link, Math.min(staleAt, nextHeartbeatAt));
      if (raw !== null && !this.abort.signal.aborted) {
        await this.handleFrame(raw);
      }
    }
  }

  private async sendHeartbeat(link: TransportLink) {
    this.ensureOpen();
    this.pingIteration += 1;
    this.lastHeartbeatAt = Date.now();
    await link.send(encodePing(String(this.pingIteration)));
  }

  /**
   * Wait for the next frame until `deadline`. Returns null when the deadline
   * passes or the session is cancelled first; the pending receive is kept for
   * the next call so no frame is lost.
   */
  private async receiveUntil(link: TransportLink, deadline: number): Promise<string | null> {
    if (!this.pendingReceive) {
      this.pendingReceive = link.receive();
    }
    const pending = this.pendingReceive;
    const timer = startTimer(deadline - Date.now(), this.abort.signal);
    try {
      const raw = await Promise.race([pending, timer.promise.then(() => null)]);
      if (raw !== null) this.pendingReceive = null;
      return raw;
    } catch (error) {
      this.pendingReceive = null;
      throw error;
    } finally {
      timer.cancel();
    }
  }

  private async handleFrame(raw: string): Promise<InboundFrame | null> {
    this.lastFrameAt = Date.now();
    const decoded = decodeFrame(raw);
    if (!decoded.ok) {
      await this.emit({ ok: false, error: decoded.error });
      return null;
    }

    const frame = decoded.frame;
    switch (frame.kind) {
      case "chat":
        for (const item of frame.items) {
          if (!(await this.emit(item))) break;
        }
        break;
      case "pong":
        this.acknowledgePong(frame.nonce, frame.gap);
        break;
      case "error":
        this.logger?.(`Trovo chat error frame (${frame.code ?? "no code"}): ${frame.message}`);
        break;
      case "unknown":
        this.logger?.(`Ignoring unknown Trovo chat frame type "${frame.type}".`);
        break;
      case "ack":
        break;
    }
    return frame;
  }

  private acknowledgePong(nonce: string | null, gap: number | null) {
    const iteration = Number(nonce);
    if (nonce === null || !Number.isSafeInteger(iteration) || iteration < 0) {
      this.logger?.(`Ignoring pong with unparsable nonce "${nonce}".`);
      return;
    }
    // Late answers to older pings do not move the acknowledgement back.
    if (iteration <= this.pingAcknowledged) return;
    this.pingAcknowledged = iteration;
    if (this.config.adoptServerPingGap && gap !== null && gap > 0) {
      this.heartbeatIntervalMs = gap * 1000;
    }
  }

  private async emit(item: ChatStreamItem) {
    const delivered = await this.output.push(item);
    if (!delivered && !this.abort.signal.aborted) {
      this.abort.abort();
    }
    return delivered;
  }

  /** Close a link whose factory settles after the session was cancelled. */
  private discardLateLink(opening: Promise<TransportLink>) {
    void opening.then(
      (late) =>
        late.close().catch((error: unknown) => {
          this.logger?.(`Discarded Trovo chat link failed to close: ${String(error)}`);
        }),
      (error: unknown) => {
        this.logger?.(`Trovo chat link failed after the session closed: ${String(error)}`);
      }
    );
  }

  private async teardownLink() {
    const link = this.link;
    this.link = null;
    this.pendingReceive = null;
    if (link) {
      await link.close();
    }
  }
}
