import WebSocket from "ws";
import { ConnectError, LinkError } from "../errors";
import type { Logger } from "../types";

export interface TransportLink {
  send(frame: string): Promise<void>;
  /** Next inbound text frame. Rejects with {@link LinkError} once the link is closed or errored. */
  receive(): Promise<string>;
  close(): Promise<void>;
}

/** `signal` aborts an opening handshake. */
export type TransportLinkFactory = (url: string, signal?: AbortSignal) => Promise<TransportLink>;

export type WebSocketLinkOptions = {
  connectTimeoutMs?: number;
  closeTimeoutMs?: number;
  logger?: Logger;
  /** Aborts the opening handshake; an open link is closed with `close()`. */
  signal?: AbortSignal;
};

const DEFAULT_CONNECT_TIMEOUT_MS = 10_000;
const DEFAULT_CLOSE_TIMEOUT_MS = 5_000;

const rawDataToString = (data: WebSocket.RawData): string => {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString("utf8");
  return data.toString("utf8");
};

type Waiter = {
  resolve: (frame: string) => void;
  reject: (error: LinkError) => void;
};

export class WebSocketLink implements TransportLink {
  private readonly inbox: string[] = [];
  private readonly waiters: Waiter[] = [];
  private failure: LinkError | null = null;
  private readonly closeTimeoutMs: number;
  private readonly logger?: Logger;

  private constructor(
    private readonly socket: WebSocket,
    options: WebSocketLinkOptions
  ) {
    this.closeTimeoutMs = options.closeTimeoutMs ?? DEFAULT_CLOSE_TIMEOUT_MS;
    this.logger = options.logger;

    socket.on("message", (data) => {
      this.deliver(rawDataToString(data));
    });

    socket.on("close", (code, reason) => {
      const closeReason = reason.toString("utf8");
      this.fail(
        new LinkError(`Chat socket closed (${code}${closeReason ? `: ${closeReason}` : ""}).`, "closed", {
          closeCode: code,
          closeReason
        })
      );
    });

    socket.on("error", (error) => {
      this.logger?.(`Chat socket error: ${error.message}`);
      this.fail(new LinkError(error.message, "errored", undefined, { cause: error }));
    });
  }

  static connect(url: string, options: WebSocketLinkOptions = {}): Promise<WebSocketLink> {
    const { signal } = options;
    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(new ConnectError(`Connection to ${url} was cancelled.`));
        return;
      }

      let socket: WebSocket;
      try {
        socket = new WebSocket(url, {
          handshakeTimeout: options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS
        });
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        reject(new ConnectError(`Failed to connect to ${url}: ${reason}`, { cause: error }));
        return;
      }

      const onOpen = () => {
        signal?.removeEventListener("abort", onAbort);
        socket.off("error", onError);
        resolve(new WebSocketLink(socket, options));
      };
      // Stays attached after an abort: terminating a handshake emits "error".
      const onError = (error: Error) => {
        signal?.removeEventListener("abort", onAbort);
        socket.off("open", onOpen);
        reject(new ConnectError(`Failed to connect to ${url}: ${error.message}`, { cause: error }));
      };
      const onAbort = () => {
        socket.off("open", onOpen);
        reject(new ConnectError(`Connection to ${url} was cancelled.`));
        socket.terminate();
      };

      socket.once("open", onOpen);
      socket.on("error", onError);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  async send(frame: string) {
    if (this.failure || this.socket.readyState !== WebSocket.OPEN) {
      throw this.failure ?? new LinkError("Chat socket is not open.", "closed");
    }
    await new Promise<void>((resolve, reject) => {
      this.socket.send(frame, (error) => {
        if (error) {
          reject(new LinkError(error.message, "errored", undefined, { cause: error }));
          return;
        }
        resolve();
      });
    });
  }

  receive(): Promise<string> {
    const next = this.inbox.shift();
    if (next !== undefined) return Promise.resolve(next);
    if (this.failure) return Promise.reject(this.failure);
    return new Promise((resolve, reject) => this.waiters.push({ resolve, reject }));
  }

  close(): Promise<void> {
    if (this.socket.readyState === WebSocket.CLOSED) return Promise.resolve();

    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.logger?.(`Chat socket did not close within ${this.closeTimeoutMs}ms, terminating.`);
        this.socket.off("close", onClose);
        this.socket.terminate();
        resolve();
      }, this.closeTimeoutMs);
      const onClose = () => {
        clearTimeout(timer);
        resolve();
      };
      this.socket.once("close", onClose);
      if (this.socket.readyState !== WebSocket.CLOSING) {
        this.socket.close(1000, "client closing");
      }
    });
  }

  private deliver(frame: string) {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve(frame);
      return;
    }
    this.inbox.push(frame);
  }

  private fail(error: LinkError) {
    if (this.failure) return;
    this.failure = error;
    this.waiters.splice(0).forEach((waiter) => waiter.reject(error));
  }
}
