import { describe, expect, it, vi } from "vitest";
import { AccessTokenOnly } from "../src/auth/tokenProviders";
import { ChatSession, type ChatSessionOptions } from "../src/chat/chatSession";
import { AuthError, AuthenticatedRequestError, DecodeError, RequestError } from "../src/errors";
import { openChat } from "../src/openChat";
import type { ChatSessionStatus, ChatStreamItem } from "../src/types";
import {
  FakeLink,
  FakeTokenSource,
  acknowledgingResponder,
  chatFrame,
  rawChat,
  staticProvider,
  wait
} from "./support/fakeLink";

type Harness = {
  session: ChatSession;
  links: FakeLink[];
  tokenSource: FakeTokenSource;
  statuses: ChatSessionStatus[];
  iterator: AsyncIterator<ChatStreamItem, undefined>;
};

const createHarness = (
  makeLink: (index: number) => FakeLink,
  options: ChatSessionOptions & { tokenSource?: FakeTokenSource; tokenProvider?: AccessTokenOnly } = {}
): Harness => {
  const links: FakeLink[] = [];
  const { tokenSource = new FakeTokenSource(), tokenProvider, ...settings } = options;
  const session = new ChatSession({
    reconnectBaseDelayMs: 10,
    ...settings,
    channelId: "100200",
    tokenProvider: tokenProvider ?? staticProvider(),
    tokenSource,
    linkFactory: async () => {
      const link = makeLink(links.length);
      links.push(link);
      return link;
    }
  });
  const statuses: ChatSessionStatus[] = [];
  session.onStatus((status) => statuses.push(status));
  return { session, links, tokenSource, statuses, iterator: session[Symbol.asyncIterator]() };
};

const messageOf = (result: IteratorResult<ChatStreamItem, undefined>) => {
  if (result.done) throw new Error("sequence ended");
  if (!result.value.ok) throw result.value.error;
  return result.value.message;
};

const errorOf = (result: IteratorResult<ChatStreamItem, undefined>) => {
  if (result.done) throw new Error("sequence ended");
  if (result.value.ok) throw new Error(`expected an error, got message ${result.value.message.id}`);
  return result.value.error;
};

const chattyLink = (index: number) =>
  new FakeLink(
    acknowledgingResponder({
      afterJoin: (link) =>
        link.deliver(chatFrame([rawChat({ message_id: `m${index + 1}`, content: `from link ${index + 1}` })]))
    })
  );

describe("ChatSession", () => {
  it("does nothing until the sequence is pulled", async () => {
    const { session, links } = createHarness(chattyLink);
    await wait(20);
    expect(links).toHaveLength(0);
    expect(session.status).toBe("idle");
    await session.close();
    expect(session.status).toBe("closed");
  });

  it("authenticates, joins and forwards messages in arrival order", async () => {
    const { links, tokenSource, statuses, iterator } = createHarness(
      () =>
        new FakeLink(
          acknowledgingResponder({
            afterJoin: (link) =>
              link.deliver(
                chatFrame([
                  rawChat({ message_id: "m1", content: "first" }),
                  rawChat({ message_id: "m2", content: "second" })
                ])
              )
          })
        )
    );

    const first = messageOf(await iterator.next());
    const second = messageOf(await iterator.next());

    expect(first.id).toBe("m1");
    expect(first.content).toBe("first");
    expect(first.channelId).toBe("100200");
    expect(second.id).toBe("m2");
    expect(tokenSource.calls).toEqual([{ accessToken: "test-access-token", channelId: "100200" }]);
    expect(links[0].sent).toEqual([
      { type: "AUTH", nonce: "auth-1", data: { token: "chat-token-1" } },
      { type: "JOIN", nonce: "join-2", data: { channel_id: "100200" } }
    ]);
    expect(statuses).toEqual(["connecting", "authenticating", "joining", "active"]);

    await iterator.return?.();
    expect(links[0].closed).toBe(true);
    expect(statuses.at(-1)).toBe("closed");
  });

  it("yields a decode error for the one malformed message and keeps the rest of the batch", async () => {
    const { iterator } = createHarness(
      () =>
        new FakeLink(
          acknowledgingResponder({
            afterJoin: (link) =>
              link.deliver(
                chatFrame([
                  rawChat({ message_id: "m1" }),
                  rawChat({ message_id: "m2", content: undefined }),
                  rawChat({ message_id: "m3" })
                ])
              )
          })
        )
    );

    expect(messageOf(await iterator.next()).id).toBe("m1");
    const failure = errorOf(await iterator.next());
    expect(failure).toBeInstanceOf(DecodeError);
    expect(failure.message).toBe("Malformed chat message: content: Required");
    expect(messageOf(await iterator.next()).id).toBe("m3");

    await iterator.return?.();
  });

  it("decodes a message without a sender id as a message with a null sender", async () => {
    const { sender_id: _senderId, ...withoutSender } = rawChat({ message_id: "m2", content: "no sender" });
    const { iterator } = createHarness(
      () =>
        new FakeLink(
          acknowledgingResponder({
            afterJoin: (link) => link.deliver(chatFrame([rawChat({ message_id: "m1" }), withoutSender]))
          })
        )
    );

    const first = messageOf(await iterator.next());
    const second = messageOf(await iterator.next());

    expect(first.senderId).toBe(4242);
    expect(second.senderId).toBeNull();
    expect(second.id).toBe("m2");
    expect(second.nickname).toBe("Streamer Fan");
    expect(second.content).toBe("no sender");
    expect(second.avatarUrl).toBe("https://example.test/avatar.png");
    expect(second.sentAt).toBe("2023-11-14T22:13:20.000Z");

    await iterator.return?.();
  });

  it("surfaces undecodable frames and skips unknown frame types", async () => {
    const { iterator } = createHarness(
      () =>
        new FakeLink(
          acknowledgingResponder({
            afterJoin: (link) => {
              link.deliver("not json");
              link.deliver({ type: "GIFT_SHOWER", data: {} });
              link.deliver(chatFrame([rawChat({ message_id: "m1" })]));
            }
          })
        )
    );

    const failure = errorOf(await iterator.next());
    expect(failure).toBeInstanceOf(DecodeError);
    expect(failure.message).toBe("Chat frame is not valid JSON.");
    expect(messageOf(await iterator.next()).id).toBe("m1");

    await iterator.return?.();
  });

  it("reconnects after a link failure with a fresh chat token", async () => {
    const { links, tokenSource, statuses, iterator } = createHarness(chattyLink);

    expect(messageOf(await iterator.next()).content).toBe("from link 1");
    links[0].fail();

    expect(messageOf(await iterator.next()).content).toBe("from link 2");
    expect(links).toHaveLength(2);
    expect(links[0].closed).toBe(true);
    expect(tokenSource.calls).toHaveLength(2);
    expect(links[1].sent[0]).toEqual({ type: "AUTH", nonce: "auth-3", data: { token: "chat-token-2" } });
    expect(statuses).toEqual([
      "connecting",
      "authenticating",
      "joining",
      "active",
      "reconnecting",
      "connecting",
      "authenticating",
      "joining",
      "active"
    ]);

    await iterator.return?.();
  });

  it("retries when the server rejects the authentication frame", async () => {
    const { links, tokenSource, iterator } = createHarness((index) =>
      index === 0
        ? new FakeLink((frame, link) => {
            if (frame.type === "AUTH") {
              link.deliver({ type: "RESPONSE", nonce: frame.nonce, error: "invalid token" });
            }
          })
        : chattyLink(index)
    );

    expect(messageOf(await iterator.next()).content).toBe("from link 2");
    expect(links[0].sentOfType("JOIN")).toHaveLength(0);
    expect(tokenSource.calls).toHaveLength(2);

    await iterator.return?.();
  });

  it("ends with exactly one error when the token exchange is rejected during reconnect", async () => {
    const rejection = new AuthenticatedRequestError("Trovo chat token exchange failed (11704): Invalid access token", {
      httpStatus: 401
    });
    const tokenSource = new FakeTokenSource([
      () => Promise.resolve({ token: "chat-token-1" }),
      () => Promise.reject(rejection)
    ]);
    const { session, links, iterator } = createHarness(chattyLink, { tokenSource });

    expect(messageOf(await iterator.next()).content).toBe("from link 1");
    links[0].fail();

    expect(errorOf(await iterator.next())).toBe(rejection);
    expect((await iterator.next()).done).toBe(true);

    await wait(50);
    expect(tokenSource.calls).toHaveLength(2);
    expect(links).toHaveLength(1);
    expect(session.status).toBe("closed");
  });

  it("closes immediately when the token provider cannot produce a credential", async () => {
    const tokenProvider = new AccessTokenOnly({
      clientId: "test-client",
      accessToken: "test-access-token",
      expiresAt: 1_000,
      now: () => 2_000
    });
    const { links, tokenSource, iterator } = createHarness(chattyLink, { tokenProvider });

    const failure = errorOf(await iterator.next());
    expect(failure).toBeInstanceOf(AuthError);
    expect(failure instanceof AuthError && failure.reason).toBe("TOKEN_EXPIRED");
    expect((await iterator.next()).done).toBe(true);
    expect(links).toHaveLength(0);
    expect(tokenSource.calls).toHaveLength(0);
  });

  it("sends heartbeats on the configured interval", async () => {
    const { session, links, iterator } = createHarness(chattyLink, {
      heartbeatIntervalMs: 25,
      stalenessWindowMs: 1_000
    });

    messageOf(await iterator.next());
    await vi.waitFor(() => expect(links[0].sentOfType("PING").length).toBeGreaterThanOrEqual(3), { timeout: 2_000 });

    expect(
      links[0]
        .sentOfType("PING")
        .slice(0, 3)
        .map((frame) => frame.nonce)
    ).toEqual(["1", "2", "3"]);
    expect(session.lastHeartbeat).not.toBeNull();
    expect(links).toHaveLength(1);

    await iterator.return?.();
  });

  it("moves to reconnecting exactly once when the link goes stale", async () => {
    const { session, links, statuses, iterator } = createHarness(
      () =>
        new FakeLink(
          acknowledgingResponder({
            answerPings: false,
            afterJoin: (link) => link.deliver(chatFrame([rawChat()]))
          })
        ),
      { heartbeatIntervalMs: 20, stalenessWindowMs: 70, reconnectBaseDelayMs: 5_000 }
    );

    messageOf(await iterator.next());
    await vi.waitFor(() => expect(session.status).toBe("reconnecting"), { timeout: 2_000 });
    await wait(100);

    expect(statuses.filter((status) => status === "reconnecting")).toHaveLength(1);
    expect(links).toHaveLength(1);
    expect(links[0].closed).toBe(true);
    expect(session.pendingReconnectAttempts).toBe(1);

    await iterator.return?.();
    expect(session.status).toBe("closed");
  });

  it("stops all link activity once the caller cancels", async () => {
    const { session, links, iterator } = createHarness(chattyLink, {
      heartbeatIntervalMs: 20,
      stalenessWindowMs: 1_000
    });

    messageOf(await iterator.next());
    await iterator.return?.();

    expect(links[0].closed).toBe(true);
    const sentAtCancel = links[0].sent.length;
    await wait(80);

    expect(links[0].sent).toHaveLength(sentAtCancel);
    expect(links).toHaveLength(1);
    expect(session.status).toBe("closed");
    expect((await iterator.next()).done).toBe(true);
  });

  it("tears down when the abort signal fires", async () => {
    const controller = new AbortController();
    const { links, iterator } = createHarness(
      () => new FakeLink(acknowledgingResponder()),
      { signal: controller.signal }
    );

    const pending = iterator.next();
    await vi.waitFor(() => expect(links).toHaveLength(1));
    controller.abort();

    expect((await pending).done).toBe(true);
    await vi.waitFor(() => expect(links[0].closed).toBe(true));
  });
});

describe("ChatSession heartbeats", () => {
  const pongingLink = () =>
    new FakeLink((frame, link) => {
      if (frame.type !== "PING") {
        acknowledgingResponder({ afterJoin: (joined) => joined.deliver(chatFrame([rawChat()])) })(frame, link);
        return;
      }
      if (frame.nonce === "1") {
        link.deliver({ type: "PONG", nonce: "1", data: { gap: 1 } });
        link.deliver({ type: "PONG", nonce: "0", data: { gap: 0.01 } });
        link.deliver({ type: "PONG", nonce: "abc", data: { gap: 0.01 } });
      }
    });

  it("adopts the server gap and ignores late or unparsable pongs", async () => {
    const logs: string[] = [];
    const { session, links, iterator } = createHarness(pongingLink, {
      heartbeatIntervalMs: 20,
      stalenessWindowMs: 5_000,
      adoptServerPingGap: true,
      logger: (line) => logs.push(line)
    });

    messageOf(await iterator.next());
    expect(session.heartbeatInterval).toBe(20);
    expect(session.lastAcknowledgedPing).toBe(0);

    await vi.waitFor(() => expect(logs).toContain('Ignoring pong with unparsable nonce "abc".'));
    expect(session.lastAcknowledgedPing).toBe(1);
    expect(session.heartbeatInterval).toBe(1_000);

    await wait(100);
    expect(links[0].sentOfType("PING").length).toBeLessThanOrEqual(2);

    await iterator.return?.();
  });

  it("keeps the configured interval unless told to adopt the server gap", async () => {
    const logs: string[] = [];
    const { session, links, iterator } = createHarness(pongingLink, {
      heartbeatIntervalMs: 20,
      stalenessWindowMs: 5_000,
      logger: (line) => logs.push(line)
    });

    messageOf(await iterator.next());
    await vi.waitFor(() => expect(logs).toContain('Ignoring pong with unparsable nonce "abc".'));
    expect(session.lastAcknowledgedPing).toBe(1);
    expect(session.heartbeatInterval).toBe(20);

    await vi.waitFor(() => expect(links[0].sentOfType("PING").length).toBeGreaterThanOrEqual(4));

    await iterator.return?.();
  });
});

describe("ChatSession retries", () => {
  const outage = () =>
    Promise.reject(new RequestError("Trovo chat token exchange request failed (503).", { httpStatus: 503 }));

  it("retries a failed chat token exchange", async () => {
    const tokenSource = new FakeTokenSource([outage]);
    const { session, links, statuses, iterator } = createHarness(chattyLink, { tokenSource });

    expect(messageOf(await iterator.next()).content).toBe("from link 1");
    expect(tokenSource.calls).toHaveLength(2);
    expect(links).toHaveLength(1);
    expect(statuses).toEqual(["connecting", "reconnecting", "connecting", "authenticating", "joining", "active"]);
    expect(session.pendingReconnectAttempts).toBe(0);

    await iterator.return?.();
  });

  it("reconnects when authentication is never acknowledged", async () => {
    const logs: string[] = [];
    const { links, iterator } = createHarness((index) => (index === 0 ? new FakeLink() : chattyLink(index)), {
      responseTimeoutMs: 30,
      logger: (line) => logs.push(line)
    });

    expect(messageOf(await iterator.next()).content).toBe("from link 2");
    expect(links[0].sentOfType("AUTH")).toHaveLength(1);
    expect(links[0].sentOfType("JOIN")).toHaveLength(0);
    expect(links[0].closed).toBe(true);
    expect(logs).toContain("Trovo chat link lost: Timed out waiting for authentication response.");

    await iterator.return?.();
  });

  it("doubles the delay on each consecutive failure and resets once active", async () => {
    const logs: string[] = [];
    const tokenSource = new FakeTokenSource([outage, outage, outage]);
    const { session, iterator } = createHarness(chattyLink, { tokenSource, logger: (line) => logs.push(line) });
    const attempts: number[] = [];
    session.onStatus((status) => {
      if (status === "reconnecting") attempts.push(session.pendingReconnectAttempts);
    });

    expect(messageOf(await iterator.next()).content).toBe("from link 1");
    expect(attempts).toEqual([1, 2, 3]);
    expect(logs.filter((line) => line.startsWith("Reconnecting"))).toEqual([
      "Reconnecting to Trovo chat in 10ms (attempt 1).",
      "Reconnecting to Trovo chat in 20ms (attempt 2).",
      "Reconnecting to Trovo chat in 40ms (attempt 3)."
    ]);
    expect(session.pendingReconnectAttempts).toBe(0);

    await iterator.return?.();
  });
});

describe("ChatSession cancellation while connecting", () => {
  it("closes promptly while the chat token exchange is pending", async () => {
    const tokenSource = new FakeTokenSource([() => new Promise<{ token: string }>(() => {})]);
    const { session, links, iterator } = createHarness(chattyLink, { tokenSource });

    const pending = iterator.next();
    await vi.waitFor(() => expect(tokenSource.calls).toHaveLength(1));
    const startedAt = Date.now();
    await session.close();

    expect(Date.now() - startedAt).toBeLessThan(500);
    expect(tokenSource.signals[0]?.aborted).toBe(true);
    expect((await pending).done).toBe(true);
    expect(links).toHaveLength(0);
    expect(session.status).toBe("closed");
  });

  it("closes promptly while the link is opening and discards a late link", async () => {
    const openings: Array<{ signal: AbortSignal | undefined; finish: (link: FakeLink) => void }> = [];
    const session = new ChatSession({
      channelId: "100200",
      tokenProvider: staticProvider(),
      tokenSource: new FakeTokenSource(),
      linkFactory: (_url, signal) =>
        new Promise<FakeLink>((resolve) => {
          openings.push({ signal, finish: resolve });
        })
    });

    const pending = session[Symbol.asyncIterator]().next();
    await vi.waitFor(() => expect(openings).toHaveLength(1));
    const startedAt = Date.now();
    await session.close();

    expect(Date.now() - startedAt).toBeLessThan(500);
    expect(openings[0].signal?.aborted).toBe(true);
    expect((await pending).done).toBe(true);

    const late = new FakeLink();
    openings[0].finish(late);
    await vi.waitFor(() => expect(late.closed).toBe(true));
  });
});

describe("openChat", () => {
  it("opens a lazy session for the channel", async () => {
    const links: FakeLink[] = [];
    const session = openChat("100200", staticProvider(), {
      tokenSource: new FakeTokenSource(),
      linkFactory: async () => {
        const link = chattyLink(links.length);
        links.push(link);
        return link;
      }
    });

    expect(session.channel).toBe("100200");
    expect(session.status).toBe("idle");

    for await (const item of session) {
      expect(item.ok && item.message.content).toBe("from link 1");
      break;
    }
    expect(links[0].closed).toBe(true);
    expect(session.status).toBe("closed");
  });
});
