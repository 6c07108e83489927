import { TrovoApiClient } from "./api/trovoApi";
import type { AccessTokenProvider } from "./auth/tokenProviders";
import { ChatSession, type ChatSessionOptions, type ChatTokenSource } from "./chat/chatSession";

/**
 * Open a chat sequence for `channelId`. The chat token is exchanged through a
 * {@link TrovoApiClient} for the provider's client id unless `tokenSource` is given.
 */
export const openChat = (
  channelId: string,
  tokenProvider: AccessTokenProvider,
  options: ChatSessionOptions & { tokenSource?: ChatTokenSource } = {}
): ChatSession => {
  const { tokenSource, ...settings } = options;
  return new ChatSession({
    ...settings,
    channelId,
    tokenProvider,
    tokenSource: tokenSource ?? new TrovoApiClient({ clientId: tokenProvider.clientId, logger: settings.logger })
  });
};
