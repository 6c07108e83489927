export * from "./types";
export * from "./errors";
export * from "./config";
export * from "./auth/tokenProviders";
export * from "./api/entities";
export * from "./api/trovoApi";
export * from "./chat/protocol";
export * from "./chat/normalize";
export * from "./chat/transportLink";
export * from "./chat/chatSession";
export * from "./openChat";
