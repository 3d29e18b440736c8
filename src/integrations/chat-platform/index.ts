export { ChatPlatformClient } from "./chat-platform.client.js";
export type { ChatMemberResponse, ChatPlatformClientOptions } from "./types.js";
