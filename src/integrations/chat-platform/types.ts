/**
 * Chat platform API types
 */

/** Member record returned by GET /chats/:chatId/members/:userId */
export interface ChatMemberResponse {
  user_id: string | number;
  status: string;
}

/** Membership statuses that carry admin rights in a group chat */
export const ADMIN_STATUSES = ["administrator", "creator", "owner"] as const;

export interface ChatPlatformClientOptions {
  baseUrl: string;
  apiKey?: string;
  timeoutMs: number;
  /** How long an admin lookup result is reused */
  cacheTtlMs: number;
  /** Upper bound on cached verdicts */
  cacheMaxEntries: number;
}
