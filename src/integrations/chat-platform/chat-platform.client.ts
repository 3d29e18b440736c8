/**
 * Chat platform client - admin lookups for roster commands
 *
 * Looks up a member's status in a chat and caches the verdict briefly so a
 * burst of admin commands costs one request.
 */
import type { Logger } from "@src/infrastructure/logger.js";
import { metrics } from "@src/infrastructure/metrics.js";
import {
  ADMIN_STATUSES,
  type ChatMemberResponse,
  type ChatPlatformClientOptions,
} from "./types.js";

export class ChatPlatformClient {
  private readonly adminCache = new Map<
    string,
    { isAdmin: boolean; expiresAt: number }
  >();

  constructor(
    private readonly options: ChatPlatformClientOptions,
    private readonly logger: Logger,
  ) {}

  /**
   * Whether the user administers the chat. Lookup failures count as "no".
   */
  async isChatAdmin(chatId: string, userId: string): Promise<boolean> {
    const cacheKey = `${chatId}:${userId}`;
    const now = Date.now();
    const cached = this.adminCache.get(cacheKey);
    if (cached) {
      if (cached.expiresAt > now) return cached.isAdmin;
      this.adminCache.delete(cacheKey);
    }

    try {
      const member = await this.getChatMember(chatId, userId);
      const isAdmin = ADMIN_STATUSES.some((status) => status === member.status);
      this.remember(cacheKey, isAdmin, now);
      return isAdmin;
    } catch (err) {
      this.logger.warn({ err, chatId, userId }, "Admin lookup failed");
      return false;
    }
  }

  async getChatMember(chatId: string, userId: string): Promise<ChatMemberResponse> {
    const endpoint = "/chats/:chatId/members/:userId";
    const end = metrics.chatApiLatency.startTimer({ endpoint });

    let response: Response;
    try {
      response = await this.get(
        `/chats/${encodeURIComponent(chatId)}/members/${encodeURIComponent(userId)}`,
      );
    } catch (err) {
      metrics.chatApiCalls.inc({ endpoint, status: "error" });
      throw err;
    } finally {
      end();
    }

    metrics.chatApiCalls.inc({ endpoint, status: String(response.status) });
    if (!response.ok) {
      throw new Error(`Failed to fetch chat member: ${response.status} ${response.statusText}`);
    }

    const rawBody = await response.text();
    let parsed: unknown;
    try {
      parsed = JSON.parse(rawBody);
    } catch (error) {
      throw new Error(
        `Failed to parse chat member JSON (status ${response.status}): ${String(error)}. Body preview: ${this.sanitizeBody(rawBody)}`,
      );
    }

    const status =
      typeof parsed === "object" && parsed !== null && "status" in parsed
        ? parsed.status
        : undefined;
    const memberId =
      typeof parsed === "object" && parsed !== null && "user_id" in parsed
        ? parsed.user_id
        : undefined;

    if (typeof status !== "string") {
      throw new Error(
        `Invalid or missing status (status ${response.status}): expected string, received ${String(status)}. Body preview: ${this.sanitizeBody(rawBody)}`,
      );
    }

    return {
      user_id: typeof memberId === "number" || typeof memberId === "string" ? memberId : userId,
      status,
    };
  }

  // ─────────────────────────────────────────────────────────────────
  // Private Helpers
  // ─────────────────────────────────────────────────────────────────

  /**
   * Cache a verdict. A full cache first drops expired verdicts, then the
   * oldest ones.
   */
  private remember(cacheKey: string, isAdmin: boolean, now: number): void {
    if (this.adminCache.size >= this.options.cacheMaxEntries) {
      for (const [key, entry] of this.adminCache) {
        if (entry.expiresAt <= now) this.adminCache.delete(key);
      }
      for (const key of this.adminCache.keys()) {
        if (this.adminCache.size < this.options.cacheMaxEntries) break;
        this.adminCache.delete(key);
      }
    }
    this.adminCache.set(cacheKey, { isAdmin, expiresAt: now + this.options.cacheTtlMs });
  }

  private async get(endpoint: string): Promise<Response> {
    const url = `${this.options.baseUrl}${endpoint}`;

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.options.timeoutMs);

    try {
      return await fetch(url, {
        method: "GET",
        headers: {
          Accept: "application/json",
          ...(this.options.apiKey
            ? { Authorization: `Bearer ${this.options.apiKey}` }
            : {}),
        },
        signal: controller.signal,
      });
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Whitespace-collapsed, truncated response body for error messages
   */
  private sanitizeBody(rawBody: string, maxLength = 200): string {
    if (!rawBody) {
      return "[empty body]";
    }

    const collapsed = rawBody.replace(/\s+/g, " ").trim();
    if (collapsed.length <= maxLength) {
      return collapsed;
    }

    return `${collapsed.slice(0, maxLength)}... [truncated]`;
  }
}
