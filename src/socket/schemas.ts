import { z } from "zod";

// Reusable validators
// Chat platforms hand out numeric ids (often negative for groups); they are
// keyed as strings everywhere past this point
const platformIdSchema = z
  .union([z.string().trim().min(1).max(64), z.number().int()])
  .transform(String);

// ─────────────────────────────────────────────────────────────────
// Roster Schemas
// ─────────────────────────────────────────────────────────────────

/**
 * Chat member as reported by the gateway. The identity is trusted as given.
 */
export const chatUserSchema = z.object({
  id: platformIdSchema,
  firstName: z.string().max(128).optional(),
  lastName: z.string().max(128).optional(),
  username: z
    .string()
    .regex(/^[A-Za-z0-9_]{1,64}$/)
    .optional(),
});

export const rosterMessageSchema = z.object({
  chatId: platformIdSchema,
  chatType: z.enum(["private", "group", "supergroup", "channel"]).default("group"),
  sender: chatUserSchema,
  text: z.string().min(1).max(4096),
});

export const rosterListSchema = z.object({
  chatId: platformIdSchema,
});
