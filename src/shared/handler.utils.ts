/**
 * Socket handler utilities
 * Provides a createHandler wrapper for consistent validation, error handling, and metrics
 */
import type { z } from "zod";
import type { Socket } from "socket.io";
import { logger } from "@src/infrastructure/logger.js";
import { metrics } from "@src/infrastructure/metrics.js";
import { generateCorrelationId } from "./correlation.js";
import { Errors } from "./errors.js";
import type { AppContext } from "@src/context.js";

/**
 * Standard handler result shape
 */
export interface HandlerResult {
  success: boolean;
  error?: string;
  data?: unknown;
}

/**
 * Handler function signature
 */
type HandlerFn<TPayload> = (
  payload: TPayload,
  socket: Socket,
  context: AppContext,
) => Promise<HandlerResult>;

/**
 * Callback function signature from Socket.IO
 */
type SocketCallback = (result: HandlerResult) => void;

/**
 * Create a wrapped socket event handler with:
 * - Zod schema validation
 * - Centralized error handling
 * - Logging with correlation IDs
 * - Event count and latency metrics
 *
 * @param eventName - The socket event name (for logging/metrics)
 * @param schema - Zod schema to validate the payload
 * @param handler - The actual handler function
 * @returns A function that takes (socket, context) and returns the event handler
 *
 * @example
 * ```typescript
 * export const listHandler = createHandler(
 *   'roster:list',
 *   rosterListSchema,
 *   async (payload, socket, context) => {
 *     return { success: true, data: await context.rosterService.list(payload.chatId) };
 *   }
 * );
 *
 * socket.on('roster:list', listHandler(socket, context));
 * ```
 */
export function createHandler<TPayload>(
  eventName: string,
  schema: z.ZodType<TPayload, z.ZodTypeDef, unknown>,
  handler: HandlerFn<TPayload>,
) {
  return (socket: Socket, context: AppContext) => {
    return async (rawPayload: unknown, callback?: SocketCallback) => {
      const startTime = Date.now();
      const requestId = generateCorrelationId();
      const socketId = socket.id;

      // 1. Validate payload
      const parseResult = schema.safeParse(rawPayload);
      if (!parseResult.success) {
        logger.debug(
          {
            requestId,
            event: eventName,
            socketId,
            errors: parseResult.error.format(),
          },
          "Validation failed",
        );
        metrics.eventsTotal.inc({ event: eventName, status: "invalid" });
        callback?.({ success: false, error: Errors.INVALID_PAYLOAD });
        return;
      }

      // 2. Execute handler
      try {
        const result = await handler(parseResult.data, socket, context);

        const durationMs = Date.now() - startTime;
        logger.debug(
          {
            requestId,
            event: eventName,
            socketId,
            success: result.success,
            durationMs,
          },
          "Handler completed",
        );
        metrics.eventsTotal.inc({
          event: eventName,
          status: result.success ? "success" : "rejected",
        });
        metrics.eventLatency.observe({ event: eventName }, durationMs / 1000);

        callback?.(result);
      } catch (err) {
        const durationMs = Date.now() - startTime;
        logger.error(
          {
            err,
            requestId,
            event: eventName,
            socketId,
            durationMs,
          },
          "Handler exception",
        );
        metrics.eventsTotal.inc({ event: eventName, status: "error" });

        callback?.({ success: false, error: Errors.INTERNAL_ERROR });
      }
    };
  };
}
