/**
 * Correlation ID generation for request tracing
 */
import { randomBytes } from "node:crypto";

/**
 * Generate a unique correlation/request ID for tracing a chat command
 * across the handler, roster store and admin lookup logs
 */
export function generateCorrelationId(): string {
  return randomBytes(8).toString("hex");
}
