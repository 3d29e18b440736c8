/**
 * Prometheus-compatible metrics for observability
 * Provides both JSON metrics (/metrics) and Prometheus format (/metrics/prometheus)
 */
import type { FastifyPluginAsync } from "fastify";
import os from "os";
import {
  Counter,
  Gauge,
  Histogram,
  Registry,
  collectDefaultMetrics,
} from "prom-client";

// Create a custom registry
export const metricsRegistry = new Registry();

// Add default Node.js metrics (memory, CPU, event loop, etc.)
collectDefaultMetrics({ register: metricsRegistry });

/**
 * Application-specific metrics
 */
export const metrics = {
  // Gateway connections
  socketConnections: new Gauge({
    name: "roster_socket_connections_total",
    help: "Current number of connected chat gateways",
    registers: [metricsRegistry],
  }),

  // Chats with a roster in memory
  rostersActive: new Gauge({
    name: "roster_chats_active",
    help: "Number of chats with a roster",
    registers: [metricsRegistry],
  }),

  // Socket event processing
  eventsTotal: new Counter({
    name: "roster_socket_events_total",
    help: "Total number of socket events processed",
    labelNames: ["event", "status"] as const,
    registers: [metricsRegistry],
  }),

  eventLatency: new Histogram({
    name: "roster_socket_event_latency_seconds",
    help: "Socket event processing latency in seconds",
    labelNames: ["event"] as const,
    buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5],
    registers: [metricsRegistry],
  }),

  // Roster commands by outcome
  rosterCommands: new Counter({
    name: "roster_commands_total",
    help: "Roster commands executed",
    labelNames: ["command", "result"] as const, // result: success or error code
    registers: [metricsRegistry],
  }),

  rosterPersistFailures: new Counter({
    name: "roster_persist_failures_total",
    help: "Roster state writes that failed and were rolled back",
    registers: [metricsRegistry],
  }),

  // Chat platform API calls
  chatApiCalls: new Counter({
    name: "roster_chat_api_calls_total",
    help: "Total chat platform API calls",
    labelNames: ["endpoint", "status"] as const,
    registers: [metricsRegistry],
  }),

  chatApiLatency: new Histogram({
    name: "roster_chat_api_latency_seconds",
    help: "Chat platform API call latency in seconds",
    labelNames: ["endpoint"] as const,
    buckets: [0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
    registers: [metricsRegistry],
  }),
};

/** What the metrics routes need to know about the roster store */
export interface RosterStats {
  readonly size: number;
}

/**
 * Metrics Fastify routes plugin
 */
export const createMetricsRoutes = (
  rosterStore: RosterStats,
): FastifyPluginAsync => {
  return async (fastify) => {
    // Prometheus format endpoint
    fastify.get("/metrics/prometheus", async (_request, reply) => {
      metrics.rostersActive.set(rosterStore.size);

      reply.header("Content-Type", metricsRegistry.contentType);
      return metricsRegistry.metrics();
    });

    // JSON format endpoint
    fastify.get("/metrics", async () => {
      const memoryUsage = process.memoryUsage();
      const cpuUsage = process.cpuUsage();
      const uptime = process.uptime();

      return {
        system: {
          uptime,
          memory: {
            rss: memoryUsage.rss,
            heapTotal: memoryUsage.heapTotal,
            heapUsed: memoryUsage.heapUsed,
            external: memoryUsage.external,
          },
          cpu: cpuUsage,
          loadAverage: os.loadavg(),
          freemem: os.freemem(),
          totalmem: os.totalmem(),
        },
        application: {
          rosters: rosterStore.size,
        },
        timestamp: new Date().toISOString(),
      };
    });
  };
};
