/**
 * Prometheus-compatible metrics for observability
 * Provides both JSON metrics (/metrics) and Prometheus format (/metrics/prometheus)
 */
import type { FastifyPluginAsync } from "fastify";
import os from "node:os";
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
  // Socket Connections
  socketConnections: new Gauge({
    name: "classroom_socket_connections_total",
    help: "Current number of active socket connections",
    registers: [metricsRegistry],
  }),

  // Classrooms with at least one joined participant
  roomsActive: new Gauge({
    name: "classroom_rooms_active",
    help: "Number of currently active classrooms",
    registers: [metricsRegistry],
  }),

  // Relay message processing
  messagesTotal: new Counter({
    name: "classroom_messages_total",
    help: "Total number of relay messages processed",
    labelNames: ["type", "status"] as const, // success, rejected, error
    registers: [metricsRegistry],
  }),

  messageLatency: new Histogram({
    name: "classroom_message_latency_seconds",
    help: "Relay message processing latency in seconds",
    labelNames: ["type"] as const,
    buckets: [0.001, 0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1],
    registers: [metricsRegistry],
  }),

  // Frames that never reached a handler
  protocolErrors: new Counter({
    name: "classroom_protocol_errors_total",
    help: "Inbound frames rejected before dispatch",
    labelNames: ["reason"] as const,
    registers: [metricsRegistry],
  }),

  seatClaims: new Counter({
    name: "classroom_seat_claims_total",
    help: "Seat claim attempts",
    labelNames: ["result"] as const, // claimed, taken, invalid
    registers: [metricsRegistry],
  }),

  // Authentication
  authAttempts: new Counter({
    name: "classroom_auth_attempts_total",
    help: "Authentication attempts",
    labelNames: ["result"] as const, // success, no_token, invalid_token, origin_blocked, no_room, error
    registers: [metricsRegistry],
  }),
};

/**
 * Live figures the JSON endpoint reports next to process stats
 */
export interface RelayStats {
  connections(): number;
  rooms(): Promise<number>;
}

/**
 * Metrics Fastify routes plugin
 */
export const createMetricsRoutes = (stats: RelayStats): FastifyPluginAsync => {
  return async (fastify) => {
    // Prometheus format endpoint
    fastify.get("/metrics/prometheus", async (_request, reply) => {
      metrics.socketConnections.set(stats.connections());

      reply.header("Content-Type", metricsRegistry.contentType);
      return metricsRegistry.metrics();
    });

    // JSON format endpoint
    fastify.get("/metrics", async () => {
      const memoryUsage = process.memoryUsage();

      return {
        system: {
          uptime: process.uptime(),
          memory: {
            rss: memoryUsage.rss,
            heapTotal: memoryUsage.heapTotal,
            heapUsed: memoryUsage.heapUsed,
            external: memoryUsage.external,
          },
          cpu: process.cpuUsage(),
          loadAverage: os.loadavg(),
          freemem: os.freemem(),
          totalmem: os.totalmem(),
        },
        application: {
          connections: stats.connections(),
          rooms: await stats.rooms(),
        },
        timestamp: new Date().toISOString(),
      };
    });
  };
};
