import { Hono } from "hono";
import { serve } from "@hono/node-server";
import type { ChannelRegistry } from "../channels/registry.js";
import type { LoopStats } from "../dispatch/loop.js";
import { DENY_REASONS } from "../policy/types.js";

export const VERSION = "0.1.0";

export interface HealthSource {
  stats(): LoopStats;
}

/** Liveness, readiness and Prometheus counters for one engine. */
export class HealthServer {
  private readonly app = new Hono();
  private server: ReturnType<typeof serve> | null = null;
  private readonly startedAt: number;

  constructor(
    private readonly registry: ChannelRegistry,
    private readonly loop: HealthSource,
    private readonly port: number,
    private readonly hostname: string,
    private readonly clock: () => number = Date.now,
  ) {
    this.startedAt = clock();

    this.app.get("/health", (c) => {
      const platforms = this.registry.list().map((a) => a.platform);
      const stats = this.loop.stats();
      const uptime = this.clock() - this.startedAt;
      return c.json({
        status: platforms.length > 0 ? "ok" : "degraded",
        version: VERSION,
        uptime,
        uptimeHuman: formatUptime(uptime),
        channels: this.registry.list().map((a) => ({
          platform: a.platform,
          label: a.label,
          maxTextLength: a.maxTextLength,
        })),
        dispatch: {
          ...stats,
          lastTickAt: stats.lastTickAt === null ? null : new Date(stats.lastTickAt).toISOString(),
        },
        pid: process.pid,
        rssMB: Math.round(process.memoryUsage().rss / 1024 / 1024),
      });
    });

    this.app.get("/ready", (c) => {
      const count = this.registry.list().length;
      return count === 0
        ? c.json({ ready: false, reason: "no channels connected" }, 503)
        : c.json({ ready: true, channels: count });
    });

    this.app.get("/metrics", (c) => c.text(renderMetrics(this.loop.stats(), this.registry)));
  }

  /** In-process request against the routes, without a listening socket. */
  request(path: string): Response | Promise<Response> {
    return this.app.request(path);
  }

  async start(): Promise<void> {
    this.server = serve({ fetch: this.app.fetch, port: this.port, hostname: this.hostname });
  }

  async stop(): Promise<void> {
    this.server?.close();
    this.server = null;
  }
}

export function renderMetrics(stats: LoopStats, registry: ChannelRegistry): string {
  const counter = (name: string, help: string, value: number): string[] => [
    `# HELP amicus_${name} ${help}`,
    `# TYPE amicus_${name} counter`,
    `amicus_${name} ${value}`,
  ];

  const lines = [
    ...counter("proactive_sent_total", "Proactive messages delivered", stats.sent),
    ...counter("replies_sent_total", "Replies delivered", stats.replies),
    ...counter("delivery_failed_total", "Proactive contacts that failed", stats.failed),
    ...counter("scan_skipped_total", "Due users skipped by a scan", stats.skipped),
    ...counter("scan_ticks_total", "Due-scan ticks", stats.ticks),
    ...counter("content_filtered_total", "Generated texts blocked by the content filter", stats.filtered),
    "# HELP amicus_policy_denied_total Messages denied by policy",
    "# TYPE amicus_policy_denied_total counter",
    ...DENY_REASONS.map((r) => `amicus_policy_denied_total{reason="${r}"} ${stats.denied[r]}`),
    "# HELP amicus_channels_connected Connected channel adapters",
    "# TYPE amicus_channels_connected gauge",
    `amicus_channels_connected ${registry.list().length}`,
  ];
  return `${lines.join("\n")}\n`;
}

export function formatUptime(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);
  const days = Math.floor(hours / 24);

  if (days > 0) return `${days}d ${hours % 24}h`;
  if (hours > 0) return `${hours}h ${minutes % 60}m`;
  if (minutes > 0) return `${minutes}m ${seconds % 60}s`;
  return `${seconds}s`;
}
