import { loadConfig } from "../config/loader.js";
import { resolveDatabasePath } from "../config/paths.js";
import type { AmicusConfig } from "../config/types.js";
import { createLogger, type Logger } from "../logging/logger.js";
import type { PlatformAdapter } from "../channels/adapter.js";
import { ChannelRegistry } from "../channels/registry.js";
import { createAdapter } from "../channels/factory.js";
import type { DispatchLoop } from "../dispatch/loop.js";
import { StoreDB } from "../store/db.js";
import { SqliteConversationStore } from "../store/sqlite-store.js";
import { buildEngine } from "./engine.js";
import { HealthServer } from "./health.js";

export interface GatewayContext {
  config: AmicusConfig;
  logger: Logger;
  store: SqliteConversationStore;
  registry: ChannelRegistry;
  loop: DispatchLoop;
  healthServer: HealthServer | null;
  abortController: AbortController;
  shutdown(): Promise<void>;
}

const SHUTDOWN_TIMEOUT_MS = 15_000;

/** Wires adapter events into the loop and the log, tagged by channel id. */
function wireAdapter(id: string, adapter: PlatformAdapter, loop: DispatchLoop, logger: Logger): void {
  const log = logger.child({ channel: id, platform: adapter.platform });
  adapter.events.on("message", (msg) => {
    loop.handleInbound(msg).catch((err: unknown) => {
      log.error({ err, from: msg.platformUserId }, "Inbound message failed");
    });
  });
  adapter.events.on("connected", () => log.info("Channel connected"));
  adapter.events.on("disconnected", (reason) => log.warn({ reason }, "Channel disconnected"));
  adapter.events.on("error", (err) => log.error({ err }, "Channel error"));
}

/** Starts every enabled channel, at most one per platform. Failed starts are logged and left out. */
async function startChannels(
  config: AmicusConfig,
  registry: ChannelRegistry,
  loop: DispatchLoop,
  logger: Logger,
  signal: AbortSignal,
): Promise<void> {
  const enabled = Object.entries(config.channels).filter(([id, channel]) => {
    if (!channel.enabled) logger.info({ channel: id }, "Channel disabled");
    return channel.enabled;
  });

  for (const [id, channelConfig] of enabled) {
    const adapter = createAdapter(channelConfig);
    if (registry.has(adapter.platform)) {
      logger.warn({ channel: id, platform: adapter.platform }, "Platform already has a channel, skipping");
      continue;
    }
    wireAdapter(id, adapter, loop, logger);
    try {
      await adapter.start(signal);
    } catch (err) {
      logger.error({ err, channel: id }, "Channel failed to start");
      continue;
    }
    registry.register(adapter);
  }
  logger.info({ platforms: registry.list().map((a) => a.platform) }, "Channels ready");
}

export async function startGateway(configPath?: string): Promise<GatewayContext> {
  const config = loadConfig(configPath);
  const logger = createLogger(config.logging);

  const dbPath = resolveDatabasePath();
  const store = new SqliteConversationStore(new StoreDB(dbPath), config.retention);
  logger.info({ dbPath }, "Conversation store open");

  const registry = new ChannelRegistry();
  const { loop, generator } = buildEngine(config, { store, registry, logger });
  logger.info({ generator: generator.name }, "Engine built");

  const healthServer = config.gateway.enabled
    ? new HealthServer(registry, loop, config.gateway.port, config.gateway.hostname)
    : null;
  if (healthServer) {
    await healthServer.start();
    logger.info({ host: config.gateway.hostname, port: config.gateway.port }, "Health server listening");
  }

  const abortController = new AbortController();
  await startChannels(config, registry, loop, logger, abortController.signal);
  loop.start();

  let stopping: Promise<void> | null = null;
  const teardown = async (): Promise<void> => {
    const deadline = setTimeout(() => {
      logger.warn({ timeoutMs: SHUTDOWN_TIMEOUT_MS }, "Shutdown stalled, exiting");
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);
    deadline.unref();

    // Stop producing work before closing the store it writes to
    loop.stop();
    abortController.abort();
    const adapters = registry.list();
    const results = await Promise.allSettled(adapters.map((a) => a.stop()));
    results.forEach((result, i) => {
      if (result.status === "rejected") {
        logger.error({ err: result.reason, platform: adapters[i]?.platform }, "Channel stop failed");
      }
    });
    await healthServer?.stop();
    store.close();

    clearTimeout(deadline);
    logger.info("Stopped");
  };
  const shutdown = (): Promise<void> => {
    stopping ??= teardown();
    return stopping;
  };

  const onSignal = (signal: NodeJS.Signals) => {
    logger.info({ signal }, "Shutting down");
    shutdown().catch((err: unknown) => {
      logger.error({ err }, "Shutdown failed");
    });
  };
  process.once("SIGTERM", onSignal);
  process.once("SIGINT", onSignal);

  return { config, logger, store, registry, loop, healthServer, abortController, shutdown };
}
