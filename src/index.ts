/**
 * 服务入口 — 组装路由链路 + 启动 Fastify + 配置热加载 + 优雅关闭
 */

import pino from "pino";
import { config, reloadEnv } from "./config.js";
import { Dispatcher } from "./dispatch/dispatcher.js";
import { HttpEngineClient } from "./dispatch/engine-client.js";
import { TtlCache } from "./enrichment/cache.js";
import { Enricher } from "./enrichment/enricher.js";
import { HttpRegistryClient } from "./enrichment/registry-client.js";
import { createServer } from "./gateway/server.js";
import { WebhookRouter } from "./router/chain.js";
import { buildSettings, SettingsStore } from "./router/settings.js";
import type { RegistryRecord } from "./types/index.js";

const logger = pino({ name: "vcs-webhook-router", level: config.logLevel });

async function main() {
  logger.info("Starting webhook router...");

  const store = new SettingsStore(buildSettings(config));
  const settings = () => store.current();

  const enricher = new Enricher({
    client: new HttpRegistryClient({ baseUrl: config.registry.url, token: config.registry.token }),
    timeoutMs: config.registry.timeoutMs,
    cache: new TtlCache<string, RegistryRecord>({
      maxSize: config.registry.cacheSize,
      ttlMs: config.registry.cacheTtlMs,
    }),
    logger: logger.child({ module: "enricher" }),
  });

  const dispatcher = new Dispatcher(
    new HttpEngineClient({
      baseUrl: config.engine.url,
      token: config.engine.token,
      timeoutMs: config.engine.timeoutMs,
    }),
    config.dispatchConcurrency,
  );

  const router = new WebhookRouter({
    settings,
    enricher,
    dispatcher,
    logger: logger.child({ module: "router" }),
  });

  const server = await createServer({ router, settings, logger: { level: config.logLevel } });
  await server.listen({ port: config.port, host: config.host });
  logger.info(`Server listening on ${config.host}:${config.port}`);

  // SIGHUP 热加载：重新读取 .env 和规则文件，失败时保留旧快照
  process.on("SIGHUP", () => {
    try {
      const next = store.reload(reloadEnv());
      logger.info({ version: next.version }, "Settings reloaded");
    } catch (err) {
      logger.error({ err }, "Settings reload failed, keeping previous snapshot");
    }
  });

  // 优雅关闭
  const shutdown = async (signal: string) => {
    logger.info(`Received ${signal}, shutting down...`);
    await server.close();
    await dispatcher.drain();
    logger.info("Shutdown complete");
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err) => {
      logger.error({ err }, "Shutdown failed");
      process.exit(1);
    });
  };
  process.on("SIGTERM", () => onSignal("SIGTERM"));
  process.on("SIGINT", () => onSignal("SIGINT"));
}

main().catch((err) => {
  logger.fatal(err, "Failed to start");
  process.exit(1);
});
