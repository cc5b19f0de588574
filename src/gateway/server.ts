/**
 * Gateway HTTP 服务 — Fastify 实例，每个提供商一个 webhook 入口
 */

import Fastify, { type FastifyReply, type FastifyServerOptions } from "fastify";
import { PROVIDERS, type Provider } from "../providers/capabilities.js";
import { isRouterError } from "../router/errors.js";
import type { RouteOutcome, WebhookRouter } from "../router/chain.js";
import type { RouterSettings } from "../router/settings.js";
import { WebhookEvent } from "./webhook-event.js";

/** 服务依赖 */
export interface ServerDeps {
  router: Pick<WebhookRouter, "route">;
  settings: () => RouterSettings;
  /** Fastify logger 配置，测试中传 false */
  logger?: FastifyServerOptions["logger"];
  /** 请求体上限（字节） */
  bodyLimit?: number;
}

/** 服务状态信息 */
interface ServerStatus {
  startedAt: number;
  receivedEvents: number;
  dispatched: number;
  discarded: number;
  failed: number;
  lastEventAt: string | null;
}

/**
 * 创建 Fastify 服务实例
 */
export async function createServer(deps: ServerDeps) {
  const { router, settings } = deps;
  const app = Fastify({ logger: deps.logger ?? true, bodyLimit: deps.bodyLimit ?? 1024 * 1024 });

  // 保留原始字节用于签名校验，JSON 解析推迟到分类阶段
  app.removeAllContentTypeParsers();
  app.addContentTypeParser("*", { parseAs: "buffer" }, (_request, body, done) => {
    done(null, body);
  });

  // 内部统计
  const status: ServerStatus = {
    startedAt: Date.now(),
    receivedEvents: 0,
    dispatched: 0,
    discarded: 0,
    failed: 0,
    lastEventAt: null,
  };

  function outcomeBody(event: WebhookEvent, outcome: RouteOutcome) {
    if (outcome.status === "discarded") {
      status.discarded++;
      return { ok: true, ignored: true, eventId: event.id };
    }
    status.dispatched++;
    return {
      ok: true,
      dispatched: true,
      eventId: event.id,
      category: outcome.classification.category,
      rule: outcome.classification.matchedRule,
      target: outcome.request.target,
      token: outcome.ack.token,
    };
  }

  // ========== Webhook 路由 ==========

  for (const provider of PROVIDERS) {
    app.post(`/webhook/${provider}`, async (request, reply) => {
      const rawBody = Buffer.isBuffer(request.body) ? request.body : Buffer.alloc(0);
      const event = new WebhookEvent({ provider, headers: request.headers, rawBody });
      status.receivedEvents++;
      status.lastEventAt = event.receivedAt;

      const controller = cancelOnDisconnect(reply);
      try {
        const outcome = await router.route(event, controller.signal);
        return reply.code(200).send(outcomeBody(event, outcome));
      } catch (err) {
        status.failed++;
        return sendError(reply, provider, event, err);
      } finally {
        controller.release();
      }
    });
  }

  // ========== 基础路由 ==========

  /** 健康检查 */
  app.get("/health", async (_request, reply) => {
    return reply.code(200).send({ status: "ok" });
  });

  /** 服务状态 */
  app.get("/status", async (_request, reply) => {
    const current = settings();
    return reply.code(200).send({
      uptime: Math.floor((Date.now() - status.startedAt) / 1000),
      receivedEvents: status.receivedEvents,
      dispatched: status.dispatched,
      discarded: status.discarded,
      failed: status.failed,
      lastEventAt: status.lastEventAt,
      settings: { version: current.version, loadedAt: current.loadedAt },
    });
  });

  return app;
}

/** 把路由错误映射为 HTTP 响应 */
function sendError(reply: FastifyReply, provider: Provider, event: WebhookEvent, err: unknown) {
  if (isRouterError(err)) {
    reply.log.warn({ provider, eventId: event.id, stage: err.stage, kind: err.kind }, err.message);
    return reply.code(err.statusCode).send({
      ok: false,
      eventId: event.id,
      stage: err.stage,
      kind: err.kind,
      error: err.message,
    });
  }
  reply.log.error({ provider, eventId: event.id, err }, "webhook 处理失败");
  return reply.code(500).send({ ok: false, eventId: event.id, kind: "Internal", error: "内部错误" });
}

/** VCS 在响应写出前断开连接时中止链路 */
function cancelOnDisconnect(reply: FastifyReply) {
  const controller = new AbortController();
  const onClose = () => {
    if (!reply.raw.writableFinished) controller.abort(new Error("client disconnected"));
  };
  reply.raw.once("close", onClose);
  return {
    signal: controller.signal,
    release: () => reply.raw.off("close", onClose),
  };
}
