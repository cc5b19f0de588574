/**
 * 路由链路 — validate → classify → enrich → bind → resolve → dispatch
 * 六个阶段严格顺序执行，任一阶段失败即终止，不会发生部分派发
 */

import pino, { type Logger } from "pino";
import { bind as defaultBind } from "../binding/binder.js";
import { classify as defaultClassify } from "../classifier/classifier.js";
import { conformsToConvention } from "../dispatch/target-name.js";
import { resolveDispatch } from "../dispatch/template.js";
import type { Dispatcher } from "../dispatch/dispatcher.js";
import type { Enricher } from "../enrichment/enricher.js";
import { validateSignature as defaultValidate } from "../gateway/signature.js";
import type { WebhookEvent } from "../gateway/webhook-event.js";
import {
  isRoutable,
  type ClassificationResult,
  type DispatchAck,
  type DispatchRequest,
  type EnrichmentRecord,
  type RoutableClassification,
} from "../types/index.js";
import { CancelledError, isRouterError, type StageName } from "./errors.js";
import type { RouterSettings } from "./settings.js";

export type RouteOutcome =
  | { status: "discarded"; classification: ClassificationResult }
  | {
      status: "dispatched";
      classification: RoutableClassification;
      enrichment: EnrichmentRecord;
      request: DispatchRequest;
      ack: DispatchAck;
    };

export interface WebhookRouterDeps {
  /** 每个事件开始时取一次快照 */
  settings: () => RouterSettings;
  enricher: Pick<Enricher, "enrich">;
  dispatcher: Pick<Dispatcher, "dispatch">;
  validate?: typeof defaultValidate;
  classify?: typeof defaultClassify;
  bind?: typeof defaultBind;
  logger?: Logger;
}

export class WebhookRouter {
  private readonly logger: Logger;
  private readonly validate: typeof defaultValidate;
  private readonly classify: typeof defaultClassify;
  private readonly bind: typeof defaultBind;

  constructor(private readonly deps: WebhookRouterDeps) {
    this.logger = deps.logger ?? pino({ name: "webhook-router" });
    this.validate = deps.validate ?? defaultValidate;
    this.classify = deps.classify ?? defaultClassify;
    this.bind = deps.bind ?? defaultBind;
  }

  /**
   * 处理单个事件
   * @throws RouterError 任一阶段失败
   */
  async route(event: WebhookEvent, signal?: AbortSignal): Promise<RouteOutcome> {
    const settings = this.deps.settings();
    const log = this.logger.child({
      eventId: event.id,
      provider: event.provider,
      deliveryId: event.deliveryId,
      settingsVersion: settings.version,
    });

    await this.stage(log, "validate", signal, () => this.validate(event, settings.secrets[event.provider]));

    const classification = await this.stage(log, "classify", signal, () =>
      this.classify(event, event.provider, settings),
    );
    if (!isRoutable(classification)) {
      log.info({ stage: "classify", category: "discard", eventType: event.eventType }, "事件已忽略");
      return { status: "discarded", classification };
    }
    const routed = log.child({ category: classification.category, rule: classification.matchedRule });

    const enrichment = await this.stage(routed, "enrich", signal, () =>
      this.deps.enricher.enrich(event, classification, signal),
    );
    const parameters = await this.stage(routed, "bind", signal, () => this.bind(event, enrichment, classification));
    const request = await this.stage(routed, "resolve", signal, () =>
      resolveDispatch(parameters, classification, { targetNamePolicy: settings.targetNamePolicy }),
    );
    if (settings.targetNamePolicy === "warn" && !conformsToConvention(request.target, classification.category)) {
      routed.warn({ stage: "resolve", target: request.target }, "派发目标名称不符合命名约定");
    }

    const ack = await this.stage(routed, "dispatch", signal, () =>
      this.deps.dispatcher.dispatch(request, signal),
    );
    routed.info(
      { target: request.target, resourceId: enrichment.resourceId, token: ack.token, lookupLatencyMs: enrichment.lookupLatencyMs },
      "事件已派发",
    );
    return { status: "dispatched", classification, enrichment, request, ack };
  }

  /** 执行单个阶段并记录耗时；进入阶段前检查取消 */
  private async stage<T>(
    log: Logger,
    name: StageName,
    signal: AbortSignal | undefined,
    fn: () => T | Promise<T>,
  ): Promise<T> {
    if (signal?.aborted) {
      log.warn({ stage: name, errorKind: "Cancelled" }, "连接已断开，终止处理");
      throw new CancelledError(name);
    }
    const started = Date.now();
    try {
      const result = await fn();
      log.debug({ stage: name, durationMs: Date.now() - started }, "阶段完成");
      return result;
    } catch (err) {
      const durationMs = Date.now() - started;
      if (isRouterError(err)) {
        log.warn({ stage: name, errorKind: err.kind, durationMs, err: err.message }, "阶段失败");
      } else {
        log.error({ stage: name, errorKind: "Internal", durationMs, err }, "阶段异常");
      }
      throw err;
    }
  }
}
