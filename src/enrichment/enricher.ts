/**
 * 富化器 — 按仓库键查询资源注册中心，得到资源 ID 和各类别的派发目标
 * 超时即失败（fail-closed），绝不使用猜测的目标继续派发
 */

import pino, { type Logger } from "pino";
import type { WebhookEvent } from "../gateway/webhook-event.js";
import { repositoryUrlOf } from "../binding/extractors.js";
import { abortable, createDeadline } from "../lib/deadline.js";
import { CancelledError, EnrichmentError, PayloadError } from "../router/errors.js";
import type { EnrichmentRecord, RegistryRecord, RoutableClassification } from "../types/index.js";
import type { TtlCache } from "./cache.js";
import type { RegistryClient } from "./registry-client.js";
import { normalizeRepoKey } from "./repo-key.js";

export interface EnricherOptions {
  client: RegistryClient;
  /** 单次查询上限（毫秒） */
  timeoutMs: number;
  cache?: TtlCache<string, RegistryRecord>;
  logger?: Logger;
  now?: () => number;
}

export class Enricher {
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(private readonly options: EnricherOptions) {
    this.logger = options.logger ?? pino({ name: "enricher" });
    this.now = options.now ?? Date.now;
  }

  /**
   * 富化事件
   * @throws PayloadError 事件中找不到仓库地址
   * @throws EnrichmentError 超时 / 未找到 / 传输失败
   * @throws CancelledError 调用方取消
   */
  async enrich(
    event: WebhookEvent,
    classification: RoutableClassification,
    signal?: AbortSignal,
  ): Promise<EnrichmentRecord> {
    const repositoryUrl = repositoryUrlOf(event);
    if (!repositoryUrl) {
      throw new PayloadError("MissingField", "payload 中缺少仓库地址", "enrich");
    }
    const key = normalizeRepoKey(repositoryUrl);

    const cached = this.options.cache?.get(key);
    if (cached) {
      this.logger.debug({ eventId: event.id, repositoryKey: key }, "注册中心缓存命中");
      return { resourceId: cached.resourceId, targets: { ...cached.targets }, lookupLatencyMs: 0, fromCache: true };
    }

    if (signal?.aborted) {
      throw new CancelledError("enrich");
    }

    const started = this.now();
    const deadline = createDeadline(this.options.timeoutMs, signal);
    let record: RegistryRecord | null;
    try {
      record = await abortable(this.options.client.lookup(key, deadline.signal), deadline.signal);
    } catch (err) {
      if (deadline.expired()) {
        throw new EnrichmentError(
          "Timeout",
          `注册中心查询超时（${this.options.timeoutMs}ms）: ${key}`,
          { cause: err },
        );
      }
      if (deadline.cancelled()) {
        throw new CancelledError("enrich");
      }
      const reason = err instanceof Error ? err.message : String(err);
      throw new EnrichmentError("TransportFailure", `注册中心查询失败: ${reason}`, { cause: err });
    } finally {
      deadline.dispose();
    }

    const lookupLatencyMs = this.now() - started;
    if (!record) {
      throw new EnrichmentError("NotFound", `注册中心中没有仓库 ${key} 对应的资源`);
    }

    this.options.cache?.set(key, record);
    this.logger.debug(
      { eventId: event.id, repositoryKey: key, resourceId: record.resourceId, category: classification.category, lookupLatencyMs },
      "注册中心查询完成",
    );
    return { resourceId: record.resourceId, targets: { ...record.targets }, lookupLatencyMs, fromCache: false };
  }
}
