/**
 * 富化器测试 — 用进程内的假注册中心验证超时、未找到和缓存行为
 */

import { describe, expect, it, vi } from "vitest";
import { TtlCache } from "../../src/enrichment/cache.js";
import { Enricher } from "../../src/enrichment/enricher.js";
import type { RegistryClient } from "../../src/enrichment/registry-client.js";
import { CancelledError, EnrichmentError, PayloadError } from "../../src/router/errors.js";
import type { RegistryRecord, RoutableClassification } from "../../src/types/index.js";
import { fixture, signedEvent, silentLogger } from "../helpers.js";

const BUILD: RoutableClassification = { category: "build", matchedRule: "github.pr-merged" };

const RECORD: RegistryRecord = { resourceId: "svc-a", targets: { build: "svc-a-build-42" } };

function mergedEvent() {
  return signedEvent("github", "pull_request", fixture("github-pr-merged"));
}

/** 直到 signal 中止才结束的查询 */
function hangingClient(): RegistryClient & { aborted: () => boolean } {
  let sawAbort = false;
  return {
    lookup: (_key, signal) =>
      new Promise((_resolve, reject) => {
        signal.addEventListener("abort", () => {
          sawAbort = true;
          reject(new Error("aborted"));
        });
      }),
    aborted: () => sawAbort,
  };
}

async function catchError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (err) {
    return err;
  }
  throw new Error("未抛出错误");
}

describe("Enricher", () => {
  it("以归一化的仓库键查询注册中心", async () => {
    const lookup = vi.fn(async (_key: string, _signal: AbortSignal) => RECORD);
    const enricher = new Enricher({ client: { lookup }, timeoutMs: 3000, logger: silentLogger });

    const record = await enricher.enrich(mergedEvent(), BUILD);

    expect(lookup).toHaveBeenCalledTimes(1);
    expect(lookup.mock.calls[0][0]).toBe("github.com/acme/svc-a");
    expect(record.resourceId).toBe("svc-a");
    expect(record.targets).toEqual({ build: "svc-a-build-42" });
    expect(record.fromCache).toBe(false);
  });

  it("记录注册中心调用耗时", async () => {
    let t = 1000;
    const enricher = new Enricher({
      client: {
        lookup: async () => {
          t += 25;
          return RECORD;
        },
      },
      timeoutMs: 3000,
      logger: silentLogger,
      now: () => t,
    });
    const record = await enricher.enrich(mergedEvent(), BUILD);
    expect(record.lookupLatencyMs).toBe(25);
  });

  it("超时即失败，并通过 signal 取消下游调用", async () => {
    const client = hangingClient();
    const enricher = new Enricher({ client, timeoutMs: 20, logger: silentLogger });

    const err = await catchError(enricher.enrich(mergedEvent(), BUILD));

    expect(err).toBeInstanceOf(EnrichmentError);
    expect(err).toMatchObject({ kind: "Timeout", statusCode: 504, stage: "enrich" });
    expect(client.aborted()).toBe(true);
  });

  it("下游忽略 signal 时仍按时失败", async () => {
    const enricher = new Enricher({
      client: { lookup: () => new Promise<RegistryRecord | null>(() => undefined) },
      timeoutMs: 20,
      logger: silentLogger,
    });
    const err = await catchError(enricher.enrich(mergedEvent(), BUILD));
    expect(err).toMatchObject({ kind: "Timeout" });
  });

  it("注册中心没有对应资源时返回 NotFound", async () => {
    const enricher = new Enricher({ client: { lookup: async () => null }, timeoutMs: 3000, logger: silentLogger });
    const err = await catchError(enricher.enrich(mergedEvent(), BUILD));
    expect(err).toMatchObject({ kind: "NotFound", statusCode: 404 });
  });

  it("传输失败返回 TransportFailure", async () => {
    const enricher = new Enricher({
      client: {
        lookup: async () => {
          throw new Error("ECONNREFUSED");
        },
      },
      timeoutMs: 3000,
      logger: silentLogger,
    });
    const err = await catchError(enricher.enrich(mergedEvent(), BUILD));
    expect(err).toMatchObject({ kind: "TransportFailure", statusCode: 502 });
    expect(err).toHaveProperty("message", "注册中心查询失败: ECONNREFUSED");
  });

  it("缺少当前类别目标不是富化错误", async () => {
    const enricher = new Enricher({
      client: { lookup: async () => ({ resourceId: "svc-a", targets: {} }) },
      timeoutMs: 3000,
      logger: silentLogger,
    });
    const record = await enricher.enrich(mergedEvent(), { category: "review", matchedRule: "x" });
    expect(record.targets).toEqual({});
  });

  it("调用方取消时返回 CancelledError", async () => {
    const controller = new AbortController();
    const enricher = new Enricher({ client: hangingClient(), timeoutMs: 3000, logger: silentLogger });
    const pending = catchError(enricher.enrich(mergedEvent(), BUILD, controller.signal));
    controller.abort();
    expect(await pending).toBeInstanceOf(CancelledError);
  });

  it("payload 中没有仓库地址时返回 PayloadError", async () => {
    const enricher = new Enricher({ client: { lookup: async () => RECORD }, timeoutMs: 3000, logger: silentLogger });
    const event = signedEvent("github", "pull_request", { action: "closed" });
    const err = await catchError(enricher.enrich(event, BUILD));
    expect(err).toBeInstanceOf(PayloadError);
    expect(err).toMatchObject({ kind: "MissingField", stage: "enrich" });
  });

  it("命中缓存时不再查询注册中心", async () => {
    const lookup = vi.fn(async () => RECORD);
    const enricher = new Enricher({
      client: { lookup },
      timeoutMs: 3000,
      cache: new TtlCache<string, RegistryRecord>({ maxSize: 10, ttlMs: 60_000 }),
      logger: silentLogger,
    });

    await enricher.enrich(mergedEvent(), BUILD);
    const second = await enricher.enrich(mergedEvent(), BUILD);

    expect(lookup).toHaveBeenCalledTimes(1);
    expect(second).toEqual({ ...RECORD, lookupLatencyMs: 0, fromCache: true });
  });

  it("未找到的结果不缓存", async () => {
    const lookup = vi.fn(async (): Promise<RegistryRecord | null> => null);
    const enricher = new Enricher({
      client: { lookup },
      timeoutMs: 3000,
      cache: new TtlCache<string, RegistryRecord>({ maxSize: 10, ttlMs: 60_000 }),
      logger: silentLogger,
    });

    await catchError(enricher.enrich(mergedEvent(), BUILD));
    await catchError(enricher.enrich(mergedEvent(), BUILD));
    expect(lookup).toHaveBeenCalledTimes(2);
  });
});
