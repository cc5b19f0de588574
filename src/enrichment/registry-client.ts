/**
 * 资源注册中心客户端 — 基于 undici fetch
 *
 * GET {baseUrl}/api/v1/resources?repository=<key>
 *   200 { resourceId, targets: { build?, review? } } -> 记录
 *   404                                             -> null（未找到）
 *   其它状态 / 格式错误 / 网络错误                    -> 抛出
 */

import { fetch, type Dispatcher } from "undici";
import { isRecord } from "../lib/payload.js";
import type { RegistryRecord, TargetMap } from "../types/index.js";

export interface RegistryClient {
  /**
   * 按仓库键查询资源
   * @param signal 截止时间 / 取消令牌，实现必须响应
   */
  lookup(repositoryKey: string, signal: AbortSignal): Promise<RegistryRecord | null>;
}

export interface HttpRegistryClientOptions {
  baseUrl: string;
  token?: string;
  /** 自定义 undici Dispatcher（代理、连接池或测试用 MockAgent） */
  dispatcher?: Dispatcher;
}

export class HttpRegistryClient implements RegistryClient {
  private readonly baseUrl: string;

  constructor(private readonly options: HttpRegistryClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
  }

  async lookup(repositoryKey: string, signal: AbortSignal): Promise<RegistryRecord | null> {
    const url = `${this.baseUrl}/api/v1/resources?${new URLSearchParams({ repository: repositoryKey })}`;
    const headers: Record<string, string> = { Accept: "application/json" };
    if (this.options.token) {
      headers.Authorization = `Bearer ${this.options.token}`;
    }

    const resp = await fetch(url, { method: "GET", headers, signal, dispatcher: this.options.dispatcher });
    if (resp.status === 404) {
      await resp.body?.cancel();
      return null;
    }
    if (!resp.ok) {
      const body = await resp.text();
      throw new Error(`注册中心响应异常: HTTP ${resp.status} ${body.slice(0, 200)}`);
    }
    return parseRegistryRecord(await resp.json());
  }
}

/**
 * 校验注册中心响应
 * @throws Error 结构不符合约定时
 */
export function parseRegistryRecord(raw: unknown): RegistryRecord {
  if (!isRecord(raw)) {
    throw new Error("注册中心响应不是 JSON 对象");
  }
  const resourceId = raw.resourceId;
  if (typeof resourceId !== "string" || resourceId === "") {
    throw new Error("注册中心响应缺少 resourceId");
  }
  const targets: TargetMap = {};
  const rawTargets = raw.targets ?? {};
  if (!isRecord(rawTargets)) {
    throw new Error("注册中心响应的 targets 不是对象");
  }
  for (const category of ["build", "review"] as const) {
    const value = rawTargets[category];
    if (value === undefined || value === null) continue;
    if (typeof value !== "string") {
      throw new Error(`注册中心响应的 targets.${category} 不是字符串`);
    }
    // 空字符串等同于未配置
    if (value.trim() !== "") targets[category] = value;
  }
  return { resourceId, targets };
}
