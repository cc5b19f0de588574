/**
 * 执行引擎客户端 — POST {baseUrl}/api/v1/dispatches
 * 引擎受理即返回，不等待执行完成
 */

import { fetch, type Dispatcher } from "undici";
import { createDeadline } from "../lib/deadline.js";
import { isRecord } from "../lib/payload.js";
import { CancelledError, DispatchError } from "../router/errors.js";
import type { DispatchAck, DispatchRequest } from "../types/index.js";

export interface EngineClient {
  /**
   * 提交派发请求
   * @throws DispatchError 引擎拒绝或不可达
   * @throws CancelledError 调用方取消
   */
  submit(request: DispatchRequest, signal?: AbortSignal): Promise<DispatchAck>;
}

export interface HttpEngineClientOptions {
  baseUrl: string;
  token?: string;
  timeoutMs: number;
  dispatcher?: Dispatcher;
  now?: () => Date;
}

export class HttpEngineClient implements EngineClient {
  private readonly baseUrl: string;

  constructor(private readonly options: HttpEngineClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
  }

  async submit(request: DispatchRequest, signal?: AbortSignal): Promise<DispatchAck> {
    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (this.options.token) {
      headers.Authorization = `Bearer ${this.options.token}`;
    }

    const deadline = createDeadline(this.options.timeoutMs, signal);
    try {
      const resp = await fetch(`${this.baseUrl}/api/v1/dispatches`, {
        method: "POST",
        headers,
        body: JSON.stringify({
          target: request.target,
          parameters: request.parameters,
          labels: request.labels,
        }),
        signal: deadline.signal,
        dispatcher: this.options.dispatcher,
      });

      const text = await resp.text();
      if (resp.status >= 400 && resp.status < 500) {
        throw new DispatchError("Rejected", `执行引擎拒绝派发: HTTP ${resp.status} ${text.slice(0, 200)}`, {
          engineStatus: resp.status,
        });
      }
      if (!resp.ok) {
        throw new DispatchError("Unreachable", `执行引擎响应异常: HTTP ${resp.status}`, {
          engineStatus: resp.status,
        });
      }

      return {
        token: parseAckToken(text),
        acceptedAt: (this.options.now?.() ?? new Date()).toISOString(),
      };
    } catch (err) {
      if (err instanceof DispatchError) throw err;
      if (deadline.cancelled()) throw new CancelledError("dispatch");
      const reason = deadline.expired()
        ? `超时（${this.options.timeoutMs}ms）`
        : err instanceof Error
          ? err.message
          : String(err);
      throw new DispatchError("Unreachable", `执行引擎不可达: ${reason}`, { cause: err });
    } finally {
      deadline.dispose();
    }
  }
}

/** 回执 token 取 token 字段，兼容 id 字段 */
function parseAckToken(text: string): string {
  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch {
    throw new DispatchError("Rejected", "执行引擎回执不是 JSON");
  }
  const token = isRecord(body) ? (body.token ?? body.id) : undefined;
  if (typeof token !== "string" || token === "") {
    throw new DispatchError("Rejected", "执行引擎回执缺少 token");
  }
  return token;
}
