/**
 * WebhookEvent — 每个入站请求创建一次的不可变事件
 * 原始字节保留用于签名校验，JSON 解析延迟到首次访问 payload 时进行
 */

import { randomUUID } from "node:crypto";
import { capabilitiesOf, type Provider } from "../providers/capabilities.js";
import { PayloadError } from "../router/errors.js";

export type HeaderInput = Record<string, string | string[] | undefined>;

export interface WebhookEventInit {
  provider: Provider;
  headers: HeaderInput;
  rawBody: Buffer;
  id?: string;
  receivedAt?: string;
}

export class WebhookEvent {
  readonly id: string;
  readonly provider: Provider;
  readonly rawBody: Buffer;
  readonly receivedAt: string;
  private readonly headerMap: ReadonlyMap<string, string>;
  private parsed: { value: unknown } | null = null;

  constructor(init: WebhookEventInit) {
    this.id = init.id ?? randomUUID();
    this.provider = init.provider;
    this.rawBody = init.rawBody;
    this.receivedAt = init.receivedAt ?? new Date().toISOString();
    this.headerMap = normalizeHeaders(init.headers);
  }

  /** 读取 header（大小写不敏感） */
  header(name: string): string | undefined {
    return this.headerMap.get(name.toLowerCase());
  }

  /** 全部 header，键为小写 */
  get headers(): Readonly<Record<string, string>> {
    return Object.fromEntries(this.headerMap);
  }

  /** 提供商投递 ID，用于日志关联 */
  get deliveryId(): string | undefined {
    return this.header(capabilitiesOf(this.provider).deliveryHeader);
  }

  /** 提供商事件类型 header */
  get eventType(): string | undefined {
    return this.header(capabilitiesOf(this.provider).eventHeader);
  }

  /**
   * 解析后的 payload
   * @throws PayloadError 非 JSON 对象时
   */
  get payload(): unknown {
    if (!this.parsed) {
      this.parsed = { value: parseBody(this.rawBody) };
    }
    return this.parsed.value;
  }
}

function normalizeHeaders(headers: HeaderInput): Map<string, string> {
  const map = new Map<string, string>();
  for (const [key, value] of Object.entries(headers)) {
    if (value === undefined) continue;
    map.set(key.toLowerCase(), Array.isArray(value) ? value.join(", ") : value);
  }
  return map;
}

function parseBody(raw: Buffer): unknown {
  let value: unknown;
  try {
    value = JSON.parse(raw.toString("utf-8"));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new PayloadError("MalformedPayload", `无效的 webhook 载荷: ${reason}`);
  }
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    throw new PayloadError("MalformedPayload", "无效的 webhook 载荷: 需要 JSON 对象");
  }
  return value;
}
