/**
 * 参数绑定 — 合并 payload 字段（body.*）与富化字段（extensions.*）为扁平参数集
 * extensions 先写入；任何重复写入都会抛出，payload 永远不能覆盖富化数据
 */

import type { WebhookEvent } from "../gateway/webhook-event.js";
import { PayloadError } from "../router/errors.js";
import type { Category, EnrichmentRecord, ParameterSet, RoutableClassification } from "../types/index.js";
import { extractBodyFields, REQUIRED_BODY_FIELDS } from "./extractors.js";

export const BODY_PREFIX = "body.";
export const EXTENSIONS_PREFIX = "extensions.";

/** 参数名常量 */
export const Param = {
  resourceId: `${EXTENSIONS_PREFIX}resourceId`,
  target: `${EXTENSIONS_PREFIX}target`,
  targetFor: (category: Category) => `${EXTENSIONS_PREFIX}targets.${category}`,
  body: (field: string) => `${BODY_PREFIX}${field}`,
} as const;

/** 只允许新增、不允许覆盖的参数构建器 */
export class ParameterSetBuilder {
  private readonly entries = new Map<string, string>();

  constructor(initial?: ParameterSet) {
    if (initial) {
      for (const [key, value] of Object.entries(initial)) this.set(key, value);
    }
  }

  /** @throws Error 参数已存在时 */
  set(name: string, value: string): this {
    if (this.entries.has(name)) {
      throw new Error(`参数 ${name} 已存在，禁止覆盖`);
    }
    this.entries.set(name, value);
    return this;
  }

  build(): ParameterSet {
    return Object.freeze(Object.fromEntries(this.entries));
  }
}

/**
 * 绑定参数
 * @throws PayloadError 缺少必需字段时
 */
export function bind(
  event: WebhookEvent,
  enrichment: EnrichmentRecord,
  classification: RoutableClassification,
): ParameterSet {
  const builder = new ParameterSetBuilder();

  builder.set(Param.resourceId, enrichment.resourceId);
  for (const category of ["build", "review"] as const) {
    const target = enrichment.targets[category];
    if (target !== undefined) builder.set(Param.targetFor(category), target);
  }

  const fields = extractBodyFields(event, classification.category);
  for (const required of REQUIRED_BODY_FIELDS) {
    if (fields[required] === undefined) {
      throw new PayloadError("MissingField", `payload 中缺少必需字段 ${required}`, "bind");
    }
  }
  for (const [name, value] of Object.entries(fields)) {
    if (value !== undefined) builder.set(Param.body(name), value);
  }

  return builder.build();
}
