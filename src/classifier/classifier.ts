/**
 * 事件分类器 — 纯函数，对解析后的 payload 依次求值 build / review 规则
 */

import { capabilitiesOf, type Provider } from "../providers/capabilities.js";
import type { WebhookEvent } from "../gateway/webhook-event.js";
import type { Category, ClassificationResult } from "../types/index.js";
import { evaluate, type EvaluationContext } from "./predicate.js";
import type { RuleTable } from "./rules.js";

export interface ClassifierOptions {
  rules: RuleTable;
  trackedBranches: readonly string[];
  recheckPattern: RegExp;
}

/** 评估顺序：build 优先 */
const CATEGORY_ORDER: readonly Category[] = ["build", "review"];

export const DISCARD: ClassificationResult = Object.freeze({ category: "discard", matchedRule: null });

/**
 * 对事件分类
 * @throws PayloadError payload 不是合法 JSON 对象时
 */
export function classify(
  event: WebhookEvent,
  provider: Provider,
  options: ClassifierOptions,
): ClassificationResult {
  const ctx: EvaluationContext = {
    header: event.headers,
    body: event.payload,
    trackedBranches: options.trackedBranches,
    recheckPattern: capabilitiesOf(provider).supportsCommentTrigger ? options.recheckPattern : null,
  };

  const providerRules = options.rules[provider];
  for (const category of CATEGORY_ORDER) {
    for (const rule of providerRules[category]) {
      if (evaluate(rule.when, ctx)) {
        return { category, matchedRule: rule.id };
      }
    }
  }
  return DISCARD;
}
