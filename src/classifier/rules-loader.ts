/**
 * 规则文件加载 — 从 JSON 文件读取分类规则，按提供商 / 类别覆盖默认规则
 *
 * 文件格式:
 *   { "gitlab": { "review": [{ "id": "gitlab.custom", "when": { ... } }] } }
 * 未出现的提供商或类别沿用默认规则。任何校验错误都会抛出，不做部分加载。
 */

import fs from "node:fs";
import { capabilitiesOf, isProvider, type Provider } from "../providers/capabilities.js";
import { isRecord } from "../lib/payload.js";
import type { Category } from "../types/index.js";
import { parsePredicate, usesRecheck } from "./predicate.js";
import { DEFAULT_RULES, type ProviderRules, type Rule, type RuleTable } from "./rules.js";

const CATEGORIES: readonly Category[] = ["build", "review"];

/** 读取规则文件；未指定路径时返回默认规则 */
export function loadRules(filePath?: string): RuleTable {
  if (!filePath) return DEFAULT_RULES;
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(`无法读取规则文件 ${filePath}: ${reason}`);
  }
  return parseRules(raw, DEFAULT_RULES);
}

/** 校验规则文件内容并与基础规则合并 */
export function parseRules(raw: unknown, base: RuleTable): RuleTable {
  if (!isRecord(raw)) {
    throw new Error("规则文件必须是 JSON 对象");
  }

  const merged: Record<Provider, ProviderRules> = { ...base };
  for (const [key, value] of Object.entries(raw)) {
    if (!isProvider(key)) {
      throw new Error(`未知的提供商: ${key}`);
    }
    merged[key] = parseProviderRules(key, value, base[key]);
  }
  return merged;
}

function parseProviderRules(provider: Provider, raw: unknown, fallback: ProviderRules): ProviderRules {
  if (!isRecord(raw)) {
    throw new Error(`${provider}: 规则必须是对象`);
  }
  const result: Record<Category, readonly Rule[]> = { ...fallback };
  const seen = new Set<string>();

  for (const key of Object.keys(raw)) {
    if (!CATEGORIES.some((c) => c === key)) {
      throw new Error(`${provider}: 未知的类别 ${key}`);
    }
  }

  for (const category of CATEGORIES) {
    const list = raw[category];
    if (list === undefined) continue;
    if (!Array.isArray(list)) {
      throw new Error(`${provider}.${category}: 需要规则数组`);
    }
    result[category] = list.map((entry, i) => {
      const where = `${provider}.${category}[${i}]`;
      const rule = parseRule(entry, where);
      if (seen.has(rule.id)) {
        throw new Error(`${where}: 规则 ID 重复 "${rule.id}"`);
      }
      seen.add(rule.id);
      if (usesRecheck(rule.when) && !capabilitiesOf(provider).supportsCommentTrigger) {
        throw new Error(`${where}: ${provider} 不支持评论触发，不能使用 recheckComment`);
      }
      return rule;
    });
  }
  return result;
}

function parseRule(raw: unknown, where: string): Rule {
  const id = isRecord(raw) ? raw.id : undefined;
  if (typeof id !== "string" || id.trim() === "") {
    throw new Error(`${where}: 规则需要非空的 id`);
  }
  return { id, when: parsePredicate(isRecord(raw) ? raw.when : undefined, `${where}.when`) };
}
