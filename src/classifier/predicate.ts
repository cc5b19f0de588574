/**
 * 过滤表达式 — 可序列化为 JSON 的布尔表达式树，对 header / body 求值
 *
 * 路径以 "header." 或 "body." 开头，header 名称统一为小写：
 *   { "eq": { "path": "header.x-github-event", "value": "pull_request" } }
 *   { "trackedBranch": "body.pull_request.base.ref" }
 */

import { getPath, isRecord } from "../lib/payload.js";

export type Scalar = string | number | boolean | null;

export type Predicate =
  | { all: Predicate[] }
  | { any: Predicate[] }
  | { not: Predicate }
  | { eq: { path: string; value: Scalar } }
  | { in: { path: string; values: Scalar[] } }
  | { exists: string }
  | { matches: { path: string; pattern: string } }
  | { trackedBranch: string }
  | { recheckComment: string };

/** 求值上下文 */
export interface EvaluationContext {
  header: Readonly<Record<string, string>>;
  body: unknown;
  trackedBranches: readonly string[];
  /** 为 null 表示当前提供商不支持评论触发 */
  recheckPattern: RegExp | null;
}

export function evaluate(predicate: Predicate, ctx: EvaluationContext): boolean {
  if ("all" in predicate) return predicate.all.every((p) => evaluate(p, ctx));
  if ("any" in predicate) return predicate.any.some((p) => evaluate(p, ctx));
  if ("not" in predicate) return !evaluate(predicate.not, ctx);
  if ("eq" in predicate) return resolve(predicate.eq.path, ctx) === predicate.eq.value;
  if ("in" in predicate) {
    const value = resolve(predicate.in.path, ctx);
    return predicate.in.values.some((v) => v === value);
  }
  if ("exists" in predicate) {
    const value = resolve(predicate.exists, ctx);
    return value !== undefined && value !== null;
  }
  if ("matches" in predicate) {
    const value = resolve(predicate.matches.path, ctx);
    return typeof value === "string" && new RegExp(predicate.matches.pattern).test(value);
  }
  if ("trackedBranch" in predicate) {
    const value = resolve(predicate.trackedBranch, ctx);
    return typeof value === "string" && isTrackedBranch(value, ctx.trackedBranches);
  }
  const value = resolve(predicate.recheckComment, ctx);
  if (ctx.recheckPattern === null || typeof value !== "string") return false;
  // 复制一份，避免带 g 标志时 lastIndex 在调用之间残留
  return new RegExp(ctx.recheckPattern.source, ctx.recheckPattern.flags).test(value);
}

function resolve(path: string, ctx: EvaluationContext): unknown {
  const dot = path.indexOf(".");
  const scope = dot === -1 ? path : path.slice(0, dot);
  const rest = dot === -1 ? "" : path.slice(dot + 1);
  if (scope === "header") {
    return rest ? ctx.header[rest.toLowerCase()] : undefined;
  }
  if (scope === "body") {
    return rest ? getPath(ctx.body, rest) : ctx.body;
  }
  return undefined;
}

/**
 * 判断分支是否被跟踪
 * 支持精确匹配和 "release/*" 形式的前缀匹配，refs/heads/ 前缀会被忽略
 */
export function isTrackedBranch(ref: string, tracked: readonly string[]): boolean {
  const branch = ref.replace(/^refs\/heads\//, "");
  return tracked.some((pattern) =>
    pattern.endsWith("*") ? branch.startsWith(pattern.slice(0, -1)) : branch === pattern,
  );
}

/** 表达式中是否使用了 recheckComment */
export function usesRecheck(predicate: Predicate): boolean {
  if ("all" in predicate) return predicate.all.some(usesRecheck);
  if ("any" in predicate) return predicate.any.some(usesRecheck);
  if ("not" in predicate) return usesRecheck(predicate.not);
  return "recheckComment" in predicate;
}

// ---------- 解析 & 校验 ----------

/**
 * 把不可信的 JSON 解析为 Predicate
 * @param where 出错时用于定位的路径描述
 * @throws Error 结构非法或正则无法编译时
 */
export function parsePredicate(raw: unknown, where: string): Predicate {
  if (!isRecord(raw)) {
    throw new Error(`${where}: 表达式必须是对象`);
  }
  const keys = Object.keys(raw);
  if (keys.length !== 1) {
    throw new Error(`${where}: 表达式必须只有一个操作符，实际为 [${keys.join(", ")}]`);
  }
  const op = keys[0];
  const arg = raw[op];
  const at = `${where}.${op}`;

  switch (op) {
    case "all":
    case "any": {
      if (!Array.isArray(arg) || arg.length === 0) {
        throw new Error(`${at}: 需要非空数组`);
      }
      const children = arg.map((child, i) => parsePredicate(child, `${at}[${i}]`));
      return op === "all" ? { all: children } : { any: children };
    }
    case "not":
      return { not: parsePredicate(arg, at) };
    case "eq": {
      const path = requirePath(isRecord(arg) ? arg.path : undefined, at);
      const value = isRecord(arg) ? arg.value : undefined;
      if (!isScalar(value)) throw new Error(`${at}.value: 需要标量值`);
      return { eq: { path, value } };
    }
    case "in": {
      const path = requirePath(isRecord(arg) ? arg.path : undefined, at);
      const values = isRecord(arg) ? arg.values : undefined;
      if (!Array.isArray(values) || !values.every(isScalar)) {
        throw new Error(`${at}.values: 需要标量数组`);
      }
      return { in: { path, values } };
    }
    case "exists":
      return { exists: requirePath(arg, at) };
    case "matches": {
      const path = requirePath(isRecord(arg) ? arg.path : undefined, at);
      const pattern = isRecord(arg) ? arg.pattern : undefined;
      if (typeof pattern !== "string") throw new Error(`${at}.pattern: 需要字符串`);
      try {
        new RegExp(pattern);
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new Error(`${at}.pattern: 无效的正则 (${reason})`);
      }
      return { matches: { path, pattern } };
    }
    case "trackedBranch":
      return { trackedBranch: requirePath(arg, at) };
    case "recheckComment":
      return { recheckComment: requirePath(arg, at) };
    default:
      throw new Error(`${where}: 未知操作符 "${op}"`);
  }
}

function requirePath(value: unknown, where: string): string {
  if (typeof value !== "string" || !/^(header|body)(\.[^.]+)+$/.test(value)) {
    throw new Error(`${where}: 路径必须以 header. 或 body. 开头`);
  }
  return value;
}

function isScalar(value: unknown): value is Scalar {
  return (
    value === null || typeof value === "string" || typeof value === "number" || typeof value === "boolean"
  );
}
