/**
 * payload 读取工具 — 按点分路径安全访问未知结构的 JSON
 */

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** 按 "a.b.c" 路径读取，任一层缺失返回 undefined */
export function getPath(root: unknown, path: string): unknown {
  let current: unknown = root;
  for (const segment of path.split(".")) {
    if (!isRecord(current)) return undefined;
    current = current[segment];
  }
  return current;
}

/** 读取字符串字段，数字会转为字符串，空字符串视为缺失 */
export function getString(root: unknown, path: string): string | undefined {
  const value = getPath(root, path);
  if (typeof value === "string") return value === "" ? undefined : value;
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return undefined;
}

/** 依次尝试多个路径，返回第一个存在的字符串 */
export function firstString(root: unknown, ...paths: string[]): string | undefined {
  for (const path of paths) {
    const value = getString(root, path);
    if (value !== undefined) return value;
  }
  return undefined;
}
