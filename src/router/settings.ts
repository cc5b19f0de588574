/**
 * 路由配置快照 — 请求期间只读，热加载时整体替换
 */

import type { Config } from "../config.js";
import type { Provider } from "../providers/capabilities.js";
import { loadRules } from "../classifier/rules-loader.js";
import type { RuleTable } from "../classifier/rules.js";
import type { TargetNamePolicy } from "../dispatch/target-name.js";

export interface RouterSettings {
  readonly version: number;
  readonly loadedAt: string;
  readonly secrets: Readonly<Record<Provider, string>>;
  readonly rules: RuleTable;
  readonly trackedBranches: readonly string[];
  readonly recheckPattern: RegExp;
  readonly targetNamePolicy: TargetNamePolicy;
}

/** 需要的配置子集 */
export type SettingsConfig = Pick<
  Config,
  "secrets" | "trackedBranches" | "recheckPattern" | "rulesFile" | "targetNamePolicy"
>;

/**
 * 由配置构建快照
 * @throws Error 规则文件或 recheck 正则无效时
 */
export function buildSettings(cfg: SettingsConfig, version = 1): RouterSettings {
  let recheckPattern: RegExp;
  try {
    recheckPattern = new RegExp(cfg.recheckPattern, "m");
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(`RECHECK_PATTERN 无效: ${reason}`);
  }

  return deepFreeze({
    version,
    loadedAt: new Date().toISOString(),
    secrets: { ...cfg.secrets },
    rules: loadRules(cfg.rulesFile || undefined),
    trackedBranches: [...cfg.trackedBranches],
    recheckPattern,
    targetNamePolicy: cfg.targetNamePolicy,
  });
}

/** 持有当前快照；swap 是唯一的写入口 */
export class SettingsStore {
  private snapshot: RouterSettings;

  constructor(initial: RouterSettings) {
    this.snapshot = initial;
  }

  current(): RouterSettings {
    return this.snapshot;
  }

  /** 原子替换快照，返回旧快照 */
  swap(next: RouterSettings): RouterSettings {
    const previous = this.snapshot;
    this.snapshot = next;
    return previous;
  }

  /** 用新配置重建快照，失败时保留旧快照并抛出 */
  reload(cfg: SettingsConfig): RouterSettings {
    const next = buildSettings(cfg, this.snapshot.version + 1);
    this.swap(next);
    return next;
  }
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value) && !(value instanceof RegExp)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
