/**
 * 配置模块 — 从环境变量读取所有配置项
 */

import "dotenv/config";
import dotenv from "dotenv";
import type { Provider } from "./providers/capabilities.js";
import { isTargetNamePolicy, type TargetNamePolicy } from "./dispatch/target-name.js";

/** 注册中心调用的硬上限 */
export const MAX_REGISTRY_TIMEOUT_MS = 3000;

/** 默认评论重触发指令：单独一行的 /recheck 或 /ok-to-test */
export const DEFAULT_RECHECK_PATTERN = "^\\s*/(recheck|ok-to-test)\\s*$";

export interface RegistryConfig {
  url: string;
  token: string;
  timeoutMs: number;
  cacheTtlMs: number;
  cacheSize: number;
}

export interface EngineConfig {
  url: string;
  token: string;
  timeoutMs: number;
}

export interface Config {
  port: number;
  host: string;
  logLevel: string;
  secrets: Record<Provider, string>;
  trackedBranches: string[];
  recheckPattern: string;
  rulesFile: string;
  registry: RegistryConfig;
  engine: EngineConfig;
  dispatchConcurrency: number;
  targetNamePolicy: TargetNamePolicy;
}

type Env = Record<string, string | undefined>;

function reader(source: Env) {
  const str = (key: string, fallback = ""): string => source[key] ?? fallback;
  const int = (key: string, fallback: number): number => {
    const parsed = parseInt(str(key), 10);
    return Number.isNaN(parsed) ? fallback : parsed;
  };
  const list = (key: string, fallback: string[]): string[] => {
    const items = str(key)
      .split(",")
      .map((s) => s.trim())
      .filter(Boolean);
    return items.length > 0 ? items : fallback;
  };
  return { str, int, list };
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

export function loadConfig(source: Env = process.env): Config {
  const env = reader(source);
  const policy = env.str("TARGET_NAME_POLICY", "off");
  if (!isTargetNamePolicy(policy)) {
    throw new Error(`TARGET_NAME_POLICY 取值无效: ${policy}（可选 off / warn / enforce）`);
  }

  return {
    port: env.int("PORT", 8080),
    host: env.str("HOST", "0.0.0.0"),
    logLevel: env.str("LOG_LEVEL", "info"),
    secrets: {
      github: env.str("GITHUB_WEBHOOK_SECRET"),
      gitlab: env.str("GITLAB_WEBHOOK_SECRET"),
      bitbucket: env.str("BITBUCKET_WEBHOOK_SECRET"),
      gitea: env.str("GITEA_WEBHOOK_SECRET"),
    },
    trackedBranches: env.list("TRACKED_BRANCHES", ["main", "master"]),
    recheckPattern: env.str("RECHECK_PATTERN", DEFAULT_RECHECK_PATTERN),
    rulesFile: env.str("RULES_FILE"),
    registry: {
      url: env.str("REGISTRY_URL", "http://localhost:8081"),
      token: env.str("REGISTRY_TOKEN"),
      timeoutMs: clamp(env.int("REGISTRY_TIMEOUT_MS", MAX_REGISTRY_TIMEOUT_MS), 1, MAX_REGISTRY_TIMEOUT_MS),
      cacheTtlMs: Math.max(env.int("REGISTRY_CACHE_TTL_MS", 30_000), 0),
      cacheSize: Math.max(env.int("REGISTRY_CACHE_SIZE", 500), 1),
    },
    engine: {
      url: env.str("ENGINE_URL", "http://localhost:8082"),
      token: env.str("ENGINE_TOKEN"),
      timeoutMs: Math.max(env.int("ENGINE_TIMEOUT_MS", 10_000), 1),
    },
    dispatchConcurrency: Math.max(env.int("DISPATCH_CONCURRENCY", 10), 1),
    targetNamePolicy: policy,
  };
}

/** 重新读取 .env（覆盖已有变量），用于热加载 */
export function reloadEnv(): Config {
  dotenv.config({ override: true });
  return loadConfig();
}

/** 全局配置单例 */
export const config = loadConfig();
