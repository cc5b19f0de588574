/**
 * 派发目标命名约定
 *   build:  <vcs>-<language>-<framework>-app-build-(default|edp)
 *   review: <vcs>-<language>-<framework>-app-review
 */

import type { Category } from "../types/index.js";

export const TARGET_NAME_POLICIES = ["off", "warn", "enforce"] as const;

export type TargetNamePolicy = (typeof TARGET_NAME_POLICIES)[number];

const BUILD_PATTERN = /^[a-z0-9]+-[a-z0-9]+-[a-z0-9]+-app-build-(default|edp)$/;
const REVIEW_PATTERN = /^[a-z0-9]+-[a-z0-9]+-[a-z0-9]+-app-review$/;

export function isTargetNamePolicy(value: string): value is TargetNamePolicy {
  return TARGET_NAME_POLICIES.some((p) => p === value);
}

/** 按命名约定识别目标类别，不符合任何约定时返回 null */
export function categoryOfTargetName(name: string): Category | null {
  if (BUILD_PATTERN.test(name)) return "build";
  if (REVIEW_PATTERN.test(name)) return "review";
  return null;
}

/** 目标名称是否符合该类别的命名约定 */
export function conformsToConvention(name: string, category: Category): boolean {
  return categoryOfTargetName(name) === category;
}
