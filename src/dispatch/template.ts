/**
 * 派发模板解析 — 由参数集构造派发请求
 * 目标名称只能来自 extensions.targets.<category>，缺失即失败，没有默认值
 */

import { Param, ParameterSetBuilder } from "../binding/binder.js";
import { ResolutionError } from "../router/errors.js";
import type { DispatchRequest, ParameterSet, RoutableClassification } from "../types/index.js";
import { conformsToConvention, type TargetNamePolicy } from "./target-name.js";

export interface ResolveOptions {
  /** enforce 时目标名称必须符合命名约定；warn 由调用方记录日志 */
  targetNamePolicy?: TargetNamePolicy;
}

/**
 * 解析派发请求
 * @throws ResolutionError 未配置目标或目标名称不符合约定（enforce）时
 */
export function resolveDispatch(
  parameters: ParameterSet,
  classification: RoutableClassification,
  options: ResolveOptions = {},
): DispatchRequest {
  const { category } = classification;
  const resource = parameters[Param.resourceId] ?? "";
  const target = parameters[Param.targetFor(category)];

  if (target === undefined || target.trim() === "") {
    throw new ResolutionError(
      "NoTargetConfigured",
      `资源 ${resource || "(unknown)"} 未配置 ${category} 派发目标`,
    );
  }

  if (options.targetNamePolicy === "enforce" && !conformsToConvention(target, category)) {
    throw new ResolutionError("InvalidTargetName", `派发目标 ${target} 不符合 ${category} 命名约定`);
  }

  const branch =
    category === "build"
      ? parameters[Param.body("targetBranch")]
      : parameters[Param.body("sourceBranch")];

  return {
    target,
    parameters: new ParameterSetBuilder(parameters).set(Param.target, target).build(),
    labels: {
      resource,
      category,
      branch: branch ?? "",
    },
  };
}
