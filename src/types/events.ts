/**
 * 路由链路上的统一数据定义
 */

/** 可派发的事件类别 */
export type Category = "build" | "review";

/** 分类结果类别，discard 表示无需处理 */
export type ClassificationCategory = Category | "discard";

/** 事件分类结果 */
export interface ClassificationResult {
  category: ClassificationCategory;
  /** 命中的规则 ID，discard 时为 null */
  matchedRule: string | null;
}

/** 已命中 build/review 规则的分类结果 */
export interface RoutableClassification extends ClassificationResult {
  category: Category;
  matchedRule: string;
}

/** 资源注册中心返回的目标配置 */
export type TargetMap = Partial<Record<Category, string>>;

/** 注册中心查询结果 */
export interface RegistryRecord {
  resourceId: string;
  targets: TargetMap;
}

/** 富化结果 */
export interface EnrichmentRecord extends RegistryRecord {
  /** 注册中心调用耗时（命中缓存时为 0） */
  lookupLatencyMs: number;
  fromCache: boolean;
}

/** 扁平参数集合：body.* 来自 payload，extensions.* 来自富化 */
export type ParameterSet = Readonly<Record<string, string>>;

/** 派发标签 */
export interface DispatchLabels {
  resource: string;
  category: Category;
  branch: string;
}

/** 交给执行引擎的派发请求 */
export interface DispatchRequest {
  target: string;
  parameters: ParameterSet;
  labels: DispatchLabels;
}

/** 执行引擎受理回执 */
export interface DispatchAck {
  token: string;
  acceptedAt: string;
}

export function isRoutable(result: ClassificationResult): result is RoutableClassification {
  return result.category !== "discard" && result.matchedRule !== null;
}
