/**
 * 路由错误分类 — 每个错误都终止当前事件，并映射为返回给 VCS 的 HTTP 状态码
 * 5xx 让提供商侧的重投机制接手，路由内部不做重试
 */

/** 路由链路阶段 */
export type StageName = "validate" | "classify" | "enrich" | "bind" | "resolve" | "dispatch";

export abstract class RouterError extends Error {
  abstract readonly stage: StageName;
  abstract readonly kind: string;
  abstract readonly statusCode: number;
}

// ---------- 签名校验 ----------

export type AuthErrorKind = "MissingSignature" | "InvalidSignature" | "SecretNotConfigured";

export class AuthError extends RouterError {
  override readonly name = "AuthError";
  readonly stage = "validate";
  readonly statusCode: number;

  constructor(
    readonly kind: AuthErrorKind,
    message: string,
  ) {
    super(message);
    this.statusCode = kind === "MissingSignature" ? 401 : 403;
  }
}

// ---------- Payload ----------

export type PayloadErrorKind = "MalformedPayload" | "MissingField";

export class PayloadError extends RouterError {
  override readonly name = "PayloadError";
  readonly statusCode = 400;

  constructor(
    readonly kind: PayloadErrorKind,
    message: string,
    readonly stage: StageName = "classify",
  ) {
    super(message);
  }
}

// ---------- 富化 ----------

export type EnrichmentErrorKind = "Timeout" | "NotFound" | "TransportFailure";

const ENRICHMENT_STATUS: Record<EnrichmentErrorKind, number> = {
  Timeout: 504,
  NotFound: 404,
  TransportFailure: 502,
};

export class EnrichmentError extends RouterError {
  override readonly name = "EnrichmentError";
  readonly stage = "enrich";
  readonly statusCode: number;

  constructor(
    readonly kind: EnrichmentErrorKind,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.statusCode = ENRICHMENT_STATUS[kind];
  }
}

// ---------- 派发目标解析 ----------

export type ResolutionErrorKind = "NoTargetConfigured" | "InvalidTargetName";

export class ResolutionError extends RouterError {
  override readonly name = "ResolutionError";
  readonly stage = "resolve";
  readonly statusCode = 500;

  constructor(
    readonly kind: ResolutionErrorKind,
    message: string,
  ) {
    super(message);
  }
}

// ---------- 派发 ----------

export type DispatchErrorKind = "Rejected" | "Unreachable";

export class DispatchError extends RouterError {
  override readonly name = "DispatchError";
  readonly stage = "dispatch";
  readonly statusCode = 502;
  /** 执行引擎返回的 HTTP 状态码（网络失败时为空） */
  readonly engineStatus: number | undefined;

  constructor(
    readonly kind: DispatchErrorKind,
    message: string,
    options?: ErrorOptions & { engineStatus?: number },
  ) {
    super(message, options);
    this.engineStatus = options?.engineStatus;
  }
}

// ---------- 取消 ----------

/** VCS 连接在链路完成前断开 */
export class CancelledError extends RouterError {
  override readonly name = "CancelledError";
  readonly kind = "Cancelled";
  readonly statusCode = 499;

  constructor(
    readonly stage: StageName,
    message = "请求已被调用方取消",
  ) {
    super(message);
  }
}

export function isRouterError(err: unknown): err is RouterError {
  return err instanceof RouterError;
}
