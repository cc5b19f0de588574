/**
 * VCS 提供商能力表 — 封闭的提供商集合 + 静态能力描述
 * 签名方式、事件类型头、是否支持评论重触发等差异全部在此声明，分类器与校验器只查表
 */

/** 支持的 VCS 提供商 */
export const PROVIDERS = ["github", "gitlab", "bitbucket", "gitea"] as const;

export type Provider = (typeof PROVIDERS)[number];

export interface ProviderCapabilities {
  /** 是否原生支持 payload 签名（HMAC SHA256），否则比对共享 token */
  supportsSignature: boolean;
  /** 是否支持通过评论（/recheck 等）重新触发 review */
  supportsCommentTrigger: boolean;
  /** 携带签名或 token 的 header（小写） */
  signatureHeader: string;
  /** 签名值前缀，如 "sha256=" */
  signaturePrefix: string;
  /** 事件类型 header（小写） */
  eventHeader: string;
  /** 投递 ID header（小写），用于日志关联 */
  deliveryHeader: string;
}

export const CAPABILITIES: Readonly<Record<Provider, Readonly<ProviderCapabilities>>> = {
  github: {
    supportsSignature: true,
    supportsCommentTrigger: true,
    signatureHeader: "x-hub-signature-256",
    signaturePrefix: "sha256=",
    eventHeader: "x-github-event",
    deliveryHeader: "x-github-delivery",
  },
  // GitLab 没有原生签名，只能比对 X-Gitlab-Token
  gitlab: {
    supportsSignature: false,
    supportsCommentTrigger: true,
    signatureHeader: "x-gitlab-token",
    signaturePrefix: "",
    eventHeader: "x-gitlab-event",
    deliveryHeader: "x-gitlab-event-uuid",
  },
  bitbucket: {
    supportsSignature: true,
    supportsCommentTrigger: false,
    signatureHeader: "x-hub-signature",
    signaturePrefix: "sha256=",
    eventHeader: "x-event-key",
    deliveryHeader: "x-request-uuid",
  },
  gitea: {
    supportsSignature: true,
    supportsCommentTrigger: true,
    signatureHeader: "x-gitea-signature",
    signaturePrefix: "",
    eventHeader: "x-gitea-event",
    deliveryHeader: "x-gitea-delivery",
  },
};

export function isProvider(value: string): value is Provider {
  return PROVIDERS.some((p) => p === value);
}

export function capabilitiesOf(provider: Provider): Readonly<ProviderCapabilities> {
  return CAPABILITIES[provider];
}
