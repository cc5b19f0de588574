/**
 * Webhook 签名校验
 * - github / bitbucket / gitea: HMAC SHA256 over raw body
 * - gitlab: 无原生签名，比对 X-Gitlab-Token
 * 均使用 timingSafeEqual 防止时序攻击，未配置密钥的提供商一律拒绝
 */

import { createHmac, timingSafeEqual } from "node:crypto";
import { capabilitiesOf } from "../providers/capabilities.js";
import { AuthError } from "../router/errors.js";
import type { WebhookEvent } from "./webhook-event.js";

/** 计算期望的签名值（含提供商前缀） */
export function computeSignature(rawBody: Buffer, secret: string, prefix = ""): string {
  return prefix + createHmac("sha256", secret).update(rawBody).digest("hex");
}

/**
 * 校验事件来源
 * @throws AuthError 签名缺失、不匹配或密钥未配置时
 */
export function validateSignature(event: WebhookEvent, secret: string): void {
  const caps = capabilitiesOf(event.provider);
  if (!secret) {
    throw new AuthError("SecretNotConfigured", `${event.provider} webhook 密钥未配置`);
  }

  const supplied = event.header(caps.signatureHeader);
  if (!supplied) {
    throw new AuthError("MissingSignature", `缺少 ${caps.signatureHeader} header`);
  }

  const expected =
    caps.supportsSignature ? computeSignature(event.rawBody, secret, caps.signaturePrefix) : secret;

  if (!constantTimeEquals(supplied.trim(), expected)) {
    throw new AuthError("InvalidSignature", `${event.provider} webhook 签名验证失败`);
  }
}

function constantTimeEquals(a: string, b: string): boolean {
  const left = Buffer.from(a);
  const right = Buffer.from(b);
  // 长度不一致时 timingSafeEqual 会抛出，先做长度检查
  if (left.length !== right.length) return false;
  return timingSafeEqual(left, right);
}
