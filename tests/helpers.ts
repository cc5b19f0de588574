/**
 * 测试辅助 — fixture 加载、带签名事件构造、默认配置快照
 */

import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import pino from "pino";
import { computeSignature } from "../src/gateway/signature.js";
import { WebhookEvent } from "../src/gateway/webhook-event.js";
import { capabilitiesOf, type Provider } from "../src/providers/capabilities.js";
import { buildSettings, type RouterSettings, type SettingsConfig } from "../src/router/settings.js";
import { DEFAULT_RECHECK_PATTERN } from "../src/config.js";

const fixturesDir = path.join(path.dirname(fileURLToPath(import.meta.url)), "fixtures");

export const SECRETS: Record<Provider, string> = {
  github: "test-secret",
  gitlab: "test-token",
  bitbucket: "test-secret",
  gitea: "test-secret",
};

/** 读取 fixture 原始字节 */
export function fixtureBytes(name: string): Buffer {
  return fs.readFileSync(path.join(fixturesDir, `${name}.json`));
}

/** 读取 fixture 并解析为对象 */
export function fixture(name: string): Record<string, unknown> {
  return JSON.parse(fixtureBytes(name).toString("utf-8"));
}

/** 计算某提供商的签名 header */
export function authHeaders(provider: Provider, rawBody: Buffer, secret = SECRETS[provider]): Record<string, string> {
  const caps = capabilitiesOf(provider);
  const value = caps.supportsSignature ? computeSignature(rawBody, secret, caps.signaturePrefix) : secret;
  return { [caps.signatureHeader]: value };
}

/** 构造带正确签名的事件 */
export function signedEvent(
  provider: Provider,
  eventType: string,
  body: Buffer | Record<string, unknown>,
  extraHeaders: Record<string, string> = {},
): WebhookEvent {
  const rawBody = Buffer.isBuffer(body) ? body : Buffer.from(JSON.stringify(body));
  return new WebhookEvent({
    provider,
    rawBody,
    headers: {
      "content-type": "application/json",
      [capabilitiesOf(provider).eventHeader]: eventType,
      ...authHeaders(provider, rawBody),
      ...extraHeaders,
    },
  });
}

export function testSettingsConfig(overrides: Partial<SettingsConfig> = {}): SettingsConfig {
  return {
    secrets: { ...SECRETS },
    trackedBranches: ["main", "release/*"],
    recheckPattern: DEFAULT_RECHECK_PATTERN,
    rulesFile: "",
    targetNamePolicy: "off",
    ...overrides,
  };
}

export function testSettings(overrides: Partial<SettingsConfig> = {}): RouterSettings {
  return buildSettings(testSettingsConfig(overrides));
}

export const silentLogger = pino({ level: "silent" });
