import { describe, expect, it } from "vitest";
import { WebhookEvent } from "../../src/gateway/webhook-event.js";
import { PayloadError } from "../../src/router/errors.js";

describe("WebhookEvent", () => {
  it("header 读取大小写不敏感", () => {
    const event = new WebhookEvent({
      provider: "github",
      headers: { "X-GitHub-Event": "pull_request", "X-GitHub-Delivery": "d-1" },
      rawBody: Buffer.from("{}"),
    });
    expect(event.header("x-github-event")).toBe("pull_request");
    expect(event.eventType).toBe("pull_request");
    expect(event.deliveryId).toBe("d-1");
    expect(event.headers).toEqual({ "x-github-event": "pull_request", "x-github-delivery": "d-1" });
  });

  it("多值 header 合并为逗号分隔", () => {
    const event = new WebhookEvent({
      provider: "gitea",
      headers: { "x-forwarded-for": ["10.0.0.1", "10.0.0.2"], "x-empty": undefined },
      rawBody: Buffer.from("{}"),
    });
    expect(event.header("X-Forwarded-For")).toBe("10.0.0.1, 10.0.0.2");
    expect(event.header("x-empty")).toBeUndefined();
  });

  it("payload 首次访问时解析并缓存", () => {
    const event = new WebhookEvent({ provider: "gitlab", headers: {}, rawBody: Buffer.from('{"object_kind":"note"}') });
    const first = event.payload;
    expect(first).toEqual({ object_kind: "note" });
    expect(event.payload).toBe(first);
  });

  it("非 JSON 载荷抛出 PayloadError", () => {
    const event = new WebhookEvent({ provider: "github", headers: {}, rawBody: Buffer.from("payload=%7B%7D") });
    expect(() => event.payload).toThrow(PayloadError);
  });

  it("JSON 数组不是合法载荷", () => {
    const event = new WebhookEvent({ provider: "github", headers: {}, rawBody: Buffer.from("[1,2]") });
    expect(() => event.payload).toThrow("需要 JSON 对象");
  });
});
