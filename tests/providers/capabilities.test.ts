import { describe, expect, it } from "vitest";
import { CAPABILITIES, capabilitiesOf, isProvider, PROVIDERS } from "../../src/providers/capabilities.js";

describe("providers", () => {
  it("识别已知提供商", () => {
    expect(isProvider("gitea")).toBe(true);
    expect(isProvider("svn")).toBe(false);
    expect(isProvider("GitHub")).toBe(false);
  });

  it("每个提供商都声明了能力", () => {
    for (const provider of PROVIDERS) {
      const caps = capabilitiesOf(provider);
      expect(caps.signatureHeader).toBe(caps.signatureHeader.toLowerCase());
      expect(caps.eventHeader).toBe(caps.eventHeader.toLowerCase());
    }
    expect(Object.keys(CAPABILITIES).sort()).toEqual([...PROVIDERS].sort());
  });

  it("GitLab 使用 token 认证，Bitbucket 不支持评论触发", () => {
    expect(capabilitiesOf("gitlab")).toMatchObject({ supportsSignature: false, signatureHeader: "x-gitlab-token" });
    expect(capabilitiesOf("bitbucket").supportsCommentTrigger).toBe(false);
  });
});
