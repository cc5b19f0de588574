import { describe, expect, it } from "vitest";
import {
  categoryOfTargetName,
  conformsToConvention,
  isTargetNamePolicy,
} from "../../src/dispatch/target-name.js";

describe("target-name", () => {
  it("识别 build 目标", () => {
    expect(categoryOfTargetName("github-java-springboot-app-build-default")).toBe("build");
    expect(categoryOfTargetName("gitlab-go-gin-app-build-edp")).toBe("build");
  });

  it("识别 review 目标", () => {
    expect(categoryOfTargetName("gerrit-go-echo-app-review")).toBe("review");
  });

  it("不符合约定时返回 null", () => {
    expect(categoryOfTargetName("svc-a-build-42")).toBeNull();
    expect(categoryOfTargetName("github-java-springboot-app-build-custom")).toBeNull();
    expect(categoryOfTargetName("GitHub-java-springboot-app-review")).toBeNull();
  });

  it("类别不一致时不符合约定", () => {
    expect(conformsToConvention("gitlab-go-gin-app-review", "build")).toBe(false);
    expect(conformsToConvention("gitlab-go-gin-app-review", "review")).toBe(true);
  });

  it("校验策略取值", () => {
    expect(isTargetNamePolicy("warn")).toBe(true);
    expect(isTargetNamePolicy("strict")).toBe(false);
  });
});
