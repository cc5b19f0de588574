/**
 * payload 字段提取 — 每个提供商固定提取同一组字段，写入 body.* 参数
 *
 * | 字段           | github / gitea                       | gitlab                                  | bitbucket                                  |
 * |----------------|--------------------------------------|-----------------------------------------|--------------------------------------------|
 * | repositoryUrl  | repository.clone_url / html_url      | project.git_http_url / web_url          | repository.links.html.href                 |
 * | repositoryName | repository.full_name                 | project.path_with_namespace             | repository.full_name                       |
 * | revision       | merge_commit_sha / head.sha          | merge_commit_sha / last_commit.id       | merge_commit.hash / source.commit.hash     |
 * | sourceBranch   | pull_request.head.ref                | object_attributes.source_branch         | pullrequest.source.branch.name             |
 * | targetBranch   | pull_request.base.ref                | object_attributes.target_branch         | pullrequest.destination.branch.name        |
 * | changeNumber   | pull_request.number / issue.number   | object_attributes.iid / merge_request.iid | pullrequest.id                           |
 * | actor          | sender.login                         | user.username                           | actor.nickname / actor.display_name        |
 *
 * github / gitea 的评论事件不携带提交信息，revision 与 sourceBranch 使用 refs/pull/<n>/head。
 */

import type { Provider } from "../providers/capabilities.js";
import type { WebhookEvent } from "../gateway/webhook-event.js";
import { firstString } from "../lib/payload.js";
import type { Category } from "../types/index.js";

export const BODY_FIELDS = [
  "repositoryUrl",
  "repositoryName",
  "revision",
  "sourceBranch",
  "targetBranch",
  "changeNumber",
  "actor",
] as const;

export type BodyField = (typeof BODY_FIELDS)[number];

export type BodyFields = Partial<Record<BodyField, string>>;

/** 每个事件都必须提供的字段 */
export const REQUIRED_BODY_FIELDS: readonly BodyField[] = ["repositoryUrl", "revision"];

type Extractor = (event: WebhookEvent, category: Category) => BodyFields;

/** GitHub 与 Gitea 的 PR / 评论 payload 结构一致 */
function extractPullRequestStyle(event: WebhookEvent, category: Category): BodyFields {
  const body = event.payload;
  const base: BodyFields = {
    repositoryUrl: firstString(body, "repository.clone_url", "repository.html_url"),
    repositoryName: firstString(body, "repository.full_name"),
    actor: firstString(body, "sender.login", "sender.username"),
  };

  if (event.eventType === "issue_comment") {
    const number = firstString(body, "issue.number");
    const ref = number ? `refs/pull/${number}/head` : undefined;
    return { ...base, changeNumber: number, revision: ref, sourceBranch: ref };
  }

  return {
    ...base,
    revision:
      category === "build"
        ? firstString(body, "pull_request.merge_commit_sha", "pull_request.head.sha")
        : firstString(body, "pull_request.head.sha"),
    sourceBranch: firstString(body, "pull_request.head.ref"),
    targetBranch: firstString(body, "pull_request.base.ref"),
    changeNumber: firstString(body, "pull_request.number", "number"),
  };
}

function extractGitLab(event: WebhookEvent, category: Category): BodyFields {
  const body = event.payload;
  const base: BodyFields = {
    repositoryUrl: firstString(body, "project.git_http_url", "project.web_url"),
    repositoryName: firstString(body, "project.path_with_namespace"),
    actor: firstString(body, "user.username"),
  };

  if (firstString(body, "object_kind") === "note") {
    return {
      ...base,
      revision: firstString(body, "merge_request.last_commit.id"),
      sourceBranch: firstString(body, "merge_request.source_branch"),
      targetBranch: firstString(body, "merge_request.target_branch"),
      changeNumber: firstString(body, "merge_request.iid"),
    };
  }

  return {
    ...base,
    revision:
      category === "build"
        ? firstString(body, "object_attributes.merge_commit_sha", "object_attributes.last_commit.id")
        : firstString(body, "object_attributes.last_commit.id"),
    sourceBranch: firstString(body, "object_attributes.source_branch"),
    targetBranch: firstString(body, "object_attributes.target_branch"),
    changeNumber: firstString(body, "object_attributes.iid"),
  };
}

function extractBitbucket(event: WebhookEvent, category: Category): BodyFields {
  const body = event.payload;
  return {
    repositoryUrl: firstString(body, "repository.links.html.href"),
    repositoryName: firstString(body, "repository.full_name"),
    actor: firstString(body, "actor.nickname", "actor.display_name"),
    revision:
      category === "build"
        ? firstString(body, "pullrequest.merge_commit.hash", "pullrequest.source.commit.hash")
        : firstString(body, "pullrequest.source.commit.hash"),
    sourceBranch: firstString(body, "pullrequest.source.branch.name"),
    targetBranch: firstString(body, "pullrequest.destination.branch.name"),
    changeNumber: firstString(body, "pullrequest.id"),
  };
}

const EXTRACTORS: Readonly<Record<Provider, Extractor>> = {
  github: extractPullRequestStyle,
  gitea: extractPullRequestStyle,
  gitlab: extractGitLab,
  bitbucket: extractBitbucket,
};

/** 提取 body 字段，缺失的字段不出现在结果中 */
export function extractBodyFields(event: WebhookEvent, category: Category): BodyFields {
  const fields = EXTRACTORS[event.provider](event, category);
  const result: BodyFields = {};
  for (const name of BODY_FIELDS) {
    const value = fields[name];
    if (value !== undefined) result[name] = value;
  }
  return result;
}

/** 事件引用的源仓库地址 */
export function repositoryUrlOf(event: WebhookEvent): string | undefined {
  return EXTRACTORS[event.provider](event, "review").repositoryUrl;
}
