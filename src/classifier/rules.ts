/**
 * 默认分类规则 — 每个提供商按 build / review 两类声明过滤表达式
 * 顺序即优先级：先 build 后 review，首个命中的规则生效
 */

import type { Provider } from "../providers/capabilities.js";
import type { Category } from "../types/index.js";
import type { Predicate } from "./predicate.js";

export interface Rule {
  id: string;
  when: Predicate;
}

export type ProviderRules = Readonly<Record<Category, readonly Rule[]>>;

export type RuleTable = Readonly<Record<Provider, ProviderRules>>;

const ghEvent = (value: string): Predicate => ({ eq: { path: "header.x-github-event", value } });
const giteaEvent = (value: string): Predicate => ({ eq: { path: "header.x-gitea-event", value } });
const action = (value: string): Predicate => ({ eq: { path: "body.action", value } });

// ---------- GitHub ----------

const GITHUB_RULES: ProviderRules = {
  build: [
    {
      id: "github.pr-merged",
      when: {
        all: [
          ghEvent("pull_request"),
          action("closed"),
          { eq: { path: "body.pull_request.merged", value: true } },
          { trackedBranch: "body.pull_request.base.ref" },
        ],
      },
    },
  ],
  review: [
    {
      id: "github.pr-opened",
      when: {
        all: [
          ghEvent("pull_request"),
          { in: { path: "body.action", values: ["opened", "synchronize", "reopened"] } },
        ],
      },
    },
    {
      id: "github.recheck-comment",
      when: {
        all: [
          ghEvent("issue_comment"),
          action("created"),
          // issue 带有 pull_request 字段时才是 PR 评论
          { exists: "body.issue.pull_request" },
          { eq: { path: "body.issue.state", value: "open" } },
          { recheckComment: "body.comment.body" },
        ],
      },
    },
  ],
};

// ---------- GitLab ----------

const GITLAB_RULES: ProviderRules = {
  build: [
    {
      id: "gitlab.mr-merged",
      when: {
        all: [
          { eq: { path: "body.object_kind", value: "merge_request" } },
          { eq: { path: "body.object_attributes.action", value: "merge" } },
          { trackedBranch: "body.object_attributes.target_branch" },
        ],
      },
    },
  ],
  review: [
    {
      id: "gitlab.mr-opened",
      when: {
        all: [
          { eq: { path: "body.object_kind", value: "merge_request" } },
          {
            any: [
              { in: { path: "body.object_attributes.action", values: ["open", "reopen"] } },
              // update 也会在修改标题时触发，只有带 oldrev 才是新提交
              {
                all: [
                  { eq: { path: "body.object_attributes.action", value: "update" } },
                  { exists: "body.object_attributes.oldrev" },
                ],
              },
            ],
          },
        ],
      },
    },
    {
      id: "gitlab.recheck-note",
      when: {
        all: [
          { eq: { path: "body.object_kind", value: "note" } },
          { eq: { path: "body.object_attributes.noteable_type", value: "MergeRequest" } },
          { eq: { path: "body.merge_request.state", value: "opened" } },
          { recheckComment: "body.object_attributes.note" },
        ],
      },
    },
  ],
};

// ---------- Bitbucket（不支持评论触发） ----------

const BITBUCKET_RULES: ProviderRules = {
  build: [
    {
      id: "bitbucket.pr-fulfilled",
      when: {
        all: [
          { eq: { path: "header.x-event-key", value: "pullrequest:fulfilled" } },
          { trackedBranch: "body.pullrequest.destination.branch.name" },
        ],
      },
    },
  ],
  review: [
    {
      id: "bitbucket.pr-opened",
      when: { in: { path: "header.x-event-key", values: ["pullrequest:created", "pullrequest:updated"] } },
    },
  ],
};

// ---------- Gitea ----------

const GITEA_RULES: ProviderRules = {
  build: [
    {
      id: "gitea.pr-merged",
      when: {
        all: [
          giteaEvent("pull_request"),
          action("closed"),
          { eq: { path: "body.pull_request.merged", value: true } },
          { trackedBranch: "body.pull_request.base.ref" },
        ],
      },
    },
  ],
  review: [
    {
      id: "gitea.pr-opened",
      when: {
        all: [
          giteaEvent("pull_request"),
          { in: { path: "body.action", values: ["opened", "synchronized", "reopened"] } },
        ],
      },
    },
    {
      id: "gitea.recheck-comment",
      when: {
        all: [
          giteaEvent("issue_comment"),
          action("created"),
          { eq: { path: "body.is_pull", value: true } },
          { eq: { path: "body.issue.state", value: "open" } },
          { recheckComment: "body.comment.body" },
        ],
      },
    },
  ],
};

export const DEFAULT_RULES: RuleTable = {
  github: GITHUB_RULES,
  gitlab: GITLAB_RULES,
  bitbucket: BITBUCKET_RULES,
  gitea: GITEA_RULES,
};
