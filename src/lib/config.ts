import { existsSync } from "fs";
import { readFile } from "fs/promises";
import { homedir } from "os";
import { join } from "path";
import * as v from "valibot";
import { BranchflowError } from "./errors.js";
import type { GitConfig } from "./gitTypes.js";
import { logger } from "./logger.js";

export const PROJECT_TYPES = ["frontend", "backend", "mobile", "infra"] as const;
export type ProjectType = (typeof PROJECT_TYPES)[number];

export type ReviewerTable = Partial<Record<ProjectType, string[]>>;

export interface JiraSettings {
  baseUrl?: string;
  email?: string;
  apiToken?: string;
}

export interface GitHubSettings {
  owner?: string;
  repo?: string;
  token?: string;
}

/**
 * Everything the commands need, resolved once at startup
 */
export interface AppConfig {
  git: GitConfig;
  projectType?: string;
  httpTimeoutMs: number;
  jira: JiraSettings;
  github: GitHubSettings;
  reviewers: ReviewerTable;
  debug: boolean;
}

export const DEFAULT_HTTP_TIMEOUT_MS = 30_000;

const ReviewerListSchema = v.array(v.pipe(v.string(), v.nonEmpty()));

const FileConfigSchema = v.object({
  remote: v.optional(v.pipe(v.string(), v.nonEmpty())),
  projectType: v.optional(v.string()),
  httpTimeoutMs: v.optional(v.pipe(v.number(), v.integer(), v.minValue(1))),
  gitBinary: v.optional(v.pipe(v.string(), v.nonEmpty())),
  jira: v.optional(
    v.object({
      baseUrl: v.optional(v.pipe(v.string(), v.url())),
      email: v.optional(v.string()),
    }),
  ),
  github: v.optional(
    v.object({
      owner: v.optional(v.string()),
      repo: v.optional(v.string()),
    }),
  ),
  reviewers: v.optional(
    v.object({
      frontend: v.optional(ReviewerListSchema),
      backend: v.optional(ReviewerListSchema),
      mobile: v.optional(ReviewerListSchema),
      infra: v.optional(ReviewerListSchema),
    }),
  ),
});
export type FileConfig = v.InferOutput<typeof FileConfigSchema>;

const EnvSchema = v.object({
  BRANCHFLOW_REMOTE: v.optional(v.string()),
  BRANCHFLOW_PROJECT_TYPE: v.optional(v.string()),
  BRANCHFLOW_HTTP_TIMEOUT_MS: v.optional(
    v.pipe(
      v.string(),
      v.regex(/^\d+$/, "must be a whole number of milliseconds"),
      v.transform(Number),
      v.minValue(1),
    ),
  ),
  BRANCHFLOW_GIT_BINARY: v.optional(v.string()),
  JIRA_BASE_URL: v.optional(v.pipe(v.string(), v.url())),
  JIRA_EMAIL: v.optional(v.string()),
  JIRA_API_TOKEN: v.optional(v.string()),
  GITHUB_OWNER: v.optional(v.string()),
  GITHUB_REPO: v.optional(v.string()),
  GITHUB_TOKEN: v.optional(v.string()),
  GH_TOKEN: v.optional(v.string()),
  DEBUG: v.optional(v.string()),
});

function describeIssues(source: string, issues: v.BaseIssue<unknown>[]): string {
  const details = issues.map((issue) => {
    const path = issue.path?.map((item) => String(item.key)).join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
  return `Invalid configuration in ${source}: ${details.join("; ")}`;
}

/**
 * Environment variables with empty values treated as unset
 */
function presentEnv(env: NodeJS.ProcessEnv): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") {
      result[key] = value.trim();
    }
  }
  return result;
}

export function getConfigFilePath(env: NodeJS.ProcessEnv): string {
  return (
    env.BRANCHFLOW_CONFIG ?? join(homedir(), ".config", "branchflow", "config.json")
  );
}

/**
 * Read and validate the optional JSON config file
 */
export async function readConfigFile(path: string): Promise<FileConfig> {
  if (!existsSync(path)) {
    logger.debug(`No config file at ${path}`);
    return {};
  }

  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, "utf-8")) as unknown;
  } catch (error) {
    throw new BranchflowError(
      "InvalidConfig",
      `Failed to read config file ${path}: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error },
    );
  }

  const result = v.safeParse(FileConfigSchema, raw);
  if (!result.success) {
    throw new BranchflowError("InvalidConfig", describeIssues(path, result.issues));
  }
  return result.output;
}

/**
 * Merge the environment over the config file. Tokens only ever come from the
 * environment.
 */
export function resolveConfig(
  env: NodeJS.ProcessEnv,
  file: FileConfig = {},
): AppConfig {
  const result = v.safeParse(EnvSchema, presentEnv(env));
  if (!result.success) {
    throw new BranchflowError(
      "InvalidConfig",
      describeIssues("environment", result.issues),
    );
  }
  const e = result.output;

  return {
    git: {
      binaryPath: e.BRANCHFLOW_GIT_BINARY ?? file.gitBinary ?? "git",
      remote: e.BRANCHFLOW_REMOTE ?? file.remote ?? "origin",
    },
    projectType: e.BRANCHFLOW_PROJECT_TYPE ?? file.projectType,
    httpTimeoutMs:
      e.BRANCHFLOW_HTTP_TIMEOUT_MS ?? file.httpTimeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS,
    jira: {
      baseUrl: (e.JIRA_BASE_URL ?? file.jira?.baseUrl)?.replace(/\/+$/, ""),
      email: e.JIRA_EMAIL ?? file.jira?.email,
      apiToken: e.JIRA_API_TOKEN,
    },
    github: {
      owner: e.GITHUB_OWNER ?? file.github?.owner,
      repo: e.GITHUB_REPO ?? file.github?.repo,
      token: e.GITHUB_TOKEN ?? e.GH_TOKEN,
    },
    reviewers: file.reviewers ?? {},
    debug: e.DEBUG === "true",
  };
}

export async function loadConfig(env: NodeJS.ProcessEnv): Promise<AppConfig> {
  const file = await readConfigFile(getConfigFilePath(env));
  return resolveConfig(env, file);
}
