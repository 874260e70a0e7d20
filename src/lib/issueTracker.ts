import * as v from "valibot";
import type { JiraSettings } from "./config.js";
import { BranchflowError } from "./errors.js";
import { logger } from "./logger.js";

export interface Issue {
  key: string;
  summary: string;
  type: string;
  description: string;
}

export interface IssueTrackerOptions {
  timeoutMs: number;
  fetch?: typeof fetch;
}

const IssueResponseSchema = v.object({
  key: v.string(),
  fields: v.object({
    summary: v.optional(v.nullable(v.string())),
    issuetype: v.optional(v.nullable(v.object({ name: v.string() }))),
    description: v.optional(v.nullable(v.string())),
  }),
});

const ErrorResponseSchema = v.object({
  errorMessages: v.optional(v.array(v.string())),
  errors: v.optional(v.record(v.string(), v.string())),
});

/**
 * Join `text` onto an existing description with a blank line in between
 */
export function appendToDescription(current: string, text: string): string {
  return current.trim() === "" ? text : `${current}\n\n${text}`;
}

async function describeFailure(response: Response): Promise<string> {
  try {
    const body = v.parse(ErrorResponseSchema, (await response.json()) as unknown);
    const messages = [
      ...(body.errorMessages ?? []),
      ...Object.entries(body.errors ?? {}).map(([field, msg]) => `${field}: ${msg}`),
    ];
    if (messages.length > 0) {
      return messages.join("; ");
    }
  } catch {
    // Body was empty or not the tracker's error shape
  }
  return response.statusText || `HTTP ${response.status}`;
}

/**
 * Client for the issue tracker's REST API (v2, plain-text descriptions).
 *
 * `appendDescription` is a read-modify-write: the API has no append, and there
 * is no concurrency control, so an edit made between the read and the write is
 * overwritten.
 */
export class IssueTrackerClient {
  private readonly settings: JiraSettings;
  private readonly timeoutMs: number;
  private readonly fetchFn: typeof fetch;

  constructor(settings: JiraSettings, options: IssueTrackerOptions) {
    this.settings = settings;
    this.timeoutMs = options.timeoutMs;
    this.fetchFn = options.fetch ?? fetch;
  }

  isConfigured(): boolean {
    const { baseUrl, email, apiToken } = this.settings;
    return Boolean(baseUrl && email && apiToken);
  }

  async getIssue(key: string): Promise<Issue> {
    const response = await this.request("GET", key);
    let parsed: v.InferOutput<typeof IssueResponseSchema>;
    try {
      parsed = v.parse(IssueResponseSchema, (await response.json()) as unknown);
    } catch (error) {
      throw new BranchflowError(
        "RemoteError",
        `Unexpected response for issue ${key}: ${error instanceof Error ? error.message : String(error)}`,
        { status: response.status, cause: error },
      );
    }

    return {
      key: parsed.key,
      summary: parsed.fields.summary ?? "",
      type: parsed.fields.issuetype?.name ?? "",
      description: parsed.fields.description ?? "",
    };
  }

  async updateDescription(key: string, description: string): Promise<void> {
    await this.request("PUT", key, { fields: { description } });
    logger.debug(`Updated description of ${key}`);
  }

  /**
   * Append `text` to the issue's description and return the new description
   */
  async appendDescription(key: string, text: string): Promise<string> {
    const issue = await this.getIssue(key);
    const description = appendToDescription(issue.description, text);
    await this.updateDescription(key, description);
    return description;
  }

  private credentials(): { baseUrl: string; authorization: string } {
    const { baseUrl, email, apiToken } = this.settings;
    if (!baseUrl || !email || !apiToken) {
      const missing = [
        !baseUrl && "JIRA_BASE_URL",
        !email && "JIRA_EMAIL",
        !apiToken && "JIRA_API_TOKEN",
      ].filter(Boolean);
      throw new BranchflowError(
        "NotConfigured",
        `Issue tracker is not configured (missing ${missing.join(", ")})`,
      );
    }
    return {
      baseUrl,
      authorization: `Basic ${Buffer.from(`${email}:${apiToken}`).toString("base64")}`,
    };
  }

  private async request(
    method: "GET" | "PUT",
    key: string,
    body?: unknown,
  ): Promise<Response> {
    const { baseUrl, authorization } = this.credentials();
    const url = `${baseUrl}/rest/api/2/issue/${encodeURIComponent(key)}`;
    logger.debug(`${method} ${url}`);

    let response: Response;
    try {
      response = await this.fetchFn(url, {
        method,
        headers: {
          Authorization: authorization,
          Accept: "application/json",
          ...(body === undefined ? {} : { "Content-Type": "application/json" }),
        },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      const timedOut = error instanceof Error && error.name === "TimeoutError";
      throw new BranchflowError(
        "RemoteError",
        timedOut
          ? `Issue tracker request for ${key} timed out after ${this.timeoutMs}ms`
          : `Issue tracker request for ${key} failed: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error },
      );
    }

    if (response.status === 404) {
      throw new BranchflowError("NotFound", `Issue ${key} not found`, {
        status: 404,
      });
    }
    if (!response.ok) {
      throw new BranchflowError(
        "RemoteError",
        `Issue tracker returned ${response.status} for ${method} ${key}: ${await describeFailure(response)}`,
        { status: response.status },
      );
    }
    return response;
  }
}
