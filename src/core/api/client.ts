import { Buffer } from "node:buffer";
import type { z } from "zod";
import { TrackerApiError } from "../errors.js";
import type { LoginInfo } from "../auth/login.js";
import { isRecord } from "../utils/records.js";

type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

type RequestOptions = {
  method?: HttpMethod;
  query?: Record<string, unknown>;
  body?: unknown;
};

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export type JiraApiClientOptions = {
  login: LoginInfo;
  timeoutMs: number;
  fetch?: FetchLike;
};

const API_PATH = "/rest/api/2";

/**
 * Minimal Jira REST (v2) client. Requests are sent one at a time and never
 * retried; every call is bounded by `timeoutMs`.
 */
export class JiraApiClient {
  readonly baseUrl: string;
  readonly isCloud: boolean;
  private readonly authHeader: string;
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: JiraApiClientOptions) {
    this.baseUrl = options.login.server.replace(/\/+$/, "");
    this.isCloud = this.baseUrl.includes(".atlassian.net");
    this.authHeader = `Basic ${Buffer.from(`${options.login.user}:${options.login.token}`).toString("base64")}`;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async get(path: string, query?: Record<string, unknown>): Promise<unknown> {
    return this.request(path, { method: "GET", query });
  }

  async post(path: string, body?: unknown, query?: Record<string, unknown>): Promise<unknown> {
    return this.request(path, { method: "POST", body, query });
  }

  async request(path: string, options: RequestOptions = {}): Promise<unknown> {
    const url = buildUrl(`${this.baseUrl}${API_PATH}`, path, options.query ?? {});
    const method = options.method ?? "GET";
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.options.timeoutMs);

    try {
      const response = await this.fetchImpl(url, {
        method,
        headers: {
          "Accept": "application/json",
          "Content-Type": "application/json",
          "Authorization": this.authHeader,
          "User-Agent": "jira-issue-cli/0.1.0",
        },
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
        signal: controller.signal,
      });

      const body = await parseResponseBody(response);
      if (typeof body === "string" && looksLikeHtmlDocument(body)) {
        throw new TrackerApiError(
          `Jira API ${response.status}: server returned an HTML page. Check the server address.`,
          response.status
        );
      }
      if (!response.ok) {
        throw new TrackerApiError(buildHttpErrorMessage(response.status, response.statusText, body), response.status);
      }
      return body;
    } catch (error) {
      throw normalizeRequestError(error, this.options.timeoutMs);
    } finally {
      clearTimeout(timeout);
    }
  }
}

export function parseResponse<T extends z.ZodTypeAny>(schema: T, body: unknown, what: string): z.output<T> {
  const result = schema.safeParse(body);
  if (!result.success) {
    const first = result.error.issues[0];
    const where = first && first.path.length > 0 ? ` at ${first.path.join(".")}` : "";
    throw new TrackerApiError(`Unexpected ${what} response${where}: ${first?.message ?? "invalid shape"}`, undefined, result.error);
  }
  return result.data;
}

function buildUrl(baseUrl: string, path: string, query: Record<string, unknown>): string {
  const normalizedPath = path.startsWith("/") ? path : `/${path}`;
  const url = new URL(`${baseUrl}${normalizedPath}`);

  for (const [key, value] of Object.entries(query)) {
    if (value === undefined || value === null) {
      continue;
    }
    url.searchParams.append(key, String(value));
  }

  return url.toString();
}

async function parseResponseBody(response: Response): Promise<unknown> {
  const contentType = response.headers.get("content-type") ?? "";
  if (contentType.includes("application/json")) {
    return response.json();
  }
  return response.text();
}

// Jira reports failures as {errorMessages: [...], errors: {field: message}}.
function extractErrorMessage(body: unknown): string | undefined {
  if (typeof body === "string") {
    return body.trim() || undefined;
  }
  if (!isRecord(body)) {
    return undefined;
  }

  const parts: string[] = [];
  if (Array.isArray(body.errorMessages)) {
    for (const message of body.errorMessages) {
      if (typeof message === "string" && message.trim()) {
        parts.push(message.trim());
      }
    }
  }
  if (isRecord(body.errors)) {
    for (const [field, message] of Object.entries(body.errors)) {
      if (typeof message === "string" && message.trim()) {
        parts.push(`${field}: ${message.trim()}`);
      }
    }
  }
  if (typeof body.message === "string" && body.message.trim()) {
    parts.push(body.message.trim());
  }

  return parts.length ? parts.join("; ") : undefined;
}

function looksLikeHtmlDocument(content: string): boolean {
  const trimmed = content.trimStart().toLowerCase();
  return trimmed.startsWith("<!doctype html") || trimmed.startsWith("<html");
}

function buildHttpErrorMessage(status: number, statusText: string, body: unknown): string {
  const baseMessage = (extractErrorMessage(body) ?? statusText) || "Request failed";
  const normalized = truncateOneLine(baseMessage, 240);
  let hint = "";

  if (status === 401 || status === 403) {
    hint = " Check user name, API token and permissions.";
  } else if (status === 404) {
    hint = " Resource not found or not visible to this user.";
  } else if (status >= 500) {
    hint = " Server-side error.";
  }

  return `Jira API ${status}: ${normalized}${hint}`;
}

function truncateOneLine(input: string, maxLength: number): string {
  const oneLine = input.replace(/\s+/g, " ").trim();
  if (!oneLine) {
    return "Request failed";
  }
  if (oneLine.length <= maxLength) {
    return oneLine;
  }
  return `${oneLine.slice(0, maxLength)}...`;
}

function normalizeRequestError(error: unknown, timeoutMs: number): TrackerApiError {
  if (error instanceof TrackerApiError) {
    return error;
  }
  if (error instanceof Error && error.name === "AbortError") {
    return new TrackerApiError(`Request timeout after ${timeoutMs}ms`, undefined, error);
  }
  return new TrackerApiError(`Request failed: ${String(error)}`, undefined, error);
}
