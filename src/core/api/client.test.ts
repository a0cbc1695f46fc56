import { describe, expect, it } from "vitest";
import { TrackerApiError } from "../errors.js";
import { FetchLike, JiraApiClient } from "./client.js";
import { JiraTracker } from "./tracker.js";

type Call = { url: string; init: RequestInit };

function fakeFetch(status: number, body: unknown, calls: Call[] = []): FetchLike {
  return async (url, init) => {
    calls.push({ url, init });
    return new Response(typeof body === "string" ? body : JSON.stringify(body), {
      status,
      headers: { "content-type": typeof body === "string" ? "text/plain" : "application/json" },
    });
  };
}

function makeClient(server: string, fetch: FetchLike): JiraApiClient {
  return new JiraApiClient({
    login: { server, user: "test.user@example.com", token: "test-secret" },
    timeoutMs: 1000,
    fetch,
  });
}

describe("JiraApiClient", () => {
  it("sends basic auth to the v2 API", async () => {
    const calls: Call[] = [];
    const client = makeClient("https://jira.example.com/", fakeFetch(200, [{ id: "summary" }], calls));

    await expect(client.get("/field", { expand: undefined })).resolves.toEqual([{ id: "summary" }]);

    expect(calls).toHaveLength(1);
    expect(calls[0]?.url).toBe("https://jira.example.com/rest/api/2/field");
    expect(calls[0]?.init.method).toBe("GET");
    expect(calls[0]?.init.headers).toMatchObject({
      Authorization: `Basic ${Buffer.from("test.user@example.com:test-secret").toString("base64")}`,
    });
  });

  it("joins Jira error messages", async () => {
    const client = makeClient(
      "https://jira.example.com",
      fakeFetch(400, { errorMessages: ["Bad request"], errors: { summary: "Field is required" } })
    );

    const failure = client.post("/issue", { fields: {} });
    await expect(failure).rejects.toBeInstanceOf(TrackerApiError);
    await expect(failure).rejects.toThrow("Jira API 400: Bad request; summary: Field is required");
  });

  it("adds a hint to authentication failures", async () => {
    const client = makeClient("https://jira.example.com", fakeFetch(401, "Unauthorized"));
    await expect(client.get("/field")).rejects.toThrow(
      "Jira API 401: Unauthorized Check user name, API token and permissions."
    );
  });

  it("wraps transport failures", async () => {
    const client = makeClient("https://jira.example.com", async () => {
      throw new TypeError("fetch failed");
    });
    await expect(client.get("/field")).rejects.toThrow("Request failed: TypeError: fetch failed");
  });
});

describe("JiraTracker", () => {
  it("posts issue links with inward and outward keys", async () => {
    const calls: Call[] = [];
    const tracker = new JiraTracker(makeClient("https://jira.example.com", fakeFetch(201, "", calls)));

    await tracker.createIssueLink("Is part of", "PRJ-100", "PRJ-5");

    expect(calls[0]?.url).toBe("https://jira.example.com/rest/api/2/issueLink");
    expect(calls[0]?.init.body).toBe(
      JSON.stringify({ type: { name: "Is part of" }, inwardIssue: { key: "PRJ-100" }, outwardIssue: { key: "PRJ-5" } })
    );
  });

  it("searches through /search/jql on Atlassian Cloud", async () => {
    const calls: Call[] = [];
    const tracker = new JiraTracker(
      makeClient("https://example.atlassian.net", fakeFetch(200, { issues: [{ id: "10001", key: "PRJ-1" }] }, calls))
    );

    const issues = await tracker.searchIssues({ jql: 'issuetype="Task"', startAt: 0, maxResults: 1 });

    expect(issues).toEqual([{ id: "10001", key: "PRJ-1" }]);
    const url = new URL(calls[0]?.url ?? "");
    expect(url.pathname).toBe("/rest/api/2/search/jql");
    expect(url.searchParams.get("jql")).toBe('issuetype="Task"');
    expect(url.searchParams.get("maxResults")).toBe("1");
    expect(url.searchParams.has("startAt")).toBe(false);
  });

  it("pages /search by offset elsewhere", async () => {
    const calls: Call[] = [];
    const tracker = new JiraTracker(makeClient("https://jira.example.com", fakeFetch(200, { issues: [] }, calls)));

    await tracker.searchIssues({ jql: "project=PRJ", startAt: 0, maxResults: 1 });

    const url = new URL(calls[0]?.url ?? "");
    expect(url.pathname).toBe("/rest/api/2/search");
    expect(url.searchParams.get("startAt")).toBe("0");
    expect(url.searchParams.get("fields")).toBe("id");
  });

  it("rejects responses of the wrong shape", async () => {
    const tracker = new JiraTracker(makeClient("https://jira.example.com", fakeFetch(200, { name: "No key" })));
    await expect(tracker.getProject("PRJ")).rejects.toThrow(/^Unexpected project response at key: /);
  });

  it("returns the edit metadata fields", async () => {
    const calls: Call[] = [];
    const tracker = new JiraTracker(
      makeClient("https://jira.example.com", fakeFetch(200, { fields: { summary: { name: "Summary" } } }, calls))
    );

    await expect(tracker.getEditMeta("PRJ-1")).resolves.toEqual({ summary: { name: "Summary" } });
    expect(calls[0]?.url).toBe("https://jira.example.com/rest/api/2/issue/PRJ-1/editmeta");
  });
});
