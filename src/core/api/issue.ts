import { z } from "zod";
import { JiraApiClient, parseResponse } from "./client.js";

export const TrackerIssueSchema = z
  .object({
    id: z.union([z.string(), z.number()]).transform(String).optional(),
    key: z.string(),
    self: z.string().optional(),
  })
  .passthrough();

export type TrackerIssue = z.infer<typeof TrackerIssueSchema>;

const SearchResultSchema = z.object({
  issues: z.array(TrackerIssueSchema).default([]),
});

export async function searchIssues(client: JiraApiClient, input: {
  jql: string;
  startAt?: number;
  maxResults?: number;
  fields?: string[];
}): Promise<TrackerIssue[]> {
  // Atlassian Cloud retired /search in favour of /search/jql, which pages by token.
  const path = client.isCloud ? "/search/jql" : "/search";
  const response = await client.get(path, {
    jql: input.jql,
    startAt: client.isCloud ? undefined : input.startAt,
    maxResults: input.maxResults,
    fields: input.fields?.length ? input.fields.join(",") : "id",
  });
  return parseResponse(SearchResultSchema, response, "issue search").issues;
}

export async function getIssue(client: JiraApiClient, issueKey: string): Promise<TrackerIssue> {
  const response = await client.get(`/issue/${encodeURIComponent(issueKey)}`, { fields: "summary" });
  return parseResponse(TrackerIssueSchema, response, "issue");
}

export async function createIssue(client: JiraApiClient, fields: Record<string, unknown>): Promise<TrackerIssue> {
  const response = await client.post("/issue", { fields });
  return parseResponse(TrackerIssueSchema, response, "issue creation");
}

export async function createIssueLink(client: JiraApiClient, input: {
  type: string;
  inwardIssueKey: string;
  outwardIssueKey: string;
}): Promise<void> {
  await client.post("/issueLink", {
    type: { name: input.type },
    inwardIssue: { key: input.inwardIssueKey },
    outwardIssue: { key: input.outwardIssueKey },
  });
}
