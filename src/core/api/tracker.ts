import { JiraApiClient } from "./client.js";
import { getEditMeta, listFields } from "./field.js";
import { createIssue, createIssueLink, getIssue, searchIssues, TrackerIssue } from "./issue.js";
import { getProject, TrackerProject } from "./project.js";
import { searchUsers, TrackerUser } from "./user.js";

export type { TrackerIssue, TrackerProject, TrackerUser };

export type IssueSearch = {
  jql: string;
  startAt?: number;
  maxResults?: number;
  fields?: string[];
};

/**
 * The slice of the tracker the tool talks to. Everything above this seam works
 * against the interface so runs can be replayed against an in-memory tracker.
 */
export interface IssueTracker {
  listFields(): Promise<Record<string, unknown>[]>;
  getEditMeta(issueKey: string): Promise<Record<string, Record<string, unknown>>>;
  searchIssues(search: IssueSearch): Promise<TrackerIssue[]>;
  getProject(projectKey: string): Promise<TrackerProject>;
  searchUsers(query: string, maxResults?: number): Promise<TrackerUser[]>;
  getIssue(issueKey: string): Promise<TrackerIssue>;
  createIssue(fields: Record<string, unknown>): Promise<TrackerIssue>;
  createIssueLink(type: string, inwardIssueKey: string, outwardIssueKey: string): Promise<void>;
}

export class JiraTracker implements IssueTracker {
  constructor(private readonly client: JiraApiClient) {}

  listFields(): Promise<Record<string, unknown>[]> {
    return listFields(this.client);
  }

  getEditMeta(issueKey: string): Promise<Record<string, Record<string, unknown>>> {
    return getEditMeta(this.client, issueKey);
  }

  searchIssues(search: IssueSearch): Promise<TrackerIssue[]> {
    return searchIssues(this.client, search);
  }

  getProject(projectKey: string): Promise<TrackerProject> {
    return getProject(this.client, projectKey);
  }

  searchUsers(query: string, maxResults = 1): Promise<TrackerUser[]> {
    return searchUsers(this.client, { query, startAt: 0, maxResults });
  }

  getIssue(issueKey: string): Promise<TrackerIssue> {
    return getIssue(this.client, issueKey);
  }

  createIssue(fields: Record<string, unknown>): Promise<TrackerIssue> {
    return createIssue(this.client, fields);
  }

  createIssueLink(type: string, inwardIssueKey: string, outwardIssueKey: string): Promise<void> {
    return createIssueLink(this.client, { type, inwardIssueKey, outwardIssueKey });
  }
}
