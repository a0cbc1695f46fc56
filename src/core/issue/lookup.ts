import type { IssueTracker, TrackerIssue, TrackerProject, TrackerUser } from "../api/tracker.js";
import { describeError } from "../errors.js";
import type { Logger } from "../output/logger.js";

export async function lookupProject(
  tracker: IssueTracker,
  logger: Logger,
  projectKey: string
): Promise<TrackerProject | undefined> {
  try {
    const project = await tracker.getProject(projectKey);
    logger.info(`Successfully acquired project info: key='${project.key}', name='${project.name}'`);
    return project;
  } catch (error) {
    logger.error(`Failed to find Jira project with key='${projectKey}'. Error: ${describeError(error)}`);
    return undefined;
  }
}

/**
 * Finds a user by e-mail address or display name. The first search hit is
 * only accepted when one of the two matches the identifier exactly.
 */
export async function lookupUser(
  tracker: IssueTracker,
  logger: Logger,
  identifier: string
): Promise<TrackerUser | undefined> {
  logger.info(`Searching for user with email='${identifier}'`);
  let user: TrackerUser | undefined;
  try {
    const [candidate] = await tracker.searchUsers(identifier, 1);
    if (candidate && (candidate.emailAddress === identifier || candidate.displayName === identifier)) {
      user = candidate;
      logger.info(`Successfully found user: ${candidate.displayName ?? candidate.accountId}`);
    }
  } catch (error) {
    logger.error(`Failed to find Jira user. Error: ${describeError(error)}`);
  }
  if (!user) {
    logger.warn(`Failed to find user for the given email='${identifier}'`);
  }
  return user;
}

export function buildIssueTypeJql(issueType: string, project?: string): string {
  const clauses = [`issuetype=${quoteJql(issueType)}`];
  if (project) {
    clauses.push(`project=${quoteJql(project)}`);
  }
  return clauses.join(" AND ");
}

/** First issue of the given type, optionally inside one project. */
export async function findIssueByTypeAndProject(
  tracker: IssueTracker,
  issueType: string,
  project?: string
): Promise<TrackerIssue | undefined> {
  const [issue] = await tracker.searchIssues({
    jql: buildIssueTypeJql(issueType, project),
    startAt: 0,
    maxResults: 1,
  });
  return issue;
}

function quoteJql(value: string): string {
  return `"${value.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`;
}
