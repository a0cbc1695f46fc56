import type { IssueTracker } from "../api/tracker.js";
import { describeError } from "../errors.js";
import type { FieldValue } from "../fields/convert.js";
import type { Logger } from "../output/logger.js";
import type { IssueLinkRequest } from "../utils/args.js";
import { buildIssueBrowseUrl } from "../utils/web-url.js";

export type LinkOutcome = IssueLinkRequest & {
  linked: boolean;
  error?: string;
};

export type SubmissionResult =
  | { created: true; issueKey: string; url: string; links: LinkOutcome[] }
  | { created: false; error: string; links: [] };

/**
 * Creates the issue, then applies each link on its own. Failures are logged
 * and reported in the result; nothing already created is rolled back.
 */
export async function submitIssue(
  tracker: IssueTracker,
  logger: Logger,
  input: {
    server: string;
    fields: Record<string, FieldValue>;
    links: readonly IssueLinkRequest[];
  }
): Promise<SubmissionResult> {
  let issueKey: string;
  try {
    const issue = await tracker.createIssue(input.fields);
    issueKey = issue.key;
  } catch (error) {
    const message = describeError(error);
    logger.error(`Failed to create issue. Error: ${message}`);
    return { created: false, error: message, links: [] };
  }

  const url = buildIssueBrowseUrl(input.server, issueKey);
  logger.info(`Successfully created a new issue: ${url}`);

  const links: LinkOutcome[] = [];
  for (const link of input.links) {
    links.push(await applyLink(tracker, logger, issueKey, link));
  }

  return { created: true, issueKey, url, links };
}

async function applyLink(
  tracker: IssueTracker,
  logger: Logger,
  originKey: string,
  link: IssueLinkRequest
): Promise<LinkOutcome> {
  try {
    const destination = await tracker.getIssue(link.issueKey);
    await tracker.createIssueLink(link.type, originKey, destination.key);
    logger.info(`Successfully linked issue key='${originKey}' to issue key='${destination.key}', by type='${link.type}'`);
    return { ...link, linked: true };
  } catch (error) {
    const message = describeError(error);
    logger.error(`Failed to link issue ${originKey} to ${link.issueKey}. Error: ${message}`);
    return { ...link, linked: false, error: message };
  }
}
