import type { IssueTracker } from "../api/tracker.js";
import type { LoginInfo } from "../auth/login.js";
import { CliError } from "../errors.js";
import { FieldCatalog } from "../fields/catalog.js";
import { ConversionContext, convertFieldValues, FieldValue } from "../fields/convert.js";
import type { Logger } from "../output/logger.js";
import { renderJson } from "../output/print.js";
import { parseFieldAssignments, parseLinkRequests } from "../utils/args.js";
import { isRecord } from "../utils/records.js";
import { findIssueByTypeAndProject } from "./lookup.js";
import { submitIssue, SubmissionResult } from "./submit.js";

export const REQUIRED_FIELDS = ["issuetype", "project"] as const;

export type RunDependencies = {
  tracker: IssueTracker;
  logger: Logger;
  login: LoginInfo;
  integerFields: readonly string[];
};

export type CreateIssueInput = {
  assignments: readonly string[];
  links: readonly string[];
  dryRun?: boolean;
};

export type CreateIssueOutcome =
  | { status: "dry-run"; fields: Record<string, FieldValue> }
  | { status: "submitted"; fields: Record<string, FieldValue>; submission: SubmissionResult };

/**
 * Parses the directives, converts every field against the live schema and
 * only then touches the tracker. Anything thrown before `submitIssue` leaves
 * the tracker unchanged.
 */
export async function runCreateIssue(deps: RunDependencies, input: CreateIssueInput): Promise<CreateIssueOutcome> {
  const assignments = parseFieldAssignments(input.assignments);
  const links = parseLinkRequests(input.links);

  const fields = await buildFinalFields(deps, assignments);
  deps.logger.debug(renderJson(fields, true));

  if (input.dryRun) {
    return { status: "dry-run", fields };
  }

  const submission = await submitIssue(deps.tracker, deps.logger, {
    server: deps.login.server,
    fields,
    links,
  });
  return { status: "submitted", fields, submission };
}

export async function buildFinalFields(
  deps: RunDependencies,
  assignments: ReadonlyMap<string, readonly string[]>
): Promise<Record<string, FieldValue>> {
  const globalCatalog = FieldCatalog.fromGlobalFields(await deps.tracker.listFields());
  const resolved = globalCatalog.resolveAssignments(assignments);

  const issueType = resolved.get("issuetype")?.[0];
  const project = resolved.get("project")?.[0];
  if (issueType === undefined || project === undefined) {
    throw new CliError(`Fields are not set: ${REQUIRED_FIELDS.join(" and/or ")}`);
  }

  const catalog = await overlayEditMeta(deps, globalCatalog, issueType, project);
  const context: ConversionContext = {
    tracker: deps.tracker,
    logger: deps.logger,
    integerFields: new Set(deps.integerFields),
  };

  const fields: Record<string, FieldValue> = {};
  for (const [id, values] of resolved) {
    const field = catalog.require(id);
    fields[id] = await convertFieldValues(id, values, field, context);
  }
  return fields;
}

async function overlayEditMeta(
  deps: RunDependencies,
  catalog: FieldCatalog,
  issueType: string,
  project: string
): Promise<FieldCatalog> {
  const similarIssue = await findIssueByTypeAndProject(deps.tracker, issueType, project);
  if (!similarIssue) {
    deps.logger.warn(
      `No existing ${issueType} issue in project ${project}; allowed values for enumerated fields are unknown.`
    );
    return catalog;
  }
  deps.logger.debug(`Reading edit metadata of ${similarIssue.key}`);
  return catalog.withEditMeta(await deps.tracker.getEditMeta(similarIssue.key));
}

/**
 * Field schema dump. Without an issue type: every global field as
 * `{name, schema}`; with one: the edit metadata of a matching issue.
 */
export async function describeFields(
  tracker: IssueTracker,
  input: { issueType?: string; issueProject?: string }
): Promise<Record<string, unknown>> {
  if (input.issueType === undefined) {
    const summary: Record<string, unknown> = {};
    for (const field of await tracker.listFields()) {
      const id = field.id;
      if (typeof id !== "string") {
        continue;
      }
      summary[id] = isRecord(field.schema) ? { name: field.name, schema: field.schema } : { name: field.name };
    }
    return summary;
  }

  const issue = await findIssueByTypeAndProject(tracker, input.issueType, input.issueProject);
  if (!issue) {
    throw new CliError(`Wasn't found issues with type: ${input.issueType}`);
  }
  return tracker.getEditMeta(issue.key);
}
