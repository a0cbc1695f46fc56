import { CliError } from "../errors.js";

export type IssueLinkRequest = {
  issueKey: string;
  type: string;
};

/**
 * Groups `FIELD=VALUE` directives by field, keeping the order values were
 * given in. Only the field part is trimmed.
 */
export function parseFieldAssignments(entries: readonly string[]): Map<string, string[]> {
  const result = new Map<string, string[]>();
  for (const entry of entries) {
    const [key, value] = splitDirective(entry, "=", "--set", "FIELD=VALUE");
    const values = result.get(key) ?? [];
    values.push(value);
    result.set(key, values);
  }
  return result;
}

/** `ISSUE:LINK_TYPE` directives; a repeated issue keeps its last link type. */
export function parseLinkRequests(entries: readonly string[]): IssueLinkRequest[] {
  const byIssue = new Map<string, string>();
  for (const entry of entries) {
    const [issueKey, type] = splitDirective(entry, ":", "--link", "ISSUE:LINK_TYPE");
    if (!type) {
      throw new CliError(`Invalid --link value: ${entry}. Link type is empty.`);
    }
    byIssue.set(issueKey, type);
  }
  return Array.from(byIssue, ([issueKey, type]) => ({ issueKey, type }));
}

function splitDirective(entry: string, delimiter: string, flag: string, usage: string): [string, string] {
  const index = entry.indexOf(delimiter);
  if (index < 0) {
    throw new CliError(`Invalid ${flag} value: ${entry}. Use ${usage}.`);
  }
  const key = entry.slice(0, index).trim();
  if (!key) {
    throw new CliError(`Invalid ${flag} value: ${entry}. Use ${usage}.`);
  }
  return [key, entry.slice(index + 1)];
}
