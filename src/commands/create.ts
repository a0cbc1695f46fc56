import { Command } from "commander";
import { JiraApiClient } from "../core/api/client.js";
import { JiraTracker } from "../core/api/tracker.js";
import { LoginInfo, resolveLoginInfo } from "../core/auth/login.js";
import { JiraIssueConfig } from "../core/config/schema.js";
import { loadConfig, maskToken } from "../core/config/store.js";
import { describeFields, runCreateIssue } from "../core/issue/run.js";
import { createLogger, Logger } from "../core/output/logger.js";
import { printJson } from "../core/output/print.js";

type CreateOptions = {
  jiraServer?: string;
  jiraUser?: string;
  jiraToken?: string;
  show_fields?: boolean;
  issue_type?: string;
  issue_project?: string;
  set?: string[];
  link?: string[];
  dryRun?: boolean;
  verbose?: boolean;
  config?: string;
};

export function registerCreateCommand(program: Command): void {
  program
    .option("-s, --jira-server <url>", "Jira API server address (overrides JIRA_API_SERVER)")
    .option("-u, --jira-user <user>", "Jira API login user name (overrides JIRA_API_USERNAME)")
    .option("-t, --jira-token <token>", "Jira API token (overrides JIRA_API_TOKEN)")
    .option("--show_fields", "Show all fields (narrow with --issue_type and --issue_project)")
    .option("--issue_type <type>", "Show the editable fields of an issue of this type")
    .option("--issue_project <project>", "Project for --issue_type (ignored without it)")
    .option(
      "--set <FIELD=VALUE...>",
      "Field assignment by field id or name, repeatable; values are strings, quote values with spaces"
    )
    .option("--link <ISSUE:LINK_TYPE...>", "Link the new issue to ISSUE, repeatable, e.g. PRJ-100:\"Is part of\"")
    .option("--dry-run", "Print the converted fields instead of creating the issue")
    .option("-v, --verbose", "Log debug output")
    .option("--config <path>", "Config file path (default ~/.jira-issue/config.json)")
    .action(async (options: CreateOptions) => {
      const config = loadConfig(options.config);
      const logger = createLogger({
        level: options.verbose ? "debug" : config.log.level,
        color: config.log.color,
      });
      const login = resolveLoginInfo({
        server: options.jiraServer,
        user: options.jiraUser,
        token: options.jiraToken,
      });
      const tracker = connectTracker(login, config, logger);

      if (options.show_fields) {
        const fields = await describeFields(tracker, {
          issueType: options.issue_type,
          issueProject: options.issue_project,
        });
        printJson(fields, { sortKeys: true });
        return;
      }

      const outcome = await runCreateIssue(
        { tracker, logger, login, integerFields: config.fields.integer },
        {
          assignments: options.set ?? [],
          links: options.link ?? [],
          dryRun: options.dryRun,
        }
      );
      if (outcome.status === "dry-run") {
        printJson(outcome.fields, { sortKeys: true });
      }
    });
}

function connectTracker(login: LoginInfo, config: JiraIssueConfig, logger: Logger): JiraTracker {
  const client = new JiraApiClient({ login, timeoutMs: config.api.timeoutMs });
  logger.info(`Jira client configured (server=${login.server}, username=${login.user})`);
  logger.debug(`Using token ${maskToken(login.token)}`);
  return new JiraTracker(client);
}
