import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { JiraIssueConfig, JiraIssueConfigSchema } from "./schema.js";
import { CliError } from "../errors.js";

const CONFIG_DIR_NAME = ".jira-issue";
const CONFIG_FILE_NAME = "config.json";

export function getConfigDir(): string {
  return path.join(os.homedir(), CONFIG_DIR_NAME);
}

export function getConfigPath(): string {
  return path.join(getConfigDir(), CONFIG_FILE_NAME);
}

export function getDefaultConfig(): JiraIssueConfig {
  return JiraIssueConfigSchema.parse({});
}

export function loadConfig(configPath: string = getConfigPath()): JiraIssueConfig {
  if (!fs.existsSync(configPath)) {
    return getDefaultConfig();
  }

  let rawParsed: unknown;
  try {
    rawParsed = JSON.parse(fs.readFileSync(configPath, "utf-8"));
  } catch (error) {
    throw new CliError(`Invalid config JSON at ${configPath}. Fix or remove the file.`, error);
  }

  const result = JiraIssueConfigSchema.safeParse(rawParsed);
  if (!result.success) {
    throw new CliError(`Invalid config format: ${formatConfigValidationError(result.error)}`, result.error);
  }
  return result.data;
}

export function maskToken(token?: string): string {
  if (!token) {
    return "(not set)";
  }
  if (token.length <= 8) {
    return "*".repeat(token.length);
  }
  return `${token.slice(0, 4)}${"*".repeat(token.length - 8)}${token.slice(-4)}`;
}

function formatConfigValidationError(error: { issues: Array<{ path: Array<string | number>; message: string }> }): string {
  const first = error.issues[0];
  if (!first) {
    return "schema validation failed";
  }
  const where = first.path.length > 0 ? first.path.join(".") : "(root)";
  return `${where}: ${first.message}`;
}
