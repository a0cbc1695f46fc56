import { EmptyValueError, MissingVariableError } from "../errors.js";

export type LoginInfo = Readonly<{
  server: string;
  user: string;
  token: string;
}>;

export type LoginArguments = {
  server?: string;
  user?: string;
  token?: string;
};

export const LOGIN_ENV_VARIABLES = {
  server: "JIRA_API_SERVER",
  user: "JIRA_API_USERNAME",
  token: "JIRA_API_TOKEN",
} as const;

const EMPTY_MESSAGES: Record<keyof LoginArguments, string> = {
  server: "Jira API server name is empty",
  user: "Jira API user name is empty",
  token: "Jira API secure token string is empty",
};

/**
 * Builds the login triple. An explicit argument always wins over its
 * environment variable; an empty string counts as provided and is rejected.
 */
export function resolveLoginInfo(explicit: LoginArguments, env: NodeJS.ProcessEnv = process.env): LoginInfo {
  return Object.freeze({
    server: resolveCredential("server", explicit.server, env),
    user: resolveCredential("user", explicit.user, env),
    token: resolveCredential("token", explicit.token, env),
  });
}

function resolveCredential(name: keyof LoginArguments, provided: string | undefined, env: NodeJS.ProcessEnv): string {
  const variable = LOGIN_ENV_VARIABLES[name];
  const value = provided ?? env[variable];
  if (value === undefined) {
    throw new MissingVariableError(variable);
  }
  if (value.length === 0) {
    throw new EmptyValueError(EMPTY_MESSAGES[name]);
  }
  return value;
}
