export function buildIssueBrowseUrl(server: string, issueKey: string): string {
  const normalizedServer = server.replace(/\/+$/, "");
  return `${normalizedServer}/browse/${issueKey}`;
}
