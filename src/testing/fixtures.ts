import type { FakeTrackerState } from "./fake-tracker.js";

export const GLOBAL_FIELDS: Record<string, unknown>[] = [
  { id: "project", key: "project", name: "Project", schema: { type: "project", system: "project" } },
  { id: "issuetype", key: "issuetype", name: "Issue Type", schema: { type: "issuetype", system: "issuetype" } },
  { id: "summary", key: "summary", name: "Summary", schema: { type: "string", system: "summary" } },
  { id: "assignee", key: "assignee", name: "Assignee", schema: { type: "user", system: "assignee" } },
  { id: "labels", key: "labels", name: "Labels", schema: { type: "array", items: "string", system: "labels" } },
  { id: "components", key: "components", name: "Component/s", schema: { type: "array", items: "component" } },
  { id: "timetracking", key: "timetracking", name: "Time tracking", schema: { type: "timetracking" } },
  { id: "priority", key: "priority", name: "Priority", schema: { type: "priority", system: "priority" } },
  { id: "customfield_10113", key: "customfield_10113", name: "Story Points", schema: { type: "number" } },
  { id: "customfield_10200", key: "customfield_10200", name: "IP Type", schema: { type: "option" } },
  { id: "customfield_10300", key: "customfield_10300", name: "Platforms", schema: { type: "array", items: "option" } },
  { id: "customfield_10400", key: "customfield_10400", name: "Epic Link", schema: { type: "any" } },
];

export const TASK_EDIT_META: Record<string, Record<string, unknown>> = {
  customfield_10200: {
    key: "customfield_10200",
    name: "IP Type",
    schema: { type: "option" },
    allowedValues: [
      { id: "501", value: "Customer Specific IP" },
      { id: "502", value: "Generic IP" },
    ],
  },
  customfield_10300: {
    key: "customfield_10300",
    name: "Platforms",
    schema: { type: "array", items: "option" },
    allowedValues: [
      { id: "601", value: "Linux" },
      { id: "602", value: "Windows" },
    ],
  },
  priority: {
    key: "priority",
    name: "Priority",
    schema: { type: "priority" },
    allowedValues: [
      { id: "1", name: "High" },
      { id: "3", name: "Medium" },
    ],
  },
  components: {
    key: "components",
    name: "Component/s",
    schema: { type: "array", items: "component" },
    allowedValues: [{ id: "700", name: "Domain_X" }],
  },
};

export function trackerState(overrides: FakeTrackerState = {}): FakeTrackerState {
  return {
    fields: GLOBAL_FIELDS,
    editMeta: { "PRJ-1": TASK_EDIT_META },
    issues: [{ key: "PRJ-1", issuetype: "Task", project: "PRJ" }],
    projects: [{ key: "PRJ", name: "Project X" }],
    users: [{ accountId: "acc-1", displayName: "Test User", emailAddress: "test.user@example.com" }],
    nextIssueKey: "PRJ-100",
    ...overrides,
  };
}
