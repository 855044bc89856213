// Source
export type { JiraSourceOptions } from "./source.js";
export { buildJql, createJiraSource, formatJqlDate, JiraSource } from "./source.js";
// REST client (for advanced use / testing)
export type { JiraRestClientOptions } from "./client.js";
export { JiraRestClient } from "./client.js";
// Mapping
export type { JiraFieldIds } from "./mapping.js";
export { parseJiraDate, projectKeyFromIssueKey, toNormalizedRecord } from "./mapping.js";
// Types
export type {
  JiraApi,
  JiraConfig,
  JiraIssue,
  JiraProject,
  JiraSearchRequest,
  JiraSearchResponse,
  JiraUser,
} from "./types.js";
export {
  DEFAULT_JIRA_LABELS,
  DEFAULT_PAGE_SIZE,
  DEFAULT_SEVERITY_FIELD,
  DEFAULT_SLA_FIELD,
} from "./types.js";
