/** Jira adapter type definitions. */

import { z } from "zod";

// ─── Configuration ───

export interface JiraConfig {
  server: string;
  /** Personal access token, sent as a bearer token. */
  apiToken: string;
  /** Only issues carrying one of these labels are treated as CVE trackers. */
  labels: string[];
  /** Custom field holding the severity. */
  severityField: string;
  /** Custom field holding the SLA target date. */
  slaField: string;
  pageSize?: number;
  maxRetries?: number;
}

export const DEFAULT_JIRA_LABELS = ["Security", "SecurityTracking"];
export const DEFAULT_SEVERITY_FIELD = "customfield_12316142";
export const DEFAULT_SLA_FIELD = "customfield_12326740";
export const DEFAULT_PAGE_SIZE = 100;

/** Standard fields requested on every search, custom fields are appended. */
export const BASE_SEARCH_FIELDS = [
  "summary",
  "status",
  "resolution",
  "priority",
  "assignee",
  "severity",
  "reporter",
  "created",
  "updated",
  "resolutiondate",
  "duedate",
  "project",
  "labels",
];

// ─── REST Response Shapes (validated) ───

export const jiraIssueSchema = z.object({
  key: z.string().min(1),
  fields: z.record(z.string(), z.unknown()),
});

export const jiraSearchResponseSchema = z.object({
  startAt: z.number().optional(),
  maxResults: z.number().optional(),
  total: z.number().optional(),
  issues: z.array(jiraIssueSchema),
});

export const jiraUserSchema = z.object({
  name: z.string().optional(),
  displayName: z.string().optional(),
});

export const jiraProjectSchema = z.object({
  id: z.string().optional(),
  key: z.string(),
  name: z.string(),
});

export const jiraProjectListSchema = z.array(jiraProjectSchema);

export type JiraIssue = z.infer<typeof jiraIssueSchema>;
export type JiraSearchResponse = z.infer<typeof jiraSearchResponseSchema>;
export type JiraUser = z.infer<typeof jiraUserSchema>;
export type JiraProject = z.infer<typeof jiraProjectSchema>;

// ─── API Port ───

export interface JiraSearchRequest {
  jql: string;
  startAt: number;
  maxResults: number;
  fields: string[];
}

/** The slice of the Jira REST API the adapter uses. */
export interface JiraApi {
  myself(): Promise<JiraUser>;
  searchIssues(request: JiraSearchRequest): Promise<JiraSearchResponse>;
  listProjects(): Promise<JiraProject[]>;
}
