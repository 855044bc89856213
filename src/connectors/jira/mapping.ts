/**
 * Best-effort mapping from a Jira issue to a NormalizedRecord.
 *
 * Jira field values are loosely shaped (custom fields especially), so every
 * reader here accepts `unknown` and falls back to null. Mapping never throws.
 */

import { extractCveIds } from "../cve.js";
import type { NormalizedRecord } from "../types.js";
import type { JiraIssue } from "./types.js";

export interface JiraFieldIds {
  severityField: string;
  slaField: string;
}

export function toNormalizedRecord(
  issue: JiraIssue,
  fieldIds: JiraFieldIds,
): NormalizedRecord {
  const fields = issue.fields;
  const summary = readString(fields.summary);

  return {
    sourceKey: issue.key,
    sourceType: "jira",
    projectKey: readProperty(fields.project, "key") ?? projectKeyFromIssueKey(issue.key),
    summary,
    status: readProperty(fields.status, "name"),
    resolution: readProperty(fields.resolution, "name"),
    priority: readProperty(fields.priority, "name"),
    severity: readOptionValue(fields[fieldIds.severityField]),
    assignee: readUserName(fields.assignee),
    reporter: readUserName(fields.reporter),
    createdDate: parseJiraDate(fields.created),
    updatedDate: parseJiraDate(fields.updated),
    resolvedDate: parseJiraDate(fields.resolutiondate),
    dueDate: parseJiraDate(fields.duedate),
    slaDate: parseJiraDate(fields[fieldIds.slaField]),
    cveIds: extractCveIds(summary),
    labels: readLabels(fields.labels),
    customFields: collectCustomFields(fields),
  };
}

/**
 * Parse a Jira timestamp. Jira writes offsets without a colon
 * ("2024-01-10T10:00:00.000+0000"), which is normalized before parsing.
 */
export function parseJiraDate(value: unknown): Date | null {
  if (typeof value !== "string" || value.trim() === "") return null;
  const normalized = value.trim().replace(/([+-]\d{2})(\d{2})$/, "$1:$2");
  const date = new Date(normalized);
  return Number.isNaN(date.getTime()) ? null : date;
}

/** "PROJ-1234" → "PROJ". */
export function projectKeyFromIssueKey(issueKey: string): string {
  const dash = issueKey.lastIndexOf("-");
  return dash > 0 ? issueKey.slice(0, dash) : issueKey;
}

// ─── Readers ───

function readString(value: unknown): string | null {
  if (typeof value !== "string") return null;
  return value.length > 0 ? value : null;
}

function readProperty(value: unknown, property: string): string | null {
  if (typeof value !== "object" || value === null) return null;
  const entry: unknown = Reflect.get(value, property);
  return readString(entry);
}

function readUserName(value: unknown): string | null {
  return readProperty(value, "displayName") ?? readProperty(value, "name");
}

/** Select-list custom fields come as `{ value }`, `{ name }` or a bare string. */
function readOptionValue(value: unknown): string | null {
  if (typeof value === "string") return value.trim() || null;
  return readProperty(value, "value") ?? readProperty(value, "name");
}

function readLabels(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value.filter((label): label is string => typeof label === "string");
}

function collectCustomFields(
  fields: Record<string, unknown>,
): Record<string, unknown> {
  const custom: Record<string, unknown> = {};
  for (const [name, value] of Object.entries(fields)) {
    if (name.startsWith("customfield_") && value != null) {
      custom[name] = value;
    }
  }
  return custom;
}
