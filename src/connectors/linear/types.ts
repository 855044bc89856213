/** Linear adapter type definitions. */

import { z } from "zod";

// ─── Configuration ───

export interface LinearConfig {
  apiKey: string;
  /** Only issues carrying one of these labels are treated as CVE trackers. */
  labels: string[];
  pageSize?: number;
}

export const DEFAULT_LINEAR_LABELS = ["Security"];
export const DEFAULT_LINEAR_PAGE_SIZE = 100;

// ─── GraphQL Response Shapes ───

export const pageInfoSchema = z.object({
  hasNextPage: z.boolean(),
  endCursor: z.string().nullable(),
});

export const viewerNodeSchema = z.object({
  id: z.string(),
  name: z.string(),
  email: z.string(),
});

export const viewerResponseSchema = z.object({ viewer: viewerNodeSchema });

export const teamNodeSchema = z.object({
  id: z.string(),
  key: z.string(),
  name: z.string(),
});

export const teamsResponseSchema = z.object({
  teams: z.object({ nodes: z.array(teamNodeSchema), pageInfo: pageInfoSchema }),
});

const displayNameSchema = z.object({ displayName: z.string() }).nullable();

export const issueNodeSchema = z.object({
  identifier: z.string().min(1),
  title: z.string(),
  priority: z.number(),
  dueDate: z.string().nullable(),
  createdAt: z.string(),
  updatedAt: z.string(),
  completedAt: z.string().nullable(),
  canceledAt: z.string().nullable(),
  slaBreachesAt: z.string().nullable(),
  state: z.object({ name: z.string(), type: z.string() }).nullable(),
  assignee: displayNameSchema,
  creator: displayNameSchema,
  team: z.object({ key: z.string() }),
  labels: z.object({ nodes: z.array(z.object({ name: z.string() })) }),
});

export const issuesResponseSchema = z.object({
  issues: z.object({ nodes: z.array(issueNodeSchema), pageInfo: pageInfoSchema }),
});

export type PageInfo = z.infer<typeof pageInfoSchema>;
export type ViewerNode = z.infer<typeof viewerNodeSchema>;
export type TeamNode = z.infer<typeof teamNodeSchema>;
export type IssueNode = z.infer<typeof issueNodeSchema>;
export type TeamsResponse = z.infer<typeof teamsResponseSchema>;

export interface PaginatedResponse<T> {
  nodes: T[];
  pageInfo: PageInfo;
}

/** Subset of Linear's IssueFilter input used by the adapter. */
export interface IssueFilter {
  team: { key: { in: string[] } };
  updatedAt?: { gte: string };
  labels?: { some: { name: { in: string[] } } };
}

// ─── API Port ───

/** The slice of the Linear API the adapter uses. */
export interface LinearApi {
  viewer(): Promise<ViewerNode>;
  issuePage(
    filter: IssueFilter,
    first: number,
    after: string | null,
  ): Promise<PaginatedResponse<IssueNode>>;
  teams(): Promise<TeamNode[]>;
}

// ─── Priority mapping ───

export const PRIORITY_LABELS: Record<number, string> = {
  0: "None",
  1: "Urgent",
  2: "High",
  3: "Medium",
  4: "Low",
};
