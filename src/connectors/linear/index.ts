// Source
export {
  buildIssueFilter,
  createLinearSource,
  LinearSource,
  toNormalizedRecord,
} from "./source.js";
export type { LinearGraphQLClientOptions } from "./graphql.js";
// GraphQL client (for advanced use / testing)
export { LinearGraphQLClient } from "./graphql.js";
// Types
export type {
  IssueFilter,
  IssueNode,
  LinearApi,
  LinearConfig,
  PaginatedResponse,
  TeamNode,
  ViewerNode,
} from "./types.js";
export {
  DEFAULT_LINEAR_LABELS,
  DEFAULT_LINEAR_PAGE_SIZE,
  PRIORITY_LABELS,
} from "./types.js";
