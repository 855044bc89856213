/** GraphQL query strings for the Linear API. */

export const VIEWER_QUERY = /* GraphQL */ `
  query Viewer {
    viewer {
      id
      name
      email
    }
  }
`;

export const TEAMS_QUERY = /* GraphQL */ `
  query Teams($after: String) {
    teams(first: 50, after: $after) {
      nodes {
        id
        key
        name
      }
      pageInfo {
        hasNextPage
        endCursor
      }
    }
  }
`;

export const ISSUES_QUERY = /* GraphQL */ `
  query TrackerIssues($filter: IssueFilter, $first: Int!, $after: String) {
    issues(first: $first, after: $after, filter: $filter, orderBy: updatedAt) {
      nodes {
        identifier
        title
        priority
        dueDate
        createdAt
        updatedAt
        completedAt
        canceledAt
        slaBreachesAt
        state {
          name
          type
        }
        assignee {
          displayName
        }
        creator {
          displayName
        }
        team {
          key
        }
        labels {
          nodes {
            name
          }
        }
      }
      pageInfo {
        hasNextPage
        endCursor
      }
    }
  }
`;
