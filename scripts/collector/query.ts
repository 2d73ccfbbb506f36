export const MAX_PAGE_SIZE = 100;

export interface SearchQueryParams {
  minStars: number;
  pageSize: number;
  cursor: string | null;
}

export interface SearchQuery {
  query: string;
  variables: {
    searchQuery: string;
    first: number;
    cursor: string | null;
  };
}

const SEARCH_REPOSITORIES_QUERY = /* GraphQL */ `
  query ($searchQuery: String!, $first: Int!, $cursor: String) {
    search(query: $searchQuery, type: REPOSITORY, first: $first, after: $cursor) {
      repositoryCount
      nodes {
        ... on Repository {
          name
          url
          owner {
            login
          }
          createdAt
          updatedAt
          stargazerCount
          primaryLanguage {
            name
          }
          pullRequests(states: MERGED) {
            totalCount
          }
          releases {
            totalCount
          }
          issues {
            totalCount
          }
          closedIssues: issues(states: CLOSED) {
            totalCount
          }
        }
      }
      pageInfo {
        hasNextPage
        endCursor
      }
    }
    rateLimit {
      remaining
      resetAt
      cost
    }
  }
`;

export function clampPageSize(pageSize: number): number {
  if (!Number.isFinite(pageSize)) {
    return MAX_PAGE_SIZE;
  }
  return Math.min(MAX_PAGE_SIZE, Math.max(1, Math.floor(pageSize)));
}

export function buildSearchString(minStars: number): string {
  return `stars:>${minStars} sort:stars-desc`;
}

export function buildSearchQuery({ minStars, pageSize, cursor }: SearchQueryParams): SearchQuery {
  return {
    query: SEARCH_REPOSITORIES_QUERY,
    variables: {
      searchQuery: buildSearchString(minStars),
      first: clampPageSize(pageSize),
      cursor,
    },
  };
}
