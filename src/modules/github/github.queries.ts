/**
 * GitHub GraphQL documents
 */

export const SEARCH_REPOSITORIES_QUERY = `
query SearchRepos($query: String!, $first: Int!, $after: String) {
  rateLimit {
    remaining
    resetAt
    cost
  }
  search(query: $query, type: REPOSITORY, first: $first, after: $after) {
    repositoryCount
    pageInfo {
      hasNextPage
      endCursor
    }
    nodes {
      ... on Repository {
        id
        nameWithOwner
        name
        owner { login }
        description
        primaryLanguage { name }
        isPrivate
        stargazerCount
        createdAt
        updatedAt
      }
    }
  }
}
`;
