import { GraphqlResponseError } from "@octokit/graphql";
import { RequestError } from "@octokit/request-error";

import { EmptyPageError, SourceError, TransportError, toError } from "./errors";
import { buildSearchQuery } from "./query";
import type { RateLimiter } from "./rate-limiter";
import type {
  FetchPage,
  GraphqlClient,
  PageResult,
  RateLimitSnapshot,
  SearchQueryResponse,
  SearchRepositoryNode,
} from "./types";

interface PageFetcherParams {
  graphqlClient: GraphqlClient;
  minStars: number;
  rateLimiter?: RateLimiter;
  signal?: AbortSignal;
  debug?: boolean;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function readRateLimit(value: unknown): RateLimitSnapshot | null {
  if (!isRecord(value)) {
    return null;
  }
  const { remaining, resetAt, cost } = value;
  if (typeof remaining !== "number" || typeof resetAt !== "string") {
    return null;
  }
  return { remaining, resetAt, cost: typeof cost === "number" ? cost : 0 };
}

/**
 * Reads the search connection out of a (possibly partial) response body.
 * Returns null when there is no connection or it holds no repository nodes.
 */
export function extractPage(data: unknown): PageResult | null {
  if (!isRecord(data) || !isRecord(data.search)) {
    return null;
  }
  const search = data.search;
  const rawNodes = Array.isArray(search.nodes) ? search.nodes : [];
  const nodes = rawNodes.filter(
    (node): node is SearchRepositoryNode => isRecord(node) && Object.keys(node).length > 0
  );
  if (nodes.length === 0) {
    return null;
  }
  const pageInfo: Record<string, unknown> = isRecord(search.pageInfo) ? search.pageInfo : {};
  const endCursor = typeof pageInfo.endCursor === "string" ? pageInfo.endCursor : null;
  return {
    nodes,
    nextCursor: endCursor,
    hasMore: pageInfo.hasNextPage === true && endCursor !== null,
    totalCount: typeof search.repositoryCount === "number" ? search.repositoryCount : null,
    rateLimit: readRateLimit(data.rateLimit),
  };
}

function translateError(error: unknown): Error {
  if (error instanceof GraphqlResponseError) {
    const rateLimited = error.errors?.some((entry) => entry.type === "RATE_LIMITED") ?? false;
    return new SourceError(error.message, extractPage(error.data), rateLimited);
  }
  if (error instanceof RequestError) {
    return new TransportError(`HTTP ${error.status}: ${error.message}`, error.status);
  }
  const normalized = toError(error);
  if (normalized.name === "AbortError") {
    return normalized;
  }
  return new TransportError(normalized.message);
}

export function createPageFetcher({
  graphqlClient,
  minStars,
  rateLimiter,
  signal,
  debug,
}: PageFetcherParams): FetchPage {
  return async (cursor, pageSize) => {
    await rateLimiter?.checkAndWait(signal);

    const { query, variables } = buildSearchQuery({ minStars, pageSize, cursor });
    if (debug) {
      console.log(`[search] first=${variables.first} after=${cursor ?? "start"} q="${variables.searchQuery}"`);
    }

    let response: SearchQueryResponse;
    try {
      response = await graphqlClient<SearchQueryResponse>(query, {
        ...variables,
        request: { signal },
      });
    } catch (error) {
      const translated = translateError(error);
      if (translated instanceof SourceError && translated.partial) {
        rateLimiter?.updateFromSnapshot(translated.partial.rateLimit);
      }
      throw translated;
    }

    rateLimiter?.updateFromSnapshot(response.rateLimit);

    if (!response.search) {
      throw new SourceError("Response did not include a search connection");
    }

    const page = extractPage(response);
    if (!page) {
      throw new EmptyPageError(`Source returned no repositories after cursor ${cursor ?? "start"}`);
    }

    if (debug) {
      console.log(
        `[search] received ${page.nodes.length} nodes (hasNextPage=${page.hasMore}, total=${page.totalCount ?? "unknown"})`
      );
    }

    return page;
  };
}
