import { ProviderError, toErrorMessage } from "@storyreel/shared";
import type { RedditSettings, RedditSortMode, RedditTimeFilter, Story } from "@storyreel/shared";
import type { Logger } from "../lib/logger";
import { isRecord, joinUrl, requestJson } from "../lib/http";

export const REDDIT_AUTH_URL = "https://www.reddit.com/api/v1/access_token";
export const REDDIT_API_URL = "https://oauth.reddit.com";

const PROVIDER = "reddit";
const TOKEN_EXPIRY_MARGIN_MS = 60_000;

export type FetchPostsOptions = {
  sortMode?: RedditSortMode;
  timeFilter?: RedditTimeFilter;
  limit?: number;
};

export type RedditClient = {
  testConnection(): Promise<boolean>;
  fetchPosts(subreddit: string, options?: FetchPostsOptions): Promise<Story[]>;
  fetchPostById(postId: string): Promise<Story | null>;
  fetchFromMultipleSubreddits(subreddits: readonly string[], options?: FetchPostsOptions): Promise<Story[]>;
};

export type RedditClientConfig = {
  settings: RedditSettings;
  logger: Logger;
  authUrl?: string;
  apiUrl?: string;
  timeoutMs?: number;
  now?: () => number;
};

type CachedToken = { value: string; expiresAt: number };

function readString(record: Record<string, unknown>, key: string, fallback = "") {
  const value = record[key];
  return typeof value === "string" ? value : fallback;
}

function readNumber(record: Record<string, unknown>, key: string) {
  const value = record[key];
  return typeof value === "number" && Number.isFinite(value) ? value : 0;
}

/**
 * Maps one listing child (`{ kind: "t3", data }`) to a Story. Link posts and
 * posts without body text are skipped.
 */
export function postToStory(child: unknown, fetchedAt: string): Story | null {
  const post = isRecord(child) && isRecord(child.data) ? child.data : null;
  if (!post || post.is_self !== true) {
    return null;
  }
  const selftext = readString(post, "selftext");
  if (!selftext.trim()) {
    return null;
  }
  const permalink = readString(post, "permalink");
  return {
    id: readString(post, "id"),
    subreddit: readString(post, "subreddit"),
    title: readString(post, "title"),
    originalText: selftext,
    url: `https://reddit.com${permalink}`,
    author: readString(post, "author") || "[deleted]",
    score: readNumber(post, "score"),
    numComments: readNumber(post, "num_comments"),
    isNsfw: post.over_18 === true,
    createdUtc: readNumber(post, "created_utc"),
    isProcessed: false,
    fetchedAt
  };
}

function listingChildren(payload: unknown): unknown[] {
  const data = isRecord(payload) && isRecord(payload.data) ? payload.data : null;
  return data && Array.isArray(data.children) ? data.children : [];
}

export function buildListingPath(subreddit: string, sortMode: RedditSortMode, timeFilter: RedditTimeFilter, limit: number) {
  const params = new URLSearchParams({ limit: String(limit), raw_json: "1" });
  if (sortMode === "top" || sortMode === "controversial") {
    params.set("t", timeFilter);
  }
  return `/r/${encodeURIComponent(subreddit)}/${sortMode}?${params.toString()}`;
}

/**
 * Application-only OAuth client for public subreddit listings. The access
 * token is fetched on first use and reused until shortly before it expires.
 */
export function createRedditClient(config: RedditClientConfig): RedditClient {
  const { settings } = config;
  const logger = config.logger.child("reddit");
  const authUrl = config.authUrl ?? REDDIT_AUTH_URL;
  const apiUrl = config.apiUrl ?? REDDIT_API_URL;
  const timeoutMs = config.timeoutMs ?? 30_000;
  const now = config.now ?? Date.now;
  let token: CachedToken | null = null;

  const getToken = async () => {
    if (token && token.expiresAt > now()) {
      return token.value;
    }
    const basic = Buffer.from(`${settings.clientId}:${settings.clientSecret}`).toString("base64");
    const payload = await requestJson(
      PROVIDER,
      authUrl,
      {
        method: "POST",
        headers: {
          Authorization: `Basic ${basic}`,
          "Content-Type": "application/x-www-form-urlencoded",
          "User-Agent": settings.userAgent
        },
        body: "grant_type=client_credentials"
      },
      timeoutMs
    );
    const accessToken = isRecord(payload) ? payload.access_token : undefined;
    if (typeof accessToken !== "string" || !accessToken) {
      throw new ProviderError(PROVIDER, "token response did not include access_token");
    }
    const expiresIn = isRecord(payload) && typeof payload.expires_in === "number" ? payload.expires_in : 3600;
    token = { value: accessToken, expiresAt: now() + expiresIn * 1000 - TOKEN_EXPIRY_MARGIN_MS };
    logger.debug(`token acquired expires_in=${expiresIn}s`);
    return token.value;
  };

  const get = async (pathname: string) => {
    const accessToken = await getToken();
    return requestJson(
      PROVIDER,
      joinUrl(apiUrl, pathname),
      {
        method: "GET",
        headers: {
          Authorization: `Bearer ${accessToken}`,
          "User-Agent": settings.userAgent
        }
      },
      timeoutMs
    );
  };

  const toStories = (payload: unknown) => {
    const fetchedAt = new Date(now()).toISOString();
    const stories: Story[] = [];
    for (const child of listingChildren(payload)) {
      const story = postToStory(child, fetchedAt);
      if (story) {
        stories.push(story);
      } else {
        logger.debug("skipping non-text or empty post");
      }
    }
    return stories;
  };

  const fetchPosts = async (subreddit: string, options: FetchPostsOptions = {}) => {
    const sortMode = options.sortMode ?? settings.sortMode;
    const timeFilter = options.timeFilter ?? settings.timeFilter;
    const limit = options.limit ?? settings.fetchLimit;
    logger.info(`fetching up to ${limit} posts from r/${subreddit} (sort: ${sortMode}, time: ${timeFilter})`);
    const stories = toStories(await get(buildListingPath(subreddit, sortMode, timeFilter, limit)));
    logger.info(`fetched ${stories.length} posts from r/${subreddit}`);
    return stories;
  };

  return {
    async testConnection() {
      try {
        await get("/r/test/about");
        logger.info("connection test successful");
        return true;
      } catch (err) {
        logger.error(`connection test failed: ${toErrorMessage(err)}`);
        return false;
      }
    },
    fetchPosts,
    async fetchPostById(postId) {
      const id = postId.trim().replace(/^t3_/, "");
      logger.info(`fetching post ${id}`);
      try {
        const [story] = toStories(await get(`/by_id/t3_${encodeURIComponent(id)}`));
        return story ?? null;
      } catch (err) {
        logger.error(`failed to fetch post ${id}: ${toErrorMessage(err)}`);
        return null;
      }
    },
    async fetchFromMultipleSubreddits(subreddits, options) {
      const stories: Story[] = [];
      for (const subreddit of subreddits) {
        try {
          stories.push(...(await fetchPosts(subreddit, options)));
        } catch (err) {
          logger.error(`error fetching from r/${subreddit}: ${toErrorMessage(err)}`);
        }
      }
      return stories;
    }
  };
}
