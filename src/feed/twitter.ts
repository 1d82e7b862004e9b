// pattern: Imperative Shell
import { TwitterApi } from "twitter-api-v2";
import type { TweetV2 } from "twitter-api-v2";
import type { Logger } from "pino";
import type { FeedCredentials } from "../config";
import type { FavoritedItem, FavoritesSource } from "./types";

/**
 * The parts of a v2 tweet the harvest reads.
 */
export type LikedTweet = Pick<TweetV2, "id" | "text" | "created_at"> & {
  readonly entities?: {
    readonly urls?: ReadonlyArray<{ readonly expanded_url?: string }>;
  };
};

// liked_tweets accepts 10..100 per page
const MIN_PAGE_SIZE = 10;
const MAX_PAGE_SIZE = 100;

export function toFavoritedItem(tweet: LikedTweet): FavoritedItem {
  const urls = (tweet.entities?.urls ?? [])
    .map((entity) => entity.expanded_url)
    .filter((url): url is string => typeof url === "string" && url.length > 0)
    .map((expandedUrl) => ({ expandedUrl }));

  return {
    id: tweet.id,
    text: tweet.text,
    createdAt: tweet.created_at ? new Date(tweet.created_at) : null,
    urls,
  };
}

/**
 * Drains a tweet iterator until `count` items have been collected. Pages past
 * the ceiling are never requested.
 */
export async function collectFavorites(
  tweets: AsyncIterable<LikedTweet>,
  count: number,
): Promise<ReadonlyArray<FavoritedItem>> {
  const items: Array<FavoritedItem> = [];
  if (count <= 0) return items;

  for await (const tweet of tweets) {
    items.push(toFavoritedItem(tweet));
    if (items.length >= count) break;
  }

  return items;
}

export function createTwitterClient(credentials: FeedCredentials): TwitterApi {
  return new TwitterApi({
    appKey: credentials.consumerKey,
    appSecret: credentials.consumerSecret,
    accessToken: credentials.accessToken,
    accessSecret: credentials.accessTokenSecret,
  });
}

/**
 * Favorites of the account the credentials belong to, via the v2 liked-tweets
 * timeline. Rate limiting is left to the client library.
 */
export function createTwitterSource(
  client: TwitterApi,
  logger: Logger,
): FavoritesSource {
  return {
    fetchFavorites: async (count) => {
      const me = await client.v2.me();
      const pageSize = Math.min(MAX_PAGE_SIZE, Math.max(MIN_PAGE_SIZE, count));

      const timeline = await client.v2.userLikedTweets(me.data.id, {
        max_results: pageSize,
        "tweet.fields": ["created_at", "entities"],
      });

      const items = await collectFavorites(timeline, count);
      logger.info(
        { userId: me.data.id, itemCount: items.length },
        "favorites fetched",
      );
      return items;
    },
  };
}
