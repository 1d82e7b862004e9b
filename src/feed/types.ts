export type EmbeddedUrl = {
  readonly expandedUrl: string;
};

/**
 * A post the account has favorited, as handed to the harvest. Read-only to the
 * pipeline.
 */
export type FavoritedItem = {
  readonly id: string;
  readonly text: string;
  readonly createdAt: Date | null;
  readonly urls: ReadonlyArray<EmbeddedUrl>;
};

/**
 * Capability to fetch the most recently favorited items of the authenticated
 * account, newest first.
 */
export type FavoritesSource = {
  readonly fetchFavorites: (
    count: number,
  ) => Promise<ReadonlyArray<FavoritedItem>>;
};
