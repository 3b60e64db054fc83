/** One disclosed report as seen by a single poll. Never persisted whole. */
export type FeedItem = {
  readonly id: string; // opaque; equality only
  readonly title: string;
  readonly url: string; // always absolute
  readonly severity: string | null;
  readonly program: string | null;
};

/** Newest-first, bounded by the fetch limit. */
export type FeedWindow = readonly FeedItem[];

export type Fetcher = () => Promise<FeedWindow>;

/** Resolves once the destination accepted the message; rejects otherwise. */
export type Notifier = (item: FeedItem) => Promise<void>;
