import { componentLogger, type Logger } from "../lib/logger";
import type { FeedItem, FeedWindow } from "../types/api";

export type Detection = {
  /** Oldest first: the order notifications go out in. */
  newItems: FeedItem[];
  nextCursor: string | null;
  bootstrap: boolean;
  /** False when the cursor was not in the window (or there was no cursor). */
  boundaryFound: boolean;
  skipped: number;
};

export type DetectOptions = {
  /** Ignore the cursor and treat the whole window as new. */
  force?: boolean;
  log?: Logger;
};

const defaultLog = componentLogger("detector");

/**
 * Splits a newest-first window at the cursor.
 *
 * Items newer than the cursor are returned oldest-first. Without a cursor
 * nothing is returned and the newest id is adopted, so a first deploy does
 * not flood the channel. A cursor that has fallen out of the window makes
 * the whole window new; the loss is bounded by the fetch limit.
 *
 * Items with an empty id are skipped and never become the cursor.
 * Duplicate ids are not collapsed.
 */
export function detectNew(
  window: FeedWindow,
  cursor: string | null,
  opts: DetectOptions = {}
): Detection {
  const log = opts.log ?? defaultLog;

  const valid: FeedItem[] = [];
  for (const [position, item] of window.entries()) {
    if (item.id.trim() === "") {
      log.warn({ position, title: item.title }, "skipping item without an id");
      continue;
    }
    valid.push(item);
  }
  const skipped = window.length - valid.length;
  const newest = valid[0];

  if (!newest) {
    return {
      newItems: [],
      nextCursor: cursor,
      bootstrap: false,
      boundaryFound: false,
      skipped,
    };
  }

  if (opts.force) {
    return {
      newItems: [...valid].reverse(),
      nextCursor: newest.id,
      bootstrap: false,
      boundaryFound: false,
      skipped,
    };
  }

  if (cursor === null) {
    return {
      newItems: [],
      nextCursor: newest.id,
      bootstrap: true,
      boundaryFound: false,
      skipped,
    };
  }

  const candidates: FeedItem[] = [];
  let boundaryFound = false;
  for (const item of valid) {
    if (item.id === cursor) {
      boundaryFound = true;
      break;
    }
    candidates.push(item);
  }

  if (!boundaryFound) {
    log.warn(
      { cursor, windowSize: valid.length },
      "last seen id is outside the fetch window; " +
        "treating the whole window as new"
    );
  }

  return {
    newItems: candidates.reverse(),
    nextCursor: newest.id,
    bootstrap: false,
    boundaryFound,
    skipped,
  };
}
