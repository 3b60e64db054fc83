import { componentLogger, type Logger } from "../lib/logger";
import { errorMessage } from "../lib/errors";
import { detectNew } from "./detector";
import type { CursorStore } from "./cursor_store";
import type { Fetcher, FeedWindow, Notifier } from "../types/api";

/**
 * One poll: fetch → detect → notify (oldest first, sequential) → save.
 *
 * The cursor is written only after every notification attempt of the batch
 * has settled, and only over the prefix that was actually delivered. A crash
 * in between can repeat a notification on restart but never drops one.
 * Nothing in here throws; failures end up in the result.
 */

export type CycleStatus =
  | "fetch_failed"
  | "bootstrapped"
  | "idle"
  | "delivered"
  | "partial"
  | "failed";

export type CycleResult = {
  status: CycleStatus;
  found: number;
  delivered: number;
  failed: number;
  cursorBefore: string | null;
  cursorAfter: string | null;
  cursorSaved: boolean;
  error?: string;
};

export type CycleDeps = {
  fetch: Fetcher;
  notify: Notifier;
  store: CursorStore;
  log?: Logger;
};

export type CycleOptions = { force?: boolean };

const defaultLog = componentLogger("cycle");

export async function runCycle(
  deps: CycleDeps,
  opts: CycleOptions = {}
): Promise<CycleResult> {
  const log = deps.log ?? defaultLog;

  let window: FeedWindow;
  try {
    window = await deps.fetch();
  } catch (e) {
    log.error({ err: errorMessage(e) }, "fetch failed; skipping this cycle");
    return {
      status: "fetch_failed",
      found: 0,
      delivered: 0,
      failed: 0,
      cursorBefore: null,
      cursorAfter: null,
      cursorSaved: false,
      error: errorMessage(e),
    };
  }

  const cursorBefore = await deps.store.load();
  const detection = detectNew(window, cursorBefore, { force: opts.force });
  const base = { cursorBefore, found: detection.newItems.length };

  if (detection.bootstrap) {
    log.info(
      { cursor: detection.nextCursor },
      "first run; adopting latest report id without notifying"
    );
    const saved = await saveCursor(
      deps.store,
      detection.nextCursor,
      cursorBefore,
      log
    );
    return {
      ...base,
      status: "bootstrapped",
      delivered: 0,
      failed: 0,
      ...saved,
    };
  }

  if (detection.newItems.length === 0) {
    log.info(
      { cursor: cursorBefore, windowSize: window.length },
      "no new disclosures"
    );
    return {
      ...base,
      status: "idle",
      delivered: 0,
      failed: 0,
      cursorAfter: cursorBefore,
      cursorSaved: false,
    };
  }

  log.info(
    { found: detection.newItems.length, force: Boolean(opts.force) },
    "new disclosures found"
  );

  // Never interrupted once started: a half-sent batch with no record of
  // which half is exactly what the cursor rule below prevents.
  let delivered = 0;
  let failed = 0;
  let prefixEnd = -1; // index of the last item before the first failure
  for (const [index, item] of detection.newItems.entries()) {
    try {
      await deps.notify(item);
      delivered++;
      if (prefixEnd === index - 1) prefixEnd = index;
    } catch (e) {
      failed++;
      log.warn({ id: item.id, err: errorMessage(e) }, "notification failed");
    }
  }

  if (failed === 0) {
    const saved = await saveCursor(
      deps.store,
      detection.nextCursor,
      cursorBefore,
      log
    );
    return { ...base, status: "delivered", delivered, failed, ...saved };
  }

  const lastInOrder = detection.newItems[prefixEnd];
  if (!lastInOrder) {
    log.warn(
      { failed },
      "oldest new report was not delivered; keeping cursor for a full retry"
    );
    return {
      ...base,
      status: "failed",
      delivered,
      failed,
      cursorAfter: cursorBefore,
      cursorSaved: false,
    };
  }

  // A forced batch can start below the saved cursor; never move back to it
  const floor =
    cursorBefore === null
      ? -1
      : detection.newItems.map((i) => i.id).lastIndexOf(cursorBefore);
  if (prefixEnd <= floor) {
    log.warn(
      { delivered, failed, cursor: cursorBefore },
      "partial delivery did not pass the saved cursor; keeping it"
    );
    return {
      ...base,
      status: "partial",
      delivered,
      failed,
      cursorAfter: cursorBefore,
      cursorSaved: false,
    };
  }

  log.warn(
    { delivered, failed, advanceTo: lastInOrder.id },
    "partial delivery; advancing over the delivered prefix only"
  );
  const saved = await saveCursor(deps.store, lastInOrder.id, cursorBefore, log);
  return { ...base, status: "partial", delivered, failed, ...saved };
}

async function saveCursor(
  store: CursorStore,
  next: string | null,
  before: string | null,
  log: Logger
): Promise<{ cursorAfter: string | null; cursorSaved: boolean }> {
  if (next === null || next === before) {
    return { cursorAfter: before, cursorSaved: false };
  }
  try {
    await store.save(next);
    log.info({ cursor: next, store: store.name }, "cursor updated");
    return { cursorAfter: next, cursorSaved: true };
  } catch (e) {
    log.fatal(
      { cursor: next, store: store.name, err: errorMessage(e) },
      "COULD NOT SAVE CURSOR; the same reports will be sent again next cycle"
    );
    return { cursorAfter: before, cursorSaved: false };
  }
}
