import { describe, expect, it, vi } from "vitest";
import { runCycle, type CycleDeps } from "../monitor";
import { MemoryCursorStore } from "../cursor_store";
import { CursorStoreError } from "../../lib/errors";
import { item, silentLog } from "../../__tests__/fakes";
import type { FeedItem, FeedWindow } from "../../types/api";

const window = (...list: string[]): FeedWindow => list.map((id) => item(id));

/** Records every notify and save in one timeline. */
function harness(opts: {
  windows: FeedWindow[];
  cursor?: string | null;
  failIds?: string[];
  saveFailures?: number;
}) {
  const events: string[] = [];
  const failIds = new Set(opts.failIds ?? []);
  let saveFailures = opts.saveFailures ?? 0;
  let fetches = 0;

  class RecordingStore extends MemoryCursorStore {
    async save(id: string) {
      if (saveFailures > 0) {
        saveFailures--;
        events.push(`save-failed:${id}`);
        throw new CursorStoreError("disk full");
      }
      events.push(`save:${id}`);
      await super.save(id);
    }
  }

  const store = new RecordingStore(opts.cursor ?? null);
  const notify = vi.fn(async (i: FeedItem) => {
    events.push(`notify:${i.id}`);
    if (failIds.has(i.id)) throw new Error("webhook down");
  });
  const deps: CycleDeps = {
    fetch: async () => {
      const w = opts.windows[Math.min(fetches, opts.windows.length - 1)];
      fetches++;
      return w ?? [];
    },
    notify,
    store,
    log: silentLog(),
  };
  return { deps, store, notify, events, failIds };
}

describe("runCycle", () => {
  it("seeds the cursor on the first run without notifying", async () => {
    const h = harness({ windows: [window("3", "2", "1")] });
    const result = await runCycle(h.deps);
    expect(result.status).toBe("bootstrapped");
    expect(h.notify).not.toHaveBeenCalled();
    expect(await h.store.load()).toBe("3");
    expect(result.cursorAfter).toBe("3");
    expect(result.cursorSaved).toBe(true);
  });

  it("delivers new reports oldest first and saves after the last one", async () => {
    const h = harness({ windows: [window("105", "104", "103")], cursor: "103" });
    const result = await runCycle(h.deps);
    expect(h.events).toEqual(["notify:104", "notify:105", "save:105"]);
    expect(result).toEqual({
      status: "delivered",
      found: 2,
      delivered: 2,
      failed: 0,
      cursorBefore: "103",
      cursorAfter: "105",
      cursorSaved: true,
    });
  });

  it("does nothing when the newest report is the cursor", async () => {
    const h = harness({ windows: [window("5", "4")], cursor: "5" });
    const result = await runCycle(h.deps);
    expect(result.status).toBe("idle");
    expect(h.events).toEqual([]);
  });

  it("treats an empty window as nothing to do", async () => {
    const h = harness({ windows: [[]], cursor: "9" });
    const result = await runCycle(h.deps);
    expect(result.status).toBe("idle");
    expect(result.cursorAfter).toBe("9");
    expect(await h.store.load()).toBe("9");
  });

  it("contains fetch failures and leaves the cursor untouched", async () => {
    const h = harness({ windows: [], cursor: "5" });
    h.deps.fetch = async () => {
      throw new Error("socket hang up");
    };
    const result = await runCycle(h.deps);
    expect(result.status).toBe("fetch_failed");
    expect(result.error).toBe("socket hang up");
    expect(h.notify).not.toHaveBeenCalled();
    expect(await h.store.load()).toBe("5");
  });

  it("re-sends the same batch after a failed save", async () => {
    const h = harness({ windows: [window("3", "2", "1")], cursor: "1", saveFailures: 1 });

    const first = await runCycle(h.deps);
    expect(first.status).toBe("delivered");
    expect(first.cursorSaved).toBe(false);
    expect(first.cursorAfter).toBe("1");
    expect(await h.store.load()).toBe("1");

    const second = await runCycle(h.deps);
    expect(second.cursorSaved).toBe(true);
    expect(h.events).toEqual([
      "notify:2",
      "notify:3",
      "save-failed:3",
      "notify:2",
      "notify:3",
      "save:3",
    ]);
  });

  it("keeps going after a failed notification and advances over the delivered prefix", async () => {
    const h = harness({ windows: [window("4", "3", "2", "1")], cursor: "1", failIds: ["3"] });

    const first = await runCycle(h.deps);
    expect(first.status).toBe("partial");
    expect(first.delivered).toBe(2);
    expect(first.failed).toBe(1);
    expect(h.events).toEqual(["notify:2", "notify:3", "notify:4", "save:2"]);

    h.failIds.clear();
    h.events.length = 0;
    const second = await runCycle(h.deps);
    expect(second.status).toBe("delivered");
    expect(h.events).toEqual(["notify:3", "notify:4", "save:4"]);
  });

  it("holds the cursor when the oldest new report fails", async () => {
    const h = harness({ windows: [window("4", "3", "2", "1")], cursor: "1", failIds: ["2"] });
    const result = await runCycle(h.deps);
    expect(result.status).toBe("failed");
    expect(result.cursorSaved).toBe(false);
    expect(h.events).toEqual(["notify:2", "notify:3", "notify:4"]);
    expect(await h.store.load()).toBe("1");
  });

  it("delivers the whole window when the cursor is no longer in it", async () => {
    const h = harness({ windows: [window("3", "2", "1")], cursor: "old" });
    await runCycle(h.deps);
    expect(h.events).toEqual(["notify:1", "notify:2", "notify:3", "save:3"]);
  });

  it("re-sends the current window when forced without rewriting an equal cursor", async () => {
    const h = harness({ windows: [window("3", "2", "1")], cursor: "3" });
    const result = await runCycle(h.deps, { force: true });
    expect(result.status).toBe("delivered");
    expect(result.cursorSaved).toBe(false);
    expect(h.events).toEqual(["notify:1", "notify:2", "notify:3"]);
  });

  it("keeps a newer cursor when a forced batch fails above it", async () => {
    const h = harness({
      windows: [window("105", "104", "103")],
      cursor: "105",
      failIds: ["105"],
    });
    const result = await runCycle(h.deps, { force: true });
    expect(result.status).toBe("partial");
    expect(result.cursorSaved).toBe(false);
    expect(result.cursorAfter).toBe("105");
    expect(h.events).toEqual(["notify:103", "notify:104", "notify:105"]);
    expect(await h.store.load()).toBe("105");
  });

  it("advances a forced batch once the delivered prefix passes the cursor", async () => {
    const h = harness({
      windows: [window("4", "3", "2", "1")],
      cursor: "2",
      failIds: ["4"],
    });
    const result = await runCycle(h.deps, { force: true });
    expect(result.status).toBe("partial");
    expect(result.cursorAfter).toBe("3");
    expect(await h.store.load()).toBe("3");
  });

  it("never reports the same item twice across cycles", async () => {
    const h = harness({
      windows: [window("2", "1"), window("4", "3", "2"), window("5", "4", "3")],
      cursor: "1",
    });
    await runCycle(h.deps);
    await runCycle(h.deps);
    await runCycle(h.deps);
    expect(h.notify.mock.calls.map(([i]) => i.id)).toEqual(["2", "3", "4", "5"]);
    expect(await h.store.load()).toBe("5");
  });
});
