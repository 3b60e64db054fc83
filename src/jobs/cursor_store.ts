import { mkdir, readFile, rename, unlink, writeFile } from "node:fs/promises";
import { dirname, basename, join } from "node:path";
import { randomBytes } from "node:crypto";
import type { SupabaseClient } from "@supabase/supabase-js";
import { componentLogger, type Logger } from "../lib/logger";
import { CursorStoreError, errorMessage } from "../lib/errors";

/**
 * Durable home of the last delivered id. One value, last write wins.
 *
 * `load` never rejects: unreadable state is reported and treated as absent,
 * which makes the next cycle a bootstrap. `save` rejects on any failure.
 */
export interface CursorStore {
  readonly name: string;
  load(): Promise<string | null>;
  save(id: string): Promise<void>;
}

function assertSavable(id: string) {
  if (id.trim() === "" || /[\r\n]/.test(id)) {
    throw new CursorStoreError(`refusing to save cursor ${JSON.stringify(id)}`);
  }
}

function isMissingFile(e: unknown) {
  return e instanceof Error && "code" in e && e.code === "ENOENT";
}

/** Plain text file holding only the id. Replaced atomically via rename. */
export class FileCursorStore implements CursorStore {
  readonly name = "file";
  private readonly log: Logger;

  constructor(readonly path: string, log?: Logger) {
    this.log = log ?? componentLogger("store");
  }

  async load(): Promise<string | null> {
    try {
      const content = (await readFile(this.path, "utf8")).trim();
      return content || null;
    } catch (e) {
      if (isMissingFile(e)) {
        this.log.info({ path: this.path }, "no saved cursor yet");
        return null;
      }
      this.log.error(
        { path: this.path, err: errorMessage(e) },
        "cursor file unreadable; continuing as if none was saved"
      );
      return null;
    }
  }

  async save(id: string): Promise<void> {
    assertSavable(id);
    const dir = dirname(this.path);
    const suffix = `${process.pid}.${randomBytes(4).toString("hex")}`;
    const tmp = join(dir, `.${basename(this.path)}.${suffix}.tmp`);
    try {
      await mkdir(dir, { recursive: true });
      await writeFile(tmp, id, "utf8");
      await rename(tmp, this.path);
    } catch (e) {
      await unlink(tmp).catch((cleanup: unknown) => {
        if (!isMissingFile(cleanup)) {
          this.log.warn(
            { tmp, err: errorMessage(cleanup) },
            "could not remove temp cursor file"
          );
        }
      });
      throw new CursorStoreError(
        `could not write cursor to ${this.path}: ${errorMessage(e)}`,
        { cause: e }
      );
    }
  }
}

export class MemoryCursorStore implements CursorStore {
  readonly name = "memory";

  constructor(private value: string | null = null) {}

  async load(): Promise<string | null> {
    return this.value;
  }

  async save(id: string): Promise<void> {
    assertSavable(id);
    this.value = id;
  }
}

export const CURSOR_TABLE = "monitor_cursor";

/**
 * Row in `monitor_cursor (key text primary key, last_id text,
 * updated_at timestamptz)`.
 * A single upsert replaces the row atomically.
 */
export class SupabaseCursorStore implements CursorStore {
  readonly name = "supabase";
  private readonly log: Logger;

  constructor(
    private readonly client: SupabaseClient,
    readonly key: string,
    log?: Logger
  ) {
    this.log = log ?? componentLogger("store");
  }

  async load(): Promise<string | null> {
    const { data, error } = await this.client
      .from(CURSOR_TABLE)
      .select("last_id")
      .eq("key", this.key)
      .maybeSingle();
    if (error) {
      this.log.error(
        { key: this.key, err: error.message },
        "cursor row unreadable; continuing as if none was saved"
      );
      return null;
    }
    const lastId: unknown = data?.last_id;
    if (typeof lastId !== "string") return null;
    return lastId.trim() || null;
  }

  async save(id: string): Promise<void> {
    assertSavable(id);
    const { error } = await this.client
      .from(CURSOR_TABLE)
      .upsert(
        { key: this.key, last_id: id, updated_at: new Date().toISOString() },
        { onConflict: "key" }
      );
    if (error) {
      throw new CursorStoreError(
        `could not write cursor row ${this.key}: ${error.message}`,
        { cause: error }
      );
    }
  }
}
