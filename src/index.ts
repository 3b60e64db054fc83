#!/usr/bin/env node
import type { Server } from "node:http";
import { ENV, type EnvVars } from "./lib/env";
import { logger } from "./lib/logger";
import { resolveConfig, type MonitorConfig } from "./lib/config";
import { ConfigError, errorMessage } from "./lib/errors";
import { createSupabaseService } from "./lib/db";
import { parseCliFlags } from "./cli";
import { createHacktivityFetcher } from "./jobs/hacktivity";
import { createDiscordNotifier, createDryRunNotifier } from "./jobs/discord";
import {
  FileCursorStore,
  MemoryCursorStore,
  SupabaseCursorStore,
  type CursorStore,
} from "./jobs/cursor_store";
import { runCycle } from "./jobs/monitor";
import { Scheduler } from "./schedule";
import { createApp } from "./app";

export function createCursorStore(config: MonitorConfig): CursorStore {
  const c = config.cursor;
  if (c.backend === "supabase") {
    return new SupabaseCursorStore(
      createSupabaseService(c.url, c.serviceRole),
      c.key
    );
  }
  return new FileCursorStore(c.stateFile);
}

export async function createScheduler(
  config: MonitorConfig
): Promise<Scheduler> {
  let store = createCursorStore(config);
  if (config.dryRun) {
    // Start from the real cursor but never write it back
    store = new MemoryCursorStore(await store.load());
  }

  const fetch = createHacktivityFetcher({
    limit: config.fetchLimit,
    url: config.graphqlUrl,
  });
  const notify =
    config.dryRun || !config.webhookUrl
      ? createDryRunNotifier()
      : createDiscordNotifier({ webhookUrl: config.webhookUrl });

  return new Scheduler({
    intervalSeconds: config.intervalSeconds,
    once: config.once,
    force: config.force,
    cycle: (opts) => runCycle({ fetch, notify, store }, opts),
  });
}

function listen(config: MonitorConfig, scheduler: Scheduler, port: number) {
  const app = createApp({
    scheduler,
    adminToken: config.adminToken,
    cursorBackend: config.dryRun ? "memory" : config.cursor.backend,
  });
  return new Promise<Server>((resolve) => {
    const server = app.listen(port, () => {
      logger.info({ port }, "status server listening");
      resolve(server);
    });
  });
}

function close(server: Server) {
  return new Promise<void>((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}

/** Resolves with the process exit code. */
export async function main(
  argv: readonly string[],
  env: EnvVars = ENV
): Promise<number> {
  let config: MonitorConfig;
  try {
    config = resolveConfig(env, parseCliFlags(argv));
  } catch (e) {
    if (e instanceof ConfigError) {
      logger.fatal(e.message);
      return 1;
    }
    throw e;
  }

  const scheduler = await createScheduler(config);
  const ac = new AbortController();
  const stop = (signal: NodeJS.Signals) => {
    logger.info({ signal }, "shutdown requested");
    ac.abort();
  };
  process.once("SIGINT", stop);
  process.once("SIGTERM", stop);

  const server =
    config.port === null ? null : await listen(config, scheduler, config.port);
  try {
    await scheduler.run(ac.signal);
  } finally {
    process.off("SIGINT", stop);
    process.off("SIGTERM", stop);
    if (server) await close(server);
  }
  return 0;
}

/** CLI runner for `npm start` / `npm run monitor:once` */
if (require.main === module) {
  process.on("unhandledRejection", (reason) => {
    logger.error({ reason }, "UNHANDLED_REJECTION");
  });
  main(process.argv)
    .then((code) => process.exit(code))
    .catch((e: unknown) => {
      logger.fatal({ err: errorMessage(e) }, "FATAL");
      process.exit(1);
    });
}
