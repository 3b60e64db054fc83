import { z } from "zod";
import { ConfigError } from "./errors";
import type { EnvVars } from "./env";
import { HACKTIVITY, SCHEDULE } from "../jobs/config";

/** What the command line can override. Strings come straight from commander. */
export type CliFlags = {
  once?: boolean;
  force?: boolean;
  dryRun?: boolean;
  interval?: string;
  limit?: string;
  webhook?: string;
  stateFile?: string;
  port?: string;
};

export type CursorConfig =
  | { backend: "file"; stateFile: string }
  | { backend: "supabase"; url: string; serviceRole: string; key: string };

export type MonitorConfig = {
  webhookUrl: string | null; // null only in dry-run mode
  graphqlUrl: string;
  intervalSeconds: number;
  fetchLimit: number;
  once: boolean;
  force: boolean;
  dryRun: boolean;
  cursor: CursorConfig;
  port: number | null;
  adminToken: string | null;
};

const intSetting = (name: string, min: number, max: number) =>
  z.coerce
    .number({ invalid_type_error: `${name} must be a number` })
    .int(`${name} must be a whole number`)
    .min(min, `${name} must be at least ${min}`)
    .max(max, `${name} must be at most ${max}`);

const SettingsSchema = z.object({
  webhookUrl: z.string().url("webhook must be a valid URL").nullable(),
  graphqlUrl: z.string().url("H1_GRAPHQL_URL must be a valid URL"),
  intervalSeconds: intSetting("interval", 1, 7 * 24 * 3600),
  fetchLimit: intSetting("limit", 1, HACKTIVITY.maxLimit),
  backend: z.enum(["file", "supabase"], {
    errorMap: () => ({ message: "CURSOR_BACKEND must be file or supabase" }),
  }),
  port: intSetting("port", 1, 65535).nullable(),
});

// "" means "not set" for every env var and flag
function pick(...values: Array<string | undefined>) {
  return values.find((v) => v !== undefined && v.trim() !== "")?.trim();
}

export function resolveConfig(
  env: EnvVars,
  flags: CliFlags = {}
): MonitorConfig {
  const dryRun = Boolean(flags.dryRun);
  const webhook = pick(flags.webhook, env.DISCORD_WEBHOOK_URL);
  if (!webhook && !dryRun) {
    throw new ConfigError(
      "DISCORD_WEBHOOK_URL is not set. Export it or pass --webhook <url>."
    );
  }

  const port = pick(flags.port, env.PORT);
  const parsed = SettingsSchema.safeParse({
    webhookUrl: webhook ?? null,
    graphqlUrl: pick(env.H1_GRAPHQL_URL) ?? HACKTIVITY.graphqlUrl,
    intervalSeconds:
      pick(flags.interval, env.POLL_INTERVAL_SECONDS) ??
      SCHEDULE.defaultIntervalSeconds,
    fetchLimit: pick(flags.limit, env.FETCH_LIMIT) ?? HACKTIVITY.defaultLimit,
    backend: pick(env.CURSOR_BACKEND) ?? "file",
    port: port ?? null,
  });
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => i.message).join("; "));
  }
  const s = parsed.data;

  let cursor: CursorConfig;
  if (s.backend === "supabase") {
    const url = pick(env.SUPABASE_URL);
    const serviceRole = pick(env.SUPABASE_SERVICE_ROLE);
    if (!url || !serviceRole) {
      throw new ConfigError(
        "CURSOR_BACKEND=supabase needs SUPABASE_URL and SUPABASE_SERVICE_ROLE"
      );
    }
    cursor = {
      backend: "supabase",
      url,
      serviceRole,
      key: pick(env.CURSOR_KEY) ?? SCHEDULE.defaultCursorKey,
    };
  } else {
    cursor = {
      backend: "file",
      stateFile:
        pick(flags.stateFile, env.STATE_FILE) ?? SCHEDULE.defaultStateFile,
    };
  }

  return {
    webhookUrl: s.webhookUrl,
    graphqlUrl: s.graphqlUrl,
    intervalSeconds: s.intervalSeconds,
    fetchLimit: s.fetchLimit,
    once: Boolean(flags.once),
    force: Boolean(flags.force),
    dryRun,
    cursor,
    port: s.port,
    adminToken: pick(env.ADMIN_TOKEN) ?? null,
  };
}
