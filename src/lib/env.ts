import * as dotenv from "dotenv";
dotenv.config();

/** Raw environment, read once. Parsing and validation live in config.ts. */
export type EnvVars = {
  NODE_ENV: string;
  LOG_LEVEL: string;
  DISCORD_WEBHOOK_URL: string;
  H1_GRAPHQL_URL: string;
  POLL_INTERVAL_SECONDS: string;
  FETCH_LIMIT: string;
  STATE_FILE: string;
  CURSOR_BACKEND: string;
  CURSOR_KEY: string;
  SUPABASE_URL: string;
  SUPABASE_SERVICE_ROLE: string;
  PORT: string;
  ADMIN_TOKEN: string;
};

export function readEnv(source: NodeJS.ProcessEnv = process.env): EnvVars {
  const get = (name: string) => source[name]?.trim() ?? "";
  return {
    NODE_ENV: get("NODE_ENV") || "development",
    LOG_LEVEL: get("LOG_LEVEL"),
    DISCORD_WEBHOOK_URL: get("DISCORD_WEBHOOK_URL"),
    H1_GRAPHQL_URL: get("H1_GRAPHQL_URL"),
    POLL_INTERVAL_SECONDS: get("POLL_INTERVAL_SECONDS"),
    FETCH_LIMIT: get("FETCH_LIMIT"),
    STATE_FILE: get("STATE_FILE"),
    CURSOR_BACKEND: get("CURSOR_BACKEND"),
    CURSOR_KEY: get("CURSOR_KEY"),
    SUPABASE_URL: get("SUPABASE_URL"),
    SUPABASE_SERVICE_ROLE: get("SUPABASE_SERVICE_ROLE"),
    PORT: get("PORT"),
    ADMIN_TOKEN: get("ADMIN_TOKEN"),
  };
}

export const ENV = readEnv();
