export const HACKTIVITY = {
  graphqlUrl: "https://hackerone.com/graphql",
  origin: "https://hackerone.com", // relative report links resolve against this
  defaultLimit: 10,
  maxLimit: 100,
  timeoutMs: 10_000,
};

// HackerOne rejects requests that don't look like they come from the web app
export const HACKTIVITY_HEADERS = {
  "Content-Type": "application/json",
  "User-Agent":
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 " +
    "(KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36",
  "X-Requested-With": "XMLHttpRequest",
};

/** The `limit` most recently disclosed reports, newest first. */
export function buildHacktivityQuery(limit: number): string {
  return `query {
  reports(
    first: ${limit},
    where: { disclosed_at: { _is_null: false } },
    order_by: { field: disclosed_at, direction: DESC }
  ) {
    nodes {
      _id
      title
      url
      severity {
        rating
      }
      team {
        handle
      }
    }
  }
}`;
}

export const DISCORD = {
  embedColor: 3447003, // blue
  footer: "HackerOne Monitor",
  titleMax: 256, // Discord embed limits
  fieldMax: 1024,
  timeoutMs: 10_000,
  tries: 3,
};

export const SCHEDULE = {
  defaultIntervalSeconds: 600,
  defaultStateFile: "data/last_disclosed_id.txt",
  defaultCursorKey: "hacktivity",
};
