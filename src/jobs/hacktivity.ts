import axios, { type AxiosInstance } from "axios";
import { componentLogger, type Logger } from "../lib/logger";
import { describeHttpError, FeedFetchError } from "../lib/errors";
import { HACKTIVITY, HACKTIVITY_HEADERS, buildHacktivityQuery } from "./config";
import {
  HacktivityResponseSchema,
  type HacktivityNode,
} from "../types/hacktivity";
import type { Fetcher, FeedItem, FeedWindow } from "../types/api";

export type HacktivityFetcherOptions = {
  limit: number;
  url?: string;
  http?: AxiosInstance;
  log?: Logger;
};

/** Absolute links pass through; relative ones resolve against the origin. */
export function resolveReportUrl(raw: string | null | undefined, id: string) {
  const link = raw?.trim() ?? "";
  if (/^https?:\/\//i.test(link)) return link;
  if (link) return new URL(link, HACKTIVITY.origin).toString();
  return id
    ? `${HACKTIVITY.origin}/reports/${encodeURIComponent(id)}`
    : HACKTIVITY.origin;
}

/** "critical" → "Critical", "HIGH" → "High" */
export function formatSeverity(rating: string | null | undefined) {
  const r = rating?.trim();
  if (!r) return null;
  return r.charAt(0).toUpperCase() + r.slice(1).toLowerCase();
}

/** Fills placeholders; an absent id becomes "" and is left to the detector. */
export function normalizeNode(node: HacktivityNode): FeedItem {
  const id =
    node._id === null || node._id === undefined ? "" : String(node._id).trim();
  return {
    id,
    title: node.title?.trim() || "No Title",
    url: resolveReportUrl(node.url, id),
    severity: formatSeverity(node.severity?.rating),
    program: node.team?.handle?.trim() || null,
  };
}

export function createHacktivityFetcher(
  opts: HacktivityFetcherOptions
): Fetcher {
  const http = opts.http ?? axios.create();
  const url = opts.url ?? HACKTIVITY.graphqlUrl;
  const log = opts.log ?? componentLogger("fetcher");
  const payload = { query: buildHacktivityQuery(opts.limit) };

  return async (): Promise<FeedWindow> => {
    log.info({ limit: opts.limit }, "fetching latest disclosures");

    let body: unknown;
    try {
      const res = await http.post<unknown>(url, payload, {
        headers: HACKTIVITY_HEADERS,
        timeout: HACKTIVITY.timeoutMs,
      });
      body = res.data;
    } catch (e) {
      const { status, message } = describeHttpError(e);
      throw new FeedFetchError(`hacktivity request failed: ${message}`, {
        status,
        cause: e,
      });
    }

    const parsed = HacktivityResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new FeedFetchError("hacktivity response has an unexpected shape", {
        cause: parsed.error,
      });
    }
    if (parsed.data.errors && parsed.data.errors.length > 0) {
      const first = parsed.data.errors[0]?.message ?? "unknown error";
      throw new FeedFetchError(`hacktivity query returned errors: ${first}`);
    }

    const nodes = parsed.data.data?.reports?.nodes ?? [];
    const window = nodes.slice(0, opts.limit).map(normalizeNode);
    log.info({ found: window.length }, "fetched disclosures");
    return window;
  };
}
