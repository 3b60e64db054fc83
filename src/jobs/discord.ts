import axios, { type AxiosInstance } from "axios";
import { componentLogger, type Logger } from "../lib/logger";
import { describeHttpError, NotificationError } from "../lib/errors";
import {
  retryAfterMs,
  withRetries,
  type RetryOptions,
} from "../lib/rate_limit";
import { DISCORD } from "./config";
import type { FeedItem, Notifier } from "../types/api";

export type EmbedField = { name: string; value: string; inline: boolean };

export type DiscordEmbed = {
  title: string;
  url: string;
  color: number;
  fields: EmbedField[];
  footer: { text: string };
};

export type WebhookPayload = { embeds: DiscordEmbed[] };

/** Drops characters Discord treats as markdown: * _ ` | > ~ */
export function sanitizeMarkdown(text: string): string {
  return text.replace(/[*_`|>~]/g, "");
}

function clip(text: string, max: number) {
  return text.length <= max ? text : `${text.slice(0, max - 1)}…`;
}

export function buildEmbed(item: FeedItem): DiscordEmbed {
  const title = sanitizeMarkdown(item.title).trim() || "No Title";
  const program = item.program ? sanitizeMarkdown(item.program).trim() : "";
  return {
    title: clip(`New Disclosure: ${title}`, DISCORD.titleMax),
    url: item.url,
    color: DISCORD.embedColor,
    fields: [
      {
        name: "Program",
        value: clip(program || "N/A", DISCORD.fieldMax),
        inline: true,
      },
      { name: "Severity", value: item.severity ?? "N/A", inline: true },
      { name: "Report ID", value: `#${item.id}`, inline: true },
    ],
    footer: { text: DISCORD.footer },
  };
}

export function buildPayload(item: FeedItem): WebhookPayload {
  return { embeds: [buildEmbed(item)] };
}

export type DiscordNotifierOptions = {
  webhookUrl: string;
  http?: AxiosInstance;
  log?: Logger;
  retry?: Pick<RetryOptions, "tries" | "baseDelayMs" | "wait">;
};

export function createDiscordNotifier(opts: DiscordNotifierOptions): Notifier {
  const http = opts.http ?? axios.create();
  const log = opts.log ?? componentLogger("notifier");

  return async (item: FeedItem) => {
    const payload = buildPayload(item);
    try {
      await withRetries(
        () =>
          http.post(opts.webhookUrl, payload, { timeout: DISCORD.timeoutMs }),
        {
          tries: opts.retry?.tries ?? DISCORD.tries,
          baseDelayMs: opts.retry?.baseDelayMs,
          wait: opts.retry?.wait,
          delayHintMs: retryAfterMs,
          onRetry: ({ attempt, tries, delayMs }) =>
            log.warn({ id: item.id, attempt, tries, delayMs }, "webhook retry"),
        }
      );
    } catch (e) {
      const { status, message } = describeHttpError(e);
      throw new NotificationError(
        item.id,
        `webhook rejected report #${item.id}: ${message}`,
        { status, cause: e }
      );
    }
    log.info({ id: item.id }, "sent report to Discord");
  };
}

/** Logs the payload instead of posting it. */
export function createDryRunNotifier(log?: Logger): Notifier {
  const out = log ?? componentLogger("notifier");
  return async (item: FeedItem) => {
    out.info(
      { id: item.id, payload: buildPayload(item) },
      "dry run: would send report"
    );
  };
}
