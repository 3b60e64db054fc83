import { describe, expect, it, vi } from "vitest";
import {
  buildEmbed,
  buildPayload,
  createDiscordNotifier,
  createDryRunNotifier,
  sanitizeMarkdown,
} from "../discord";
import { NotificationError } from "../../lib/errors";
import { fakeHttp, item, rejectionOf, silentLog } from "../../__tests__/fakes";

const WEBHOOK = "https://discord.test/api/webhooks/1/test-token";

const report = item("42", {
  title: "Stored XSS in *profile* bio",
  url: "https://hackerone.com/reports/42",
  severity: "High",
  program: "acme_corp",
});

describe("sanitizeMarkdown", () => {
  it("drops Discord markdown characters", () => {
    expect(sanitizeMarkdown("a*b_c`d|e>f~g")).toBe("abcdefg");
  });
});

describe("buildEmbed", () => {
  it("formats a report", () => {
    expect(buildEmbed(report)).toEqual({
      title: "New Disclosure: Stored XSS in profile bio",
      url: "https://hackerone.com/reports/42",
      color: 3447003,
      fields: [
        { name: "Program", value: "acmecorp", inline: true },
        { name: "Severity", value: "High", inline: true },
        { name: "Report ID", value: "#42", inline: true },
      ],
      footer: { text: "HackerOne Monitor" },
    });
  });

  it("shows N/A for a missing program and severity", () => {
    const fields = buildEmbed(item("7")).fields;
    expect(fields[0]?.value).toBe("N/A");
    expect(fields[1]?.value).toBe("N/A");
  });

  it("keeps the title within Discord's limit", () => {
    const title = buildEmbed(item("8", { title: "a".repeat(300) })).title;
    expect(title).toHaveLength(256);
    expect(title.endsWith("…")).toBe(true);
  });
});

describe("createDiscordNotifier", () => {
  it("posts one embed per report", async () => {
    const { http, requests } = fakeHttp([{ status: 204 }]);
    const notify = createDiscordNotifier({ webhookUrl: WEBHOOK, http, log: silentLog() });
    await notify(report);
    expect(requests).toHaveLength(1);
    expect(requests[0]?.url).toBe(WEBHOOK);
    expect(requests[0]?.body).toEqual(buildPayload(report));
  });

  it("waits out a rate limit using retry_after", async () => {
    const { http, requests } = fakeHttp([
      { status: 429, data: { retry_after: 1.5 } },
      { status: 204 },
    ]);
    const wait = vi.fn(async (_ms: number) => {});
    const notify = createDiscordNotifier({
      webhookUrl: WEBHOOK,
      http,
      log: silentLog(),
      retry: { wait },
    });
    await notify(report);
    expect(requests).toHaveLength(2);
    expect(wait).toHaveBeenCalledTimes(1);
    const waited = wait.mock.calls[0]?.[0] ?? 0;
    expect(waited).toBeGreaterThanOrEqual(1500);
    expect(waited).toBeLessThan(1800);
  });

  it("does not retry a rejected payload", async () => {
    const { http, requests } = fakeHttp([{ status: 400 }]);
    const notify = createDiscordNotifier({ webhookUrl: WEBHOOK, http, log: silentLog() });
    const err = await rejectionOf(notify(report), NotificationError);
    expect(err.itemId).toBe("42");
    expect(err.status).toBe(400);
    expect(requests).toHaveLength(1);
  });

  it("gives up after the configured tries on server errors", async () => {
    const { http, requests } = fakeHttp([{ status: 502 }, { status: 502 }, { status: 502 }]);
    const notify = createDiscordNotifier({
      webhookUrl: WEBHOOK,
      http,
      log: silentLog(),
      retry: { tries: 3, wait: async () => {} },
    });
    await expect(notify(report)).rejects.toThrow("webhook rejected report #42: HTTP 502");
    expect(requests).toHaveLength(3);
  });
});

describe("createDryRunNotifier", () => {
  it("logs the payload instead of sending it", async () => {
    const log = silentLog();
    const info = vi.spyOn(log, "info");
    await createDryRunNotifier(log)(report);
    expect(info).toHaveBeenCalledWith(
      { id: "42", payload: buildPayload(report) },
      "dry run: would send report"
    );
  });
});
