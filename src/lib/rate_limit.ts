import axios from "axios";

/** Resolves after `ms`, or as soon as `signal` aborts. Never rejects. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) return resolve();
    const done = () => {
      clearTimeout(timer);
      signal?.removeEventListener("abort", done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal?.addEventListener("abort", done, { once: true });
  });
}

export type RetryOptions = {
  tries?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  shouldRetry?: (e: unknown) => boolean;
  /** Server-provided wait (e.g. Discord's retry_after), in ms. */
  delayHintMs?: (e: unknown) => number | undefined;
  onRetry?: (info: { attempt: number; tries: number; delayMs: number }) => void;
  wait?: (ms: number) => Promise<void>;
};

export async function withRetries<T>(
  fn: () => Promise<T>,
  opts: RetryOptions = {}
): Promise<T> {
  const tries = opts.tries ?? 3;
  const base = opts.baseDelayMs ?? 1000;
  const max = opts.maxDelayMs ?? 20_000;
  const shouldRetry = opts.shouldRetry ?? isTransientHttpError;
  const wait = opts.wait ?? ((ms: number) => sleep(ms));

  let attempt = 0;
  while (true) {
    try {
      return await fn();
    } catch (e) {
      attempt++;
      if (attempt >= tries || !shouldRetry(e)) throw e;

      // Exponential backoff; a server hint wins when it is longer
      let delay = Math.min(base * 2 ** (attempt - 1), max);
      const hint = opts.delayHintMs?.(e);
      if (hint !== undefined) delay = Math.max(delay, Math.min(hint, max));

      // Jitter 0–300ms
      delay += Math.floor(Math.random() * 300);

      opts.onRetry?.({ attempt, tries, delayMs: delay });
      await wait(delay);
    }
  }
}

/** 429, 5xx and connection-level failures are worth another attempt. */
export function isTransientHttpError(e: unknown): boolean {
  if (!axios.isAxiosError(e)) return false;
  const status = e.response?.status;
  if (status === undefined) return true;
  return status === 429 || status >= 500;
}

/** `retry_after` (seconds) from a 429 body, else the Retry-After header. */
export function retryAfterMs(e: unknown): number | undefined {
  if (!axios.isAxiosError(e) || e.response?.status !== 429) return undefined;
  const body: unknown = e.response.data;
  if (typeof body === "object" && body !== null && "retry_after" in body) {
    const seconds = Number(body.retry_after);
    if (Number.isFinite(seconds) && seconds >= 0) {
      return Math.ceil(seconds * 1000);
    }
  }
  const header = Number(e.response.headers["retry-after"]);
  if (Number.isFinite(header) && header >= 0) return Math.ceil(header * 1000);
  return undefined;
}
