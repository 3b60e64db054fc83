import axios from "axios";

export type MonitorErrorCode =
  | "CONFIG"
  | "FEED_FETCH"
  | "NOTIFY"
  | "CURSOR_STORE";

export class MonitorError extends Error {
  readonly code: MonitorErrorCode;

  constructor(code: MonitorErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Bad or missing settings. Only ever raised before the first cycle. */
export class ConfigError extends MonitorError {
  constructor(message: string) {
    super("CONFIG", message);
  }
}

export class FeedFetchError extends MonitorError {
  readonly status?: number;

  constructor(
    message: string,
    options: ErrorOptions & { status?: number } = {}
  ) {
    super("FEED_FETCH", message, { cause: options.cause });
    this.status = options.status;
  }
}

export class NotificationError extends MonitorError {
  readonly itemId: string;
  readonly status?: number;

  constructor(
    itemId: string,
    message: string,
    options: ErrorOptions & { status?: number } = {}
  ) {
    super("NOTIFY", message, { cause: options.cause });
    this.itemId = itemId;
    this.status = options.status;
  }
}

export class CursorStoreError extends MonitorError {
  constructor(message: string, options?: ErrorOptions) {
    super("CURSOR_STORE", message, options);
  }
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}

/** Status code and a one-line reason for an axios (or any) failure. */
export function describeHttpError(e: unknown): {
  status?: number;
  message: string;
} {
  if (axios.isAxiosError(e)) {
    const status = e.response?.status;
    if (status !== undefined) {
      return { status, message: `HTTP ${status}` };
    }
    if (e.code === "ECONNABORTED" || e.code === "ETIMEDOUT") {
      return { message: "request timed out" };
    }
    return { message: e.code ? `${e.code}: ${e.message}` : e.message };
  }
  return { message: errorMessage(e) };
}
