// server/shared/http.ts
import { errorMessage } from "./errors.js";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export const USER_AGENT = "stock-signal-service/1.0";

export class HttpError extends Error {
  readonly status: number;
  readonly detail: string;

  constructor(status: number, statusText: string, detail = "") {
    super(`${status} ${statusText}${detail ? ` — ${detail.slice(0, 200)}` : ""}`);
    this.name = "HttpError";
    this.status = status;
    this.detail = detail;
  }
}

export type HttpOptions = {
  fetchImpl?: FetchLike;
  timeoutMs?: number;
  /** Extra attempts on 429, 5xx and network errors. */
  retries?: number;
  method?: "GET" | "POST";
  headers?: Record<string, string>;
  body?: string;
};

export async function fetchText(url: string, opts: HttpOptions = {}): Promise<string> {
  const doFetch = opts.fetchImpl ?? fetch;
  const maxRetries = Math.max(0, opts.retries ?? 0);
  const timeoutMs = opts.timeoutMs ?? 10_000;

  let lastErr: unknown;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    const ctrl = new AbortController();
    const timer = setTimeout(() => ctrl.abort(), timeoutMs);

    try {
      const r = await doFetch(url, {
        method: opts.method ?? "GET",
        signal: ctrl.signal,
        headers: { "user-agent": USER_AGENT, ...opts.headers },
        body: opts.body,
      });

      if (r.status === 429 || (r.status >= 500 && r.status <= 599)) {
        lastErr = new HttpError(r.status, r.statusText);
        if (attempt < maxRetries) {
          await r.body?.cancel();
          await sleep(retryDelayMs(attempt, r.headers.get("Retry-After")));
          continue;
        }
        throw lastErr;
      }

      const text = await r.text();
      if (!r.ok) throw new HttpError(r.status, r.statusText, text);
      return text;
    } catch (err) {
      lastErr = err;
      if (attempt < maxRetries && isNetworkLike(err)) {
        await sleep(retryDelayMs(attempt));
        continue;
      }
      throw err;
    } finally {
      clearTimeout(timer);
    }
  }

  throw lastErr instanceof Error ? lastErr : new Error("fetchText: unknown error");
}

/** Parsed but unvalidated; callers run the body through a schema. */
export async function fetchJSON(url: string, opts: HttpOptions = {}): Promise<unknown> {
  const text = await fetchText(url, opts);
  try {
    return JSON.parse(text);
  } catch {
    throw new Error(`Invalid JSON from ${new URL(url).hostname} — ${text.slice(0, 200)}`);
  }
}

function isNetworkLike(err: unknown): boolean {
  if (err instanceof HttpError) return false;
  if (err instanceof Error && err.name === "AbortError") return true;
  return /network|fetch failed/i.test(errorMessage(err));
}

function sleep(ms: number) {
  return new Promise((res) => setTimeout(res, ms));
}

/** Exponential backoff with jitter; Retry-After wins when present. */
function retryDelayMs(attempt: number, retryAfterHeader?: string | null) {
  const ra = parseRetryAfter(retryAfterHeader);
  if (ra > 0) return ra;
  return 300 * Math.pow(2, attempt) + Math.floor(Math.random() * 250);
}

export function parseRetryAfter(h?: string | null): number {
  if (!h) return 0;
  const s = h.trim();
  if (/^\d+$/.test(s)) return parseInt(s, 10) * 1000;
  const d = Date.parse(s);
  if (!Number.isNaN(d)) return Math.max(0, d - Date.now());
  return 0;
}
