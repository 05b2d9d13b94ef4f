// Test helpers: canned responses and a prefix-routed fetch stand-in.
import { vi } from "vitest";

type Handler = (url: string, init?: RequestInit) => Response | Promise<Response>;

export const json = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { "content-type": "application/json" } });

export const html = (body: string, status = 200) =>
  new Response(body, { status, headers: { "content-type": "text/html; charset=utf-8" } });

/** Unrouted URLs get a 404 so nothing leaves the process. */
export function routeFetch(routes: Array<[prefix: string, handler: Handler]>) {
  return vi.fn(async (url: string, init?: RequestInit) => {
    const hit = routes.find(([prefix]) => url.startsWith(prefix));
    return hit ? hit[1](url, init) : html("not found", 404);
  });
}
