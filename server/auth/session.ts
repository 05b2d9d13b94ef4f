// server/auth/session.ts
import { createHash, timingSafeEqual } from "crypto";
import type { Context, MiddlewareHandler } from "hono";
import { deleteCookie, getSignedCookie, setSignedCookie } from "hono/cookie";

export const SESSION_COOKIE = "session";
export const SESSION_TTL_S = 8 * 60 * 60;

export type AuthEnv = { Variables: { username: string } };

const digest = (s: string) => createHash("sha256").update(s).digest();

export function checkCredentials(users: ReadonlyMap<string, string>, username: string, password: string): boolean {
  const expected = users.get(username);
  if (expected === undefined) return false;
  return timingSafeEqual(digest(expected), digest(password));
}

// Signed value is "<username>|<expiry epoch seconds>"; the expiry is checked here, not only by the browser.
export function encodeSession(username: string, nowMs: number): string {
  return `${username}|${Math.floor(nowMs / 1000) + SESSION_TTL_S}`;
}

export function decodeSession(value: string, nowMs: number): string | null {
  const idx = value.lastIndexOf("|");
  if (idx <= 0) return null;
  const exp = Number(value.slice(idx + 1));
  if (!Number.isInteger(exp) || exp * 1000 <= nowMs) return null;
  return value.slice(0, idx);
}

export async function startSession(c: Context, secret: string, username: string): Promise<void> {
  await setSignedCookie(c, SESSION_COOKIE, encodeSession(username, Date.now()), secret, {
    httpOnly: true,
    sameSite: "Lax",
    path: "/",
    maxAge: SESSION_TTL_S,
  });
}

export function endSession(c: Context): void {
  deleteCookie(c, SESSION_COOKIE, { path: "/" });
}

export async function readSession(c: Context, secret: string): Promise<string | null> {
  const v = await getSignedCookie(c, secret, SESSION_COOKIE);
  return typeof v === "string" && v ? decodeSession(v, Date.now()) : null;
}

/** Rejects with 401 unless the request carries a valid session for a configured user. */
export function requireSession(secret: string, users: ReadonlyMap<string, string>): MiddlewareHandler<AuthEnv> {
  return async (c, next) => {
    const username = await readSession(c, secret);
    if (!username || !users.has(username)) return c.json({ error: "Unauthorized" }, 401);
    c.set("username", username);
    await next();
  };
}
