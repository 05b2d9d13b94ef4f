import { Hono } from 'hono';
import type { AuthEnv } from '../auth/session.js';
import { readSymbols } from '../symbols.js';

export function createSymbolsRoute(file: string) {
  const route = new Hono<AuthEnv>();
  route.get('/symbols', async (c) => c.json({ symbols: await readSymbols(file) }));
  return route;
}
