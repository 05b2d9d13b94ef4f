import { Hono } from 'hono';
import { z } from 'zod';
import { checkCredentials, endSession, readSession, startSession } from '../auth/session.js';

const schema = z.object({
  username: z.string().trim().min(1),
  password: z.string().min(1),
});

export function createAuthRoute(opts: { secret: string; users: ReadonlyMap<string, string> }) {
  const route = new Hono();

  route.post('/login', async (c) => {
    const isJson = (c.req.header('content-type') || '').includes('application/json');
    const body: unknown = isJson ? await c.req.json().catch(() => ({})) : await c.req.parseBody().catch(() => ({}));
    const parse = schema.safeParse(body);
    if (!parse.success) return c.json({ error: parse.error.flatten() }, 400);

    const { username, password } = parse.data;
    if (!checkCredentials(opts.users, username, password)) {
      return c.json({ error: 'Invalid credentials.' }, 401);
    }
    await startSession(c, opts.secret, username);
    return c.json({ username });
  });

  route.post('/logout', (c) => {
    endSession(c);
    return c.json({ ok: true });
  });

  route.get('/me', async (c) => {
    const username = await readSession(c, opts.secret);
    if (!username || !opts.users.has(username)) return c.json({ error: 'Unauthorized' }, 401);
    return c.json({ username });
  });

  return route;
}
