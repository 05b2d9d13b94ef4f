import { Hono } from 'hono';
import { z } from 'zod';
import type { AuthEnv } from '../auth/session.js';
import { analyzeTicker, type PipelineDeps } from '../analysis/pipeline.js';
import { DataUnavailableError } from '../shared/errors.js';
import { normalizeSymbol } from '../symbols.js';

const schema = z.object({
  symbol: z.string().transform((s, ctx) => {
    const sym = normalizeSymbol(s);
    if (!sym) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'invalid ticker symbol' });
      return z.NEVER;
    }
    return sym;
  }),
});

export function createAnalyzeRoute(deps: PipelineDeps) {
  const route = new Hono<AuthEnv>();

  route.post('/analyze', async (c) => {
    const body = await c.req.json().catch(() => ({}));
    const parse = schema.safeParse(body);
    if (!parse.success) return c.json({ error: parse.error.flatten() }, 400);

    const { symbol } = parse.data;
    try {
      const result = await analyzeTicker(symbol, deps);
      console.log(`[analyze] ${c.get('username')} ${symbol} → ${result.classification.recommendation}`);
      return c.json(result);
    } catch (e) {
      if (e instanceof DataUnavailableError) return c.json({ error: e.userMessage }, 503);
      throw e;
    }
  });

  return route;
}
