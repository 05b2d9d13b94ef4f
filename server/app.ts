// server/app.ts
import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';
import { buildInsightsLLM } from './analysis/insights.js';
import type { PipelineDeps } from './analysis/pipeline.js';
import { requireSession, type AuthEnv } from './auth/session.js';
import type { Config } from './config.js';
import { createAlphaVantageFetcher } from './market/alphavantage.js';
import { createNewsScraper } from './news/aggregate.js';
import { createAnalyzeRoute } from './routes/analyze.js';
import { createAuthRoute } from './routes/auth.js';
import { createSymbolsRoute } from './routes/symbols.js';
import { getDefaultScorer } from './sentiment/score.js';
import type { FetchLike } from './shared/http.js';

export function createDeps(config: Config, fetchImpl?: FetchLike): PipelineDeps {
  const timeoutMs = config.httpTimeoutMs;
  return {
    market: createAlphaVantageFetcher({ apiKey: config.alphaVantageKey, timeoutMs, fetchImpl }),
    news: createNewsScraper({ serperKey: config.serperKey, limit: config.newsLimit, timeoutMs, fetchImpl }),
    scorer: getDefaultScorer(),
    insights: (input) =>
      buildInsightsLLM(input, { apiKey: config.groqKey, model: config.groqModel, timeoutMs, fetchImpl }),
  };
}

export function createApp(config: Config, deps: PipelineDeps = createDeps(config), opts: { log?: boolean } = {}) {
  const app = new Hono();
  if (opts.log ?? true) app.use('*', logger());
  const allowed = new Set(config.corsOrigins);
  app.use('*', cors({ origin: (origin) => (allowed.has(origin) ? origin : null), credentials: true }));

  app.get('/health', (c) => c.json({ ok: true }));
  app.route('/', createAuthRoute({ secret: config.sessionSecret, users: config.users }));

  const api = new Hono<AuthEnv>();
  api.use('*', requireSession(config.sessionSecret, config.users));
  api.route('/', createSymbolsRoute(config.symbolsCsv));
  api.route('/', createAnalyzeRoute(deps));
  app.route('/api', api);

  app.notFound((c) => c.json({ error: 'Not found' }, 404));
  app.onError((err, c) => {
    console.error('[server]', c.req.method, c.req.path, err);
    return c.json({ error: err.message || 'Internal error' }, 500);
  });

  return app;
}
