// src/api_v1.ts
import { randomUUID } from 'node:crypto';
import express from 'express';
import { z } from 'zod';
import type { Config } from './config.js';
import { csvTextSource } from './csv.js';
import { errorBody, messageOf } from './errors.js';
import { runPipeline } from './pipeline.js';
import { publishRun, type RunStore } from './publish.js';
import { serializeRun } from './serialize.js';
import { formatSummary } from './summary.js';
import type { RowSource } from './types.js';

export type ApiDeps = {
  config: Config;
  /** null when publishing is not configured */
  store: RunStore | null;
};

/** --- validators --- */
const SourceSchema = z.union([
  z.object({ origin: z.string().min(1), csv: z.string() }),
  z.object({ origin: z.string().min(1), rows: z.array(z.unknown()).max(100_000) }),
]);

const RunSchema = z.object({
  sources: z.array(SourceSchema).max(100).default([]),
  bins: z.number().int().min(1).max(500).optional(),
  publish: z.boolean().optional().default(false),
});

export type RunRequest = z.infer<typeof RunSchema>;

export function toRowSources(sources: RunRequest['sources']): RowSource[] {
  return sources.map(s => ('csv' in s ? csvTextSource(s.origin, s.csv) : { origin: s.origin, read: () => s.rows }));
}

export function apiV1({ config, store }: ApiDeps): express.Router {
  const router = express.Router();

  /** simple auth (Bearer) */
  function requireAuth(req: express.Request, res: express.Response, next: express.NextFunction) {
    const hdr = req.header('authorization') || '';
    const token = hdr.startsWith('Bearer ') ? hdr.slice(7) : '';
    if (!token || !config.apiKeys.includes(token)) {
      return res.status(401).json(errorBody('UNAUTHORIZED', 'Invalid API key'));
    }
    next();
  }

  router.get('/healthz', (_req, res) => {
    res.json({ ok: true, ts: new Date().toISOString() });
  });

  router.post('/runs', requireAuth, async (req, res) => {
    const parsed = RunSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return res.status(422).json(errorBody('VALIDATION_ERROR', 'Invalid payload', parsed.error.issues));
    }
    const body = parsed.data;

    if (body.publish && !store) {
      return res.status(503).json(errorBody('PUBLISH_UNAVAILABLE', 'publishing is not configured'));
    }

    try {
      const result = runPipeline(toRowSources(body.sources), { bins: body.bins ?? config.histogramBins });
      const text = formatSummary(result.status === 'ok' ? result.summary : result);

      if (body.publish && store && result.status === 'ok') {
        try {
          const published = await publishRun(store, randomUUID(), result);
          return res.json({ ...serializeRun(result), text, published });
        } catch (e) {
          console.error(e);
          return res.status(502).json(errorBody('DB_ERROR', messageOf(e, 'publish failed')));
        }
      }

      return res.json({ ...serializeRun(result), text });
    } catch (e) {
      console.error(e);
      return res.status(500).json(errorBody('INTERNAL', messageOf(e, 'internal error')));
    }
  });

  return router;
}
