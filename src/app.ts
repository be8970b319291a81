// src/app.ts
import express from 'express';
import swaggerUi from 'swagger-ui-express';
import { z } from 'zod';

import { apiV1, type ApiDeps } from './api_v1.js';
import { errorBody } from './errors.js';
import { generateSampleSet, SAMPLE_BUILDINGS, seededRandom } from './generator.js';
import { openapi } from './openapi.js';
import { runPipeline } from './pipeline.js';
import { serializeRun } from './serialize.js';
import { formatSummary } from './summary.js';
import { parseTimestamp } from './time.js';

const SimulateSchema = z.object({
  buildings: z.array(z.string().trim().min(1)).min(1).max(20).optional(),
  from: z.string().optional(),
  days: z.number().int().min(1).max(366).optional().default(28),
  seed: z.number().int().optional(),
});

export function createApp(deps: ApiDeps): express.Express {
  const app = express();
  app.set('etag', false);
  app.use(express.json({ limit: '10mb' }));

  app.use('/v1', apiV1(deps));

  // no-store + deep clone so nobody mutates the shared doc
  app.get('/openapi.json', (_req, res) => {
    res.set('Cache-Control', 'no-store');
    res.json(JSON.parse(JSON.stringify(openapi)));
  });

  const noStore = (_req: express.Request, res: express.Response, next: express.NextFunction) => {
    res.set('Cache-Control', 'no-store');
    next();
  };

  app.use(
    '/docs',
    noStore,
    swaggerUi.serve,
    swaggerUi.setup(undefined, {
      explorer: true,
      customSiteTitle: 'Campus Energy API',
      swaggerUrl: '/openapi.json',
    }),
  );

  // ===== demo: generated buildings through the same pipeline =====
  app.post('/simulate/run', (req, res) => {
    const parsed = SimulateSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return res.status(422).json(errorBody('VALIDATION_ERROR', 'Invalid payload', parsed.error.issues));
    }
    const p = parsed.data;
    const from = parseTimestamp(p.from ?? '2023-01-01');
    if (!from) {
      return res.status(422).json(errorBody('VALIDATION_ERROR', 'from must be a date'));
    }

    const set = generateSampleSet({
      buildings: p.buildings ?? SAMPLE_BUILDINGS,
      from,
      days: p.days,
      rng: p.seed === undefined ? Math.random : seededRandom(p.seed),
    });
    const sources = Array.from(set, ([building, rows]) => ({ origin: `${building}.csv`, read: () => rows }));
    const result = runPipeline(sources, { bins: deps.config.histogramBins });

    return res.json({
      ...serializeRun(result),
      text: formatSummary(result.status === 'ok' ? result.summary : result),
    });
  });

  return app;
}
