import express from 'express';
import type { ListQueryDefinition, Logger } from '@listquery/core';

import { responseEnvelope } from '../middleware/responseEnvelope.js';
import { createListRouter } from '../routers/list.js';

export type ExpressAppOptions = {
  basePath?: string;
  resources: Readonly<Record<string, ListQueryDefinition>>;
  logger?: Logger;
};

export function createExpressApp(opts: ExpressAppOptions) {
  const app = express();
  const basePath = opts.basePath ?? '';

  app.use(express.json({ limit: '2mb' }));
  app.use(responseEnvelope);

  app.get(`${basePath}/health`, (_req, res) => res.ok({ ok: true }));
  app.use(
    `${basePath}/api`,
    createListRouter({ resources: opts.resources, ...(opts.logger ? { logger: opts.logger } : {}) }),
  );

  return app;
}
