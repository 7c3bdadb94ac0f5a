import express from 'express';
import type { ListQueryDefinition, Logger } from '@listquery/core';

import { createListHandler, type ListHandler } from '../handlers/list.js';

export type ListRouterDeps = {
  resources: Readonly<Record<string, ListQueryDefinition>>;
  logger?: Logger;
};

export function createListRouter({ resources, logger }: ListRouterDeps) {
  const router = express.Router();
  const handlers = new Map<string, ListHandler>();
  for (const [name, definition] of Object.entries(resources)) {
    handlers.set(name, createListHandler(definition, logger ? { logger } : {}));
  }

  router.get('/:resource', async (req, res) => {
    const name = String(req.params.resource || '');
    const handler = handlers.get(name);
    if (!handler) {
      res.fail({
        code: 404,
        message: `Unknown resource: ${name}`,
        errors: [{ location: 'resource', message: 'Not found' }],
      });
      return;
    }
    await handler(req, res);
  });

  return router;
}
