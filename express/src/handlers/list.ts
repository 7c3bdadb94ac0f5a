import type { Request, Response } from 'express';
import type { Model } from 'sequelize';
import { FilterRequestError, type ListQueryDefinition, type Logger } from '@listquery/core';

export type ListHandlerOptions = {
  logger?: Logger;
  /** Maps a fetched row to its response shape; defaults to the plain attribute object. */
  toResult?: (row: Model) => unknown;
};

export type ListHandler = (req: Request, res: Response) => Promise<void>;

function plain(row: Model): Record<string, unknown> {
  return row.get({ plain: true });
}

export function createListHandler(definition: ListQueryDefinition, opts: ListHandlerOptions = {}): ListHandler {
  const logger = opts.logger ?? definition.logger;
  const toResult = opts.toResult ?? plain;

  return async (req, res) => {
    try {
      const compiler = definition.compiler(req.query).full();
      const rows = await definition.model.findAll(compiler.toFindOptions());
      res.ok(compiler.buildResponse(rows.map((row) => toResult(row))));
    } catch (e) {
      if (e instanceof FilterRequestError) {
        res.fail({ code: e.status, message: e.message, errors: e.issues });
        return;
      }
      logger.error('[listquery] list failed', { model: definition.modelName, error: e });
      res.fail({
        code: 500,
        message: e instanceof Error ? e.message : 'Error',
        errors: [{ location: 'root', message: 'Error' }],
      });
    }
  };
}
