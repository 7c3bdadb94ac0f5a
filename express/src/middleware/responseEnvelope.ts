import type { NextFunction, Request, Response } from 'express';
import type { FilterIssue } from '@listquery/core';

export type SuccessEnvelope<T> = {
  success: true;
  code: number;
  data: T;
};

export type FailureEnvelope = {
  success: false;
  code: number;
  message: string;
  errors: FilterIssue[];
};

export type FailOptions = {
  code: number;
  message: string;
  errors?: FilterIssue[];
};

declare global {
  namespace Express {
    interface Response {
      ok: <T>(data: T, opts?: { code?: number }) => Response;
      fail: (opts: FailOptions) => Response;
    }
  }
}

export function responseEnvelope(_req: Request, res: Response, next: NextFunction) {
  res.ok = <T>(data: T, opts: { code?: number } = {}) => {
    const code = opts.code ?? 200;
    const body: SuccessEnvelope<T> = { success: true, code, data };
    return res.status(code).json(body);
  };
  res.fail = ({ code, message, errors = [] }: FailOptions) => {
    const body: FailureEnvelope = { success: false, code, message, errors };
    return res.status(code).json(body);
  };
  next();
}
