import { MalformedParameterError } from './errors.js';

/** `URLSearchParams`, or a parsed query object such as Express's `req.query`. */
export type ListQueryParams = URLSearchParams | Readonly<Record<string, unknown>>;

export type ParamEntry = readonly [key: string, value: string];

/**
 * Flat, ordered view of the request parameters. A key may occur more than
 * once; `get` returns the last occurrence.
 */
export class RequestParams {
  private constructor(private readonly list: readonly ParamEntry[]) {}

  static from(input: ListQueryParams): RequestParams {
    if (input instanceof URLSearchParams) return new RequestParams([...input.entries()]);

    const list: ParamEntry[] = [];
    for (const [key, value] of Object.entries(input)) {
      if (value === undefined) continue;
      if (typeof value === 'string') {
        list.push([key, value]);
        continue;
      }
      if (!Array.isArray(value)) throw new MalformedParameterError(key);
      for (const item of value) {
        if (typeof item !== 'string') throw new MalformedParameterError(key);
        list.push([key, item]);
      }
    }
    return new RequestParams(list);
  }

  get(key: string): string | undefined {
    let found: string | undefined;
    for (const [k, v] of this.list) if (k === key) found = v;
    return found;
  }

  entries(): readonly ParamEntry[] {
    return this.list;
  }
}
