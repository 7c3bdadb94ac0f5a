import { Ajv2020 } from 'ajv/dist/2020.js';
import addFormats from 'ajv-formats';

export type AjvOptions = {
  coerceTypes?: boolean;
  useDefaults?: boolean;
};

export function createAjv(opts: AjvOptions = {}): Ajv2020 {
  const ajv = new Ajv2020({ allErrors: true, allowUnionTypes: true, ...opts });
  addFormats.default(ajv);
  return ajv;
}
