import AjvModule from 'ajv';
import type { ErrorObject, Schema, ValidateFunction } from 'ajv';

// ajv ships CommonJS; under NodeNext its class sits on the default export's `default`.
const Ajv = AjvModule.default;

const sharedAjv = new Ajv({ allErrors: true, strict: false, useDefaults: false });

export function compileSchema<T>(schema: Schema): ValidateFunction<T> {
  return sharedAjv.compile<T>(schema);
}

export function formatSchemaErrors(errors: ErrorObject[] | null | undefined): string {
  if (!errors || errors.length === 0) return 'unknown validation error';
  return errors
    .map((e) => `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`.trim())
    .join('; ');
}
