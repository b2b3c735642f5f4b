import { readFileSync } from 'fs';
import Ajv, { SchemaObject } from 'ajv';
import type { RawLookupData } from '../lookup.types';
import { resolveLookupAssetPath } from './asset-path';

const schemaPath = resolveLookupAssetPath('schemas/lookup-data.schema.json');
const schema: SchemaObject = JSON.parse(readFileSync(schemaPath, 'utf-8'));

const ajv = new Ajv({ allErrors: true, allowUnionTypes: true });
const validate = ajv.compile<RawLookupData>(schema);

export type SchemaValidationResult =
  | { valid: true; data: RawLookupData }
  | { valid: false; errors: string };

export const validateLookupData = (data: unknown): SchemaValidationResult => {
  if (validate(data)) {
    return { valid: true, data };
  }

  return {
    valid: false,
    errors: validate.errors ? ajv.errorsText(validate.errors, { separator: '; ' }) : 'Invalid schema',
  };
};
