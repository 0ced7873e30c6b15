import Ajv2020 from 'ajv/dist/2020.js';
import type { ErrorObject, ValidateFunction } from 'ajv';

import type { CatalogIssue } from '../types/errors.js';
import {
  DEVICE_DOCUMENT_SCHEMA,
  FEATURE_BINDINGS_DOCUMENT_SCHEMA,
  SCHEMA_GROUP_DOCUMENT_SCHEMA,
} from './shapes.js';

export type CatalogDocumentKind = 'device' | 'schemaGroup' | 'features';

const SCHEMAS: Record<CatalogDocumentKind, object> = {
  device: DEVICE_DOCUMENT_SCHEMA,
  schemaGroup: SCHEMA_GROUP_DOCUMENT_SCHEMA,
  features: FEATURE_BINDINGS_DOCUMENT_SCHEMA,
};

let shapeAjv: Ajv2020 | undefined;
const compiled = new Map<CatalogDocumentKind, ValidateFunction>();

function getAjv(): Ajv2020 {
  if (!shapeAjv) {
    shapeAjv = new Ajv2020({
      allErrors: true,
      strict: true,
      strictTypes: false,
      strictRequired: false,
      strictTuples: false,
      allowUnionTypes: true,
      messages: true,
      logger: false,
    });
  }
  return shapeAjv;
}

function getValidator(kind: CatalogDocumentKind): ValidateFunction {
  const cached = compiled.get(kind);
  if (cached) return cached;
  const validate = getAjv().compile(SCHEMAS[kind]);
  compiled.set(kind, validate);
  return validate;
}

function toIssue(error: ErrorObject): CatalogIssue {
  return {
    path: error.instancePath,
    message: `${error.keyword}: ${error.message ?? 'invalid value'}`,
  };
}

/**
 * Check a raw catalog document against its shape schema.
 * Returns an empty list when the document is well-formed.
 */
export function checkCatalogShape(
  kind: CatalogDocumentKind,
  document: unknown
): CatalogIssue[] {
  const validate = getValidator(kind);
  if (validate(document)) {
    return [];
  }
  return (validate.errors ?? []).map(toIssue);
}
