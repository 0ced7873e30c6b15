/**
 * JSON Schemas (2020-12) describing the raw catalog documents.
 * They check document shape only; cross-references (mirror targets,
 * aliases, fragment names) are resolved by the parsers.
 */

const unsignedLiteral = {
  anyOf: [
    { type: 'integer', minimum: 0 },
    { type: 'string', minLength: 1 },
  ],
} as const;

const warningRange = {
  type: 'object',
  required: ['start', 'size', 'warning_msg'],
  properties: {
    start: unsignedLiteral,
    size: unsignedLiteral,
    warning_msg: { type: 'string' },
  },
} as const;

const memoryRegion = {
  type: 'object',
  properties: {
    start: unsignedLiteral,
    size: unsignedLiteral,
    external: { type: 'boolean' },
    mirror_of: { type: 'string', minLength: 1 },
    warning_ranges: { type: 'array', items: warningRange },
  },
} as const;

const deviceBody = {
  type: 'object',
  properties: {
    info: {
      type: 'object',
      properties: {
        purpose: { type: 'string' },
        web: { type: 'string' },
        use_in_doc: { type: 'boolean' },
        memory_map: {
          type: 'object',
          additionalProperties: memoryRegion,
        },
      },
    },
    features: {
      type: 'object',
      additionalProperties: { type: 'object' },
    },
  },
} as const;

export const DEVICE_DOCUMENT_SCHEMA = {
  $schema: 'https://json-schema.org/draft/2020-12/schema',
  $id: 'provcat:device',
  type: 'object',
  properties: {
    alias: { type: 'string', minLength: 1 },
    latest: { type: 'string', minLength: 1 },
    revisions: {
      type: 'object',
      minProperties: 1,
      additionalProperties: deviceBody,
    },
    info: deviceBody.properties.info,
    features: deviceBody.properties.features,
  },
  anyOf: [{ required: ['alias'] }, { required: ['revisions', 'latest'] }],
} as const;

const primitive = { type: ['string', 'number', 'boolean', 'null'] } as const;

export const SCHEMA_GROUP_DOCUMENT_SCHEMA = {
  $schema: 'https://json-schema.org/draft/2020-12/schema',
  $id: 'provcat:schema-group',
  type: 'object',
  additionalProperties: { $ref: '#/$defs/fragment' },
  $defs: {
    typeName: {
      enum: ['string', 'number', 'integer', 'boolean', 'object', 'array', 'null'],
    },
    stringList: { type: 'array', items: { type: 'string' } },
    property: {
      type: 'object',
      properties: {
        type: {
          anyOf: [
            { $ref: '#/$defs/typeName' },
            { type: 'array', items: { $ref: '#/$defs/typeName' }, minItems: 1 },
          ],
        },
        title: { type: 'string' },
        description: { type: 'string' },
        enum: { type: 'array', items: primitive, minItems: 1 },
        const: primitive,
        format: { type: 'string' },
        skip_in_template: { type: 'boolean' },
        properties: {
          type: 'object',
          additionalProperties: { $ref: '#/$defs/property' },
        },
        required: { $ref: '#/$defs/stringList' },
        items: { $ref: '#/$defs/property' },
        oneOf: {
          type: 'array',
          items: { $ref: '#/$defs/property' },
          minItems: 1,
        },
        minItems: { type: 'integer', minimum: 0 },
        maxItems: { type: 'integer', minimum: 0 },
      },
    },
    fragment: {
      type: 'object',
      required: ['type'],
      properties: {
        type: { const: 'object' },
        title: { type: 'string' },
        properties: {
          type: 'object',
          additionalProperties: { $ref: '#/$defs/property' },
        },
        required: { $ref: '#/$defs/stringList' },
        allOf: { type: 'array', items: { type: 'object' } },
        oneOf: { type: 'array', items: { type: 'object' } },
        anyOf: { type: 'array', items: { type: 'object' } },
        if: { type: 'object' },
        then: { type: 'object' },
        else: { type: 'object' },
      },
    },
  },
} as const;

export const FEATURE_BINDINGS_DOCUMENT_SCHEMA = {
  $schema: 'https://json-schema.org/draft/2020-12/schema',
  $id: 'provcat:feature-bindings',
  type: 'object',
  additionalProperties: {
    type: 'object',
    required: ['artifacts'],
    properties: {
      artifacts: {
        type: 'object',
        additionalProperties: {
          type: 'array',
          items: { type: 'string', minLength: 1 },
          minItems: 1,
        },
      },
    },
  },
} as const;
