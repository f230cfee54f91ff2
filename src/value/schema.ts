/**
 * Schema: structural description of the data an Emitter carries.
 *
 * Schemas compare structurally (`schemasEqual`). Record fields are ordered;
 * two records with the same fields in a different order are different
 * schemas.
 */

import { z } from 'zod';

// ── Types ───────────────────────────────────────────────────────────

export type Schema =
  | { readonly kind: 'none' }
  | { readonly kind: 'number' }
  | { readonly kind: 'string' }
  | { readonly kind: 'boolean' }
  | { readonly kind: 'list'; readonly element: Schema }
  | { readonly kind: 'record'; readonly fields: ReadonlyArray<readonly [string, Schema]> };

/** JSON form of a Schema, as accepted over HTTP. Record fields keep key order. */
export type SchemaInput =
  | { kind: 'none' }
  | { kind: 'number' }
  | { kind: 'string' }
  | { kind: 'boolean' }
  | { kind: 'list'; element: SchemaInput }
  | { kind: 'record'; fields: { [field: string]: SchemaInput } };

function frozen(schema: Schema): Schema {
  Object.freeze(schema);
  return schema;
}

export const NONE_SCHEMA = frozen({ kind: 'none' });
export const NUMBER_SCHEMA = frozen({ kind: 'number' });
export const STRING_SCHEMA = frozen({ kind: 'string' });
export const BOOLEAN_SCHEMA = frozen({ kind: 'boolean' });

export function listSchema(element: Schema): Schema {
  return frozen({ kind: 'list', element });
}

export function recordSchema(fields: { [field: string]: Schema }): Schema {
  const entries = Object.entries(fields).map(([name, schema]) => {
    const entry: readonly [string, Schema] = [name, schema];
    Object.freeze(entry);
    return entry;
  });
  return frozen({ kind: 'record', fields: Object.freeze(entries) });
}

// ── Comparison ──────────────────────────────────────────────────────

export function schemasEqual(a: Schema, b: Schema): boolean {
  if (a === b) return true;

  switch (a.kind) {
    case 'none':
    case 'number':
    case 'string':
    case 'boolean':
      return a.kind === b.kind;
    case 'list':
      return b.kind === 'list' && schemasEqual(a.element, b.element);
    case 'record':
      return (
        b.kind === 'record' &&
        a.fields.length === b.fields.length &&
        a.fields.every(([name, schema], i) => {
          const [otherName, otherSchema] = b.fields[i];
          return name === otherName && schemasEqual(schema, otherSchema);
        })
      );
  }
}

export function formatSchema(schema: Schema): string {
  switch (schema.kind) {
    case 'none':
    case 'number':
    case 'string':
    case 'boolean':
      return schema.kind;
    case 'list':
      return `list<${formatSchema(schema.element)}>`;
    case 'record':
      return `{${schema.fields.map(([name, field]) => `${name}: ${formatSchema(field)}`).join(', ')}}`;
  }
}

// ── JSON form ───────────────────────────────────────────────────────

export const SchemaInputSchema: z.ZodType<SchemaInput> = z.lazy(() =>
  z.union([
    z.object({ kind: z.literal('none') }).strict(),
    z.object({ kind: z.literal('number') }).strict(),
    z.object({ kind: z.literal('string') }).strict(),
    z.object({ kind: z.literal('boolean') }).strict(),
    z.object({ kind: z.literal('list'), element: SchemaInputSchema }).strict(),
    z.object({ kind: z.literal('record'), fields: z.record(SchemaInputSchema) }).strict(),
  ]),
);

export function schemaFromInput(input: SchemaInput): Schema {
  switch (input.kind) {
    case 'none':
      return NONE_SCHEMA;
    case 'number':
      return NUMBER_SCHEMA;
    case 'string':
      return STRING_SCHEMA;
    case 'boolean':
      return BOOLEAN_SCHEMA;
    case 'list':
      return listSchema(schemaFromInput(input.element));
    case 'record': {
      const fields: { [field: string]: Schema } = {};
      for (const [name, field] of Object.entries(input.fields)) {
        fields[name] = schemaFromInput(field);
      }
      return recordSchema(fields);
    }
  }
}

export function schemaToInput(schema: Schema): SchemaInput {
  switch (schema.kind) {
    case 'none':
    case 'number':
    case 'string':
    case 'boolean':
      return { kind: schema.kind };
    case 'list':
      return { kind: 'list', element: schemaToInput(schema.element) };
    case 'record': {
      const fields: { [field: string]: SchemaInput } = {};
      for (const [name, field] of schema.fields) {
        fields[name] = schemaToInput(field);
      }
      return { kind: 'record', fields };
    }
  }
}
