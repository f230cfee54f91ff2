/**
 * Value: immutable payload paired with its Schema.
 *
 * `data` is validated against the schema with zod on construction, so any
 * Value in circulation conforms to its schema.
 */

import { z } from 'zod';
import { type Schema, NONE_SCHEMA, NUMBER_SCHEMA, STRING_SCHEMA, formatSchema } from './schema';

// ── Types ───────────────────────────────────────────────────────────

export type ValueData = null | number | string | boolean | readonly ValueData[] | { readonly [field: string]: ValueData };

export interface Value {
  readonly schema: Schema;
  readonly data: ValueData;
}

export type ValueResult = { ok: true; value: Value } | { ok: false; message: string };

// ── Validation ──────────────────────────────────────────────────────

function toZodSchema(schema: Schema): z.ZodType<ValueData> {
  switch (schema.kind) {
    case 'none':
      return z.null();
    case 'number':
      return z.number().finite();
    case 'string':
      return z.string();
    case 'boolean':
      return z.boolean();
    case 'list':
      return z.array(toZodSchema(schema.element));
    case 'record': {
      const shape: { [field: string]: z.ZodType<ValueData> } = {};
      for (const [name, field] of schema.fields) {
        shape[name] = toZodSchema(field);
      }
      return z.object(shape).strict();
    }
  }
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || 'value'}: ${issue.message}`).join('; ');
}

function deepFreeze(data: ValueData): ValueData {
  if (data !== null && typeof data === 'object') {
    Object.freeze(data);
    for (const item of Object.values(data)) {
      deepFreeze(item);
    }
  }
  return data;
}

/** Build a Value, validating `data` against `schema`. */
export function createValue(schema: Schema, data: unknown): ValueResult {
  const result = toZodSchema(schema).safeParse(data);
  if (!result.success) {
    return { ok: false, message: `Data does not match schema ${formatSchema(schema)}: ${describeIssues(result.error)}` };
  }
  return { ok: true, value: Object.freeze({ schema, data: deepFreeze(result.data) }) };
}

export const NONE_VALUE: Value = Object.freeze({ schema: NONE_SCHEMA, data: null });

export function numberValue(data: number): Value {
  return Object.freeze({ schema: NUMBER_SCHEMA, data });
}

export function stringValue(data: string): Value {
  return Object.freeze({ schema: STRING_SCHEMA, data });
}

// ── Comparison ──────────────────────────────────────────────────────

export function dataEqual(a: ValueData, b: ValueData): boolean {
  if (a === b) return true;
  if (a === null || b === null || typeof a !== 'object' || typeof b !== 'object') return false;

  if (isList(a) || isList(b)) {
    if (!isList(a) || !isList(b) || a.length !== b.length) return false;
    return a.every((item, i) => dataEqual(item, b[i]));
  }

  const keys = Object.keys(a);
  if (keys.length !== Object.keys(b).length) return false;
  return keys.every((key) => key in b && dataEqual(a[key], b[key]));
}

function isList(data: ValueData): data is readonly ValueData[] {
  return Array.isArray(data);
}
