import {
  NONE_SCHEMA,
  NUMBER_SCHEMA,
  STRING_SCHEMA,
  BOOLEAN_SCHEMA,
  NONE_VALUE,
  SchemaInputSchema,
  listSchema,
  recordSchema,
  schemasEqual,
  formatSchema,
  schemaFromInput,
  schemaToInput,
  createValue,
  dataEqual,
  numberValue,
} from '../src/value';

describe('schemasEqual', () => {
  it('compares scalar schemas by kind', () => {
    expect(schemasEqual(NUMBER_SCHEMA, { kind: 'number' })).toBe(true);
    expect(schemasEqual(NUMBER_SCHEMA, STRING_SCHEMA)).toBe(false);
  });

  it('compares list schemas by element', () => {
    expect(schemasEqual(listSchema(NUMBER_SCHEMA), listSchema(NUMBER_SCHEMA))).toBe(true);
    expect(schemasEqual(listSchema(NUMBER_SCHEMA), listSchema(BOOLEAN_SCHEMA))).toBe(false);
  });

  it('treats record field order as significant', () => {
    const xy = recordSchema({ x: NUMBER_SCHEMA, y: NUMBER_SCHEMA });
    const yx = recordSchema({ y: NUMBER_SCHEMA, x: NUMBER_SCHEMA });

    expect(schemasEqual(xy, recordSchema({ x: NUMBER_SCHEMA, y: NUMBER_SCHEMA }))).toBe(true);
    expect(schemasEqual(xy, yx)).toBe(false);
  });
});

describe('formatSchema', () => {
  it('renders nested schemas', () => {
    const schema = recordSchema({ name: STRING_SCHEMA, scores: listSchema(NUMBER_SCHEMA) });
    expect(formatSchema(schema)).toBe('{name: string, scores: list<number>}');
  });
});

describe('createValue', () => {
  it('accepts data matching the schema', () => {
    const schema = recordSchema({ x: NUMBER_SCHEMA, tags: listSchema(STRING_SCHEMA) });
    const result = createValue(schema, { x: 1, tags: ['a', 'b'] });

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.schema).toBe(schema);
      expect(result.value.data).toEqual({ x: 1, tags: ['a', 'b'] });
      expect(Object.isFrozen(result.value.data)).toBe(true);
    }
  });

  it('rejects data of the wrong type', () => {
    const result = createValue(NUMBER_SCHEMA, 'seven');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.message).toBe('Data does not match schema number: value: Expected number, received string');
    }
  });

  it('rejects unknown record fields', () => {
    const result = createValue(recordSchema({ x: NUMBER_SCHEMA }), { x: 1, y: 2 });
    expect(result.ok).toBe(false);
  });

  it('only accepts null for the none schema', () => {
    expect(createValue(NONE_SCHEMA, null).ok).toBe(true);
    expect(createValue(NONE_SCHEMA, 0).ok).toBe(false);
  });

  it('rejects non-finite numbers', () => {
    expect(createValue(NUMBER_SCHEMA, Number.POSITIVE_INFINITY).ok).toBe(false);
  });
});

describe('dataEqual', () => {
  it('compares nested data structurally', () => {
    expect(dataEqual({ a: [1, 2], b: 'x' }, { a: [1, 2], b: 'x' })).toBe(true);
    expect(dataEqual({ a: [1, 2] }, { a: [2, 1] })).toBe(false);
    expect(dataEqual([1], { 0: 1 })).toBe(false);
    expect(dataEqual(NONE_VALUE.data, null)).toBe(true);
    expect(dataEqual(numberValue(3).data, 3)).toBe(true);
  });
});

describe('schema JSON form', () => {
  it('parses and converts a nested schema', () => {
    const parsed = SchemaInputSchema.parse({
      kind: 'record',
      fields: { id: { kind: 'number' }, names: { kind: 'list', element: { kind: 'string' } } },
    });
    const schema = schemaFromInput(parsed);

    expect(schemasEqual(schema, recordSchema({ id: NUMBER_SCHEMA, names: listSchema(STRING_SCHEMA) }))).toBe(true);
    expect(schemaToInput(schema)).toEqual(parsed);
  });

  it('rejects unknown kinds', () => {
    expect(SchemaInputSchema.safeParse({ kind: 'date' }).success).toBe(false);
  });
});
