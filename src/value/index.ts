export {
  type Schema,
  type SchemaInput,
  NONE_SCHEMA,
  NUMBER_SCHEMA,
  STRING_SCHEMA,
  BOOLEAN_SCHEMA,
  listSchema,
  recordSchema,
  schemasEqual,
  formatSchema,
  SchemaInputSchema,
  schemaFromInput,
  schemaToInput,
} from './schema';
export {
  type ValueData,
  type Value,
  type ValueResult,
  createValue,
  NONE_VALUE,
  numberValue,
  stringValue,
  dataEqual,
} from './value';
