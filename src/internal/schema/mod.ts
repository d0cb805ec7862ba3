export { SchemaDatabase, TEXT_CHILD, isValidAttributeName } from "./database.js";
export type { SchemaDatabaseInit } from "./database.js";
export { createSchemaDatabase, defaultSchema, loadSchemaDatabase, DEFAULT_SCHEMA_URL } from "./load.js";
