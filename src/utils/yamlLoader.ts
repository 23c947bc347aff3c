import * as YAML from 'yaml';
import * as fs from 'fs';
import * as path from 'path';
import { SchemaObject } from 'ajv';
import { assertJsonSchema } from './jsonSchema';

/**
 * Loads a YAML data file and checks it against a JSON schema
 * @param filePath - Absolute path, or relative to the working directory
 * @param schema - JSON schema describing `T`
 * @returns Parsed and validated content
 * @throws Error if the file cannot be read or does not match the schema
 */
export function loadYamlFixture<T>(filePath: string, schema: SchemaObject): T {
  const absolutePath = path.isAbsolute(filePath)
    ? filePath
    : path.join(process.cwd(), filePath);

  const content: unknown = YAML.parse(fs.readFileSync(absolutePath, 'utf-8'));
  assertJsonSchema<T>(content, schema, `Invalid fixture file ${absolutePath}`);
  return content;
}
