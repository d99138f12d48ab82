/**
 * JSON ABI Reader
 *
 * Reads library ABI descriptors: JSON files that a compiler plugin emits next
 * to each compiled library artifact, validated against
 * schemas/library-abi.schema.json.
 */

import * as fs from 'fs';
import * as path from 'path';
import Ajv, { ErrorObject, SchemaObject, ValidateFunction } from 'ajv';
import { AbiReader, LibraryAbi } from '../core/types';

const SCHEMA_PATH = path.join(__dirname, '..', '..', 'schemas', 'library-abi.schema.json');

let cachedValidator: ValidateFunction | null = null;

function getValidator(): ValidateFunction {
  if (cachedValidator) return cachedValidator;

  const ajv = new Ajv({ allErrors: true });
  const schema: SchemaObject = JSON.parse(fs.readFileSync(SCHEMA_PATH, 'utf-8'));
  cachedValidator = ajv.compile(schema);
  return cachedValidator;
}

function isLibraryAbi(data: unknown): data is LibraryAbi {
  return getValidator()(data);
}

function describeErrors(errors: ErrorObject[] | null | undefined): string {
  return (errors ?? [])
    .map((e) => `${e.instancePath || '/'}: ${e.message ?? 'Unknown error'}`)
    .join('; ');
}

/**
 * Parse and validate descriptor text.
 */
export function parseLibraryAbi(input: string, source = '<input>'): LibraryAbi {
  let cleaned = input.trim();
  if (cleaned.charCodeAt(0) === 0xfeff) {
    cleaned = cleaned.substring(1);
  }

  let data: unknown;
  try {
    data = JSON.parse(cleaned);
  } catch (error) {
    throw new Error(
      `Failed to parse ABI descriptor ${source}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  if (!isLibraryAbi(data)) {
    throw new Error(`Invalid ABI descriptor ${source}: ${describeErrors(getValidator().errors)}`);
  }
  return data;
}

export class JsonAbiReader implements AbiReader {
  read(artifactPath: string): LibraryAbi {
    const resolved = path.resolve(artifactPath);
    if (!fs.existsSync(resolved)) {
      throw new Error(`File does not exist: ${resolved}`);
    }
    return parseLibraryAbi(fs.readFileSync(resolved, 'utf-8'), resolved);
  }
}
