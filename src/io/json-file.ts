/**
 * JSON File Reader
 *
 * Reads a JSON file and validates it against a Zod schema.
 */

import * as fs from 'fs';
import { z } from 'zod';
import { AnimErrorFactory } from '../errors';

export function readJsonFile<S extends z.ZodTypeAny>(filePath: string, schema: S): z.output<S> {
  let text: string;
  try {
    text = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw AnimErrorFactory.fileSystemError(
      `Could not read ${filePath}`,
      filePath,
      'read',
      { cause: error instanceof Error ? error.message : String(error) }
    );
  }

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    throw AnimErrorFactory.schemaError(
      `Invalid JSON in ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      filePath
    );
  }

  const result = schema.safeParse(data);
  if (!result.success) {
    throw AnimErrorFactory.schemaError(`Schema validation failed for ${filePath}`, filePath, result.error);
  }
  return result.data;
}
