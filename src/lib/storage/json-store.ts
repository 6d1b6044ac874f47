/**
 * JSON File Store
 * Whole-file reads and writes for the batch phases
 */

import * as fs from 'fs/promises';
import * as path from 'path';

/**
 * Raised when an input file a job depends on does not exist
 */
export class InputMissingError extends Error {
  constructor(public readonly filePath: string) {
    super(`${filePath} not found`);
    this.name = 'InputMissingError';
  }
}

/**
 * Raised when an input file parses but is not a JSON array
 */
export class InvalidInputError extends Error {
  constructor(public readonly filePath: string, detail: string) {
    super(`${filePath}: ${detail}`);
    this.name = 'InvalidInputError';
  }
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Read a JSON array. Elements are returned unvalidated.
 */
export async function readJsonArray(filePath: string): Promise<unknown[]> {
  if (!(await fileExists(filePath))) {
    throw new InputMissingError(filePath);
  }

  const raw = await fs.readFile(filePath, 'utf-8');
  const parsed: unknown = JSON.parse(raw);
  if (!Array.isArray(parsed)) {
    throw new InvalidInputError(filePath, 'expected a JSON array');
  }
  return parsed;
}

/**
 * Rewrite a file with 2-space indented JSON. Non-ASCII text is written as is.
 */
export async function writeJson(filePath: string, value: unknown): Promise<void> {
  await fs.mkdir(path.dirname(path.resolve(filePath)), { recursive: true });
  await fs.writeFile(filePath, JSON.stringify(value, null, 2), 'utf-8');
}
