/**
 * Lock loading from JSON definition files.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { DomainInputError, err, parseLockDefinition, type Result, type RuneLock } from '@runelock/core';

export const DEFAULT_LOCK_PATH = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  '../locks/default.json'
);

export function loadLock(filePath: string = DEFAULT_LOCK_PATH): Result<RuneLock, DomainInputError> {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return err(new DomainInputError('invalid-lock-definition', `Cannot read ${filePath}: ${reason}`));
  }

  let document: unknown;
  try {
    document = JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return err(new DomainInputError('invalid-lock-definition', `${filePath} is not valid JSON: ${reason}`));
  }

  return parseLockDefinition(document);
}
