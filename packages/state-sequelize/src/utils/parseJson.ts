import { IntegrityError, toErrorMessage } from '@scrapeflow/core';

/**
 * Read a JSON column that may hold a JSON string or an already parsed value.
 *
 * MySQL/MariaDB with certain driver versions and SQLite return JSON columns
 * as strings instead of parsed objects.
 */
export function parseJson(value: unknown): unknown {
  if (typeof value !== 'string') {
    return value ?? null;
  }
  try {
    return JSON.parse(value) as unknown;
  } catch (error) {
    throw new IntegrityError(`Unreadable JSON column: ${toErrorMessage(error)}`, { cause: error });
  }
}
