import { existsSync, readFileSync } from 'fs';
import type { ZodType, ZodTypeDef } from 'zod';
import { consoleLogger, describeError, type Logger } from '../logging/logger';

/**
 * Reads a static JSON data file and validates it against `schema`.
 * A missing, unparsable or invalid file yields `fallback`; it never throws.
 */
export function readJsonFile<T>(
  path: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
  fallback: T,
  label: string,
  logger: Logger = consoleLogger
): T {
  if (!existsSync(path)) {
    logger.warn(`${label} file not found: ${path}`);
    return fallback;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    logger.warn(`Failed to read ${label} from ${path}: ${describeError(err)}`);
    return fallback;
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
    logger.warn(`Invalid ${label} in ${path}: ${issues.join('; ')}`);
    return fallback;
  }

  return parsed.data;
}

/** Own-property lookup; keys inherited from `Object.prototype` are treated as absent. */
export function ownValue<T>(record: Readonly<Record<string, T>>, key: string): T | undefined {
  return Object.hasOwn(record, key) ? record[key] : undefined;
}
