import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import type { ServiceTagMap } from '../types.js';
import { ServiceCodeConfigError } from './errors.js';

export const DEFAULT_SERVICE_CODES_FILE = fileURLToPath(new URL('../config/service-codes.json', import.meta.url));

export const TAG_PATTERN = /^[a-zA-Z0-9_-]+$/;

const serviceCodeTableSchema = z.record(
  z.string().regex(/^[A-Z0-9_-]+$/, 'service codes must be uppercase letters, digits, "_" or "-"'),
  z
    .array(z.string().regex(TAG_PATTERN, 'tags may only contain letters, digits, "_" and "-"'))
    .min(1, 'every service code needs at least one tag')
);

/**
 * Builds the read-only code → tags lookup used by the normalizer. Throws
 * ServiceCodeConfigError when the table does not match the expected shape.
 */
export function createServiceTagMap(table: unknown): ServiceTagMap {
  const parsed = serviceCodeTableSchema.safeParse(table);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ServiceCodeConfigError(`Invalid service code table: ${issues.join('; ')}`);
  }
  const entries = Object.entries(parsed.data).map(([code, tags]): [string, readonly string[]] => [
    code,
    Object.freeze([...tags]),
  ]);
  return new Map(entries);
}

export function loadServiceTags(filePath: string = DEFAULT_SERVICE_CODES_FILE): ServiceTagMap {
  let raw: string;
  try {
    raw = readFileSync(filePath, 'utf8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ServiceCodeConfigError(`Cannot read service code table ${filePath}: ${reason}`);
  }

  let table: unknown;
  try {
    table = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ServiceCodeConfigError(`Service code table ${filePath} is not valid JSON: ${reason}`);
  }
  return createServiceTagMap(table);
}

export function serviceTagsToObject(serviceTags: ServiceTagMap): Record<string, string[]> {
  const result: Record<string, string[]> = {};
  serviceTags.forEach((tags, code) => {
    result[code] = [...tags];
  });
  return result;
}
