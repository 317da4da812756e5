import { readFileSync } from 'node:fs';
import type { ZodType, ZodTypeDef } from 'zod';
import {
  intentCatalogSchema,
  responseCatalogSchema,
  type IntentCatalog,
  type ResponseCatalog,
} from '../../application/catalog-schema.js';
import { CatalogError } from '../../domain/index.js';

function loadJson<T>(path: string, schema: ZodType<T, ZodTypeDef, unknown>, label: string): T {
  let raw: string;
  try {
    raw = readFileSync(path, 'utf8');
  } catch (err: unknown) {
    throw new CatalogError(`Cannot read ${label} at ${path}`, { cause: err });
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err: unknown) {
    throw new CatalogError(`${label} at ${path} is not valid JSON`, { cause: err });
  }

  return parseCatalog(json, schema, `${label} at ${path}`);
}

function parseCatalog<T>(json: unknown, schema: ZodType<T, ZodTypeDef, unknown>, label: string): T {
  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new CatalogError(`Invalid ${label}: ${issues.join('; ')}`);
  }
  return parsed.data;
}

/** Reads and validates the intent pattern catalog (config/intents.json). */
export function loadIntentCatalog(path: string): IntentCatalog {
  return loadJson(path, intentCatalogSchema, 'intent catalog');
}

/** Reads and validates the response template catalog (config/responses.json). */
export function loadResponseCatalog(path: string): ResponseCatalog {
  return loadJson(path, responseCatalogSchema, 'response catalog');
}

/** Validates an intent catalog that is already in memory. */
export function parseIntentCatalog(json: unknown): IntentCatalog {
  return parseCatalog(json, intentCatalogSchema, 'intent catalog');
}

/** Validates a response catalog that is already in memory. */
export function parseResponseCatalog(json: unknown): ResponseCatalog {
  return parseCatalog(json, responseCatalogSchema, 'response catalog');
}
