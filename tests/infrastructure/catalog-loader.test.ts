import { mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect } from 'vitest';
import { CatalogError } from '../../src/domain/index.js';
import {
  loadIntentCatalog,
  loadResponseCatalog,
  parseIntentCatalog,
  parseResponseCatalog,
} from '../../src/infrastructure/catalog/index.js';
import { INTENTS_PATH, RESPONSES_PATH } from '../helpers.js';

describe('catalog loader', () => {
  it('loads the shipped catalogs', () => {
    const intents = loadIntentCatalog(INTENTS_PATH);
    const responses = loadResponseCatalog(RESPONSES_PATH);

    expect(intents.min_confidence).toBe(0.25);
    expect(intents.intents.map((g) => g.intent)).toContain('time.query');
    expect(responses.responses['fallback']?.length).toBeGreaterThan(0);
  });

  it('defaults keyword rules to "any" mode', () => {
    const catalog = parseIntentCatalog({
      intents: [{ intent: 'weather', rules: [{ kind: 'keywords', keywords: ['rain', 'sunny'] }] }],
    });

    expect(catalog.intents[0]?.rules[0]).toEqual({ kind: 'keywords', keywords: ['rain', 'sunny'], mode: 'any' });
  });

  it('rejects duplicate intent names', () => {
    const rules = [{ kind: 'substring', value: 'hi' }];
    expect(() => parseIntentCatalog({ intents: [{ intent: 'a', rules }, { intent: 'a', rules }] }))
      .toThrow('Duplicate intent "a"');
  });

  it('rejects regexes that do not compile', () => {
    expect(() => parseIntentCatalog({ intents: [{ intent: 'a', rules: [{ kind: 'regex', pattern: '(unclosed' }] }] }))
      .toThrow(CatalogError);
  });

  it('rejects unsupported regex flags', () => {
    expect(() => parseIntentCatalog({ intents: [{ intent: 'a', rules: [{ kind: 'regex', pattern: 'x', flags: 'g' }] }] }))
      .toThrow('Only i, m, s and u flags are allowed');
  });

  it('requires a fallback response set', () => {
    expect(() => parseResponseCatalog({ responses: { greeting: ['Hello!'] } }))
      .toThrow('A "fallback" response set is required');
  });

  it('reports missing files and invalid JSON as CatalogError', () => {
    const dir = mkdtempSync(join(tmpdir(), 'catalog-'));
    const broken = join(dir, 'broken.json');
    writeFileSync(broken, '{ not json');

    expect(() => loadIntentCatalog(join(dir, 'missing.json'))).toThrow(CatalogError);
    expect(() => loadResponseCatalog(broken)).toThrow('is not valid JSON');
  });
});
