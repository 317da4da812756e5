import type { Logger } from 'pino';
import {
  FALLBACK_INTENT,
  type Intent,
  type IntentEntities,
  type IntentPatternGroup,
  type MatchRule,
} from '../domain/index.js';

/** Default floor below which a candidate is discarded. */
export const DEFAULT_MIN_CONFIDENCE = 0.25;

/** Applied when the earliest match does not start at the first character. */
const OFFSET_PENALTY = 0.8;

/**
 * Unicode NFKC, trimmed, whitespace collapsed, lower-cased.
 * The detector expects text in this form.
 */
export function normalizeText(text: string): string {
  return text.normalize('NFKC').trim().replace(/\s+/g, ' ').toLowerCase();
}

/**
 * Pluggable matcher. Returns null when its intent does not apply.
 * Registration order breaks confidence ties.
 */
export interface IntentMatcher {
  readonly intent: string;
  match(normalizedText: string): Intent | null;
}

// ── Rule compilation ───────────────────────────────────────────────

interface Span {
  readonly start: number;
  readonly end: number;
}

interface RuleHit {
  readonly spans: readonly Span[];
  readonly entities: IntentEntities;
}

type CompiledRule = (text: string) => RuleHit | null;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function compileSubstring(value: string): CompiledRule {
  const needle = normalizeText(value);
  return (text) => {
    const start = text.indexOf(needle);
    if (start < 0) return null;
    return { spans: [{ start, end: start + needle.length }], entities: {} };
  };
}

function compileRegex(pattern: string, flags: string | undefined): CompiledRule {
  // No g/y: a stateful lastIndex would make detection order-dependent.
  const re = new RegExp(pattern, (flags ?? 'i').replace(/[gy]/g, ''));
  return (text) => {
    const m = re.exec(text);
    if (m === null || m[0].length === 0) return null;

    const entities: IntentEntities = {};
    for (const [key, value] of Object.entries(m.groups ?? {})) {
      if (value !== undefined) entities[key] = value;
    }
    return { spans: [{ start: m.index, end: m.index + m[0].length }], entities };
  };
}

function compileKeywords(keywords: readonly string[], mode: 'any' | 'all'): CompiledRule {
  const matchers = keywords.map((kw) => ({
    keyword: normalizeText(kw),
    re: new RegExp(`(?<![\\p{L}\\p{N}])${escapeRegExp(normalizeText(kw))}(?![\\p{L}\\p{N}])`, 'u'),
  }));

  return (text) => {
    const spans: Span[] = [];
    for (const { keyword, re } of matchers) {
      const m = re.exec(text);
      if (m === null) {
        if (mode === 'all') return null;
        continue;
      }
      spans.push({ start: m.index, end: m.index + keyword.length });
    }
    return spans.length === 0 ? null : { spans, entities: {} };
  };
}

function compileRule(rule: MatchRule): CompiledRule {
  switch (rule.kind) {
    case 'substring':
      return compileSubstring(rule.value);
    case 'regex':
      return compileRegex(rule.pattern, rule.flags);
    case 'keywords':
      return compileKeywords(rule.keywords, rule.mode);
  }
}

/**
 * Coverage of the matched spans over the whole text, penalised when the
 * first match is not at the start. Rounded to 4 decimals, capped at 1.
 */
export function scoreSpans(spans: readonly Span[], textLength: number): number {
  if (spans.length === 0 || textLength === 0) return 0;

  const sorted = [...spans].sort((a, b) => a.start - b.start);
  let covered = 0;
  let cursor = 0;
  for (const span of sorted) {
    const from = Math.max(span.start, cursor);
    if (span.end > from) covered += span.end - from;
    cursor = Math.max(cursor, span.end);
  }

  const first = sorted[0]?.start ?? 0;
  const raw = (covered / textLength) * (first === 0 ? 1 : OFFSET_PENALTY);
  return Math.min(1, Math.round(raw * 10_000) / 10_000);
}

/**
 * Matcher for one catalog group. The best-scoring rule wins; on a tie
 * the earlier rule's entities are kept.
 */
export function createPatternGroupMatcher(group: IntentPatternGroup): IntentMatcher {
  const rules = group.rules.map(compileRule);

  return {
    intent: group.intent,
    match(text: string): Intent | null {
      let best: Intent | null = null;
      for (const rule of rules) {
        const hit = rule(text);
        if (hit === null) continue;

        const confidence = scoreSpans(hit.spans, text.length);
        if (best === null || confidence > best.confidence) {
          best = { name: group.intent, confidence, entities: hit.entities };
        }
      }
      return best;
    },
  };
}

// ── Detector ───────────────────────────────────────────────────────

export interface IntentDetectorOptions {
  minConfidence?: number;
  log?: Logger;
}

/**
 * Maps normalized text to a ranked list of intents.
 *
 * Always returns at least one element: the fallback intent when nothing
 * clears the confidence floor. Never throws; a failing matcher is
 * logged and skipped.
 */
export class IntentDetector {
  private readonly matchers: IntentMatcher[] = [];
  private readonly minConfidence: number;
  private readonly log: Logger | undefined;

  constructor(matchers: readonly IntentMatcher[] = [], options: IntentDetectorOptions = {}) {
    this.matchers.push(...matchers);
    this.minConfidence = options.minConfidence ?? DEFAULT_MIN_CONFIDENCE;
    this.log = options.log;
  }

  static fromCatalog(groups: readonly IntentPatternGroup[], options: IntentDetectorOptions = {}): IntentDetector {
    return new IntentDetector(groups.map(createPatternGroupMatcher), options);
  }

  register(matcher: IntentMatcher): void {
    this.matchers.push(matcher);
  }

  get intents(): string[] {
    return this.matchers.map((m) => m.intent);
  }

  detect(normalizedText: string): Intent[] {
    if (normalizedText.length === 0) return [FALLBACK_INTENT];

    const candidates: { intent: Intent; order: number }[] = [];

    this.matchers.forEach((matcher, order) => {
      let intent: Intent | null;
      try {
        intent = matcher.match(normalizedText);
      } catch (err) {
        this.log?.warn({ err, intent: matcher.intent }, 'Intent matcher failed, skipping');
        return;
      }
      if (intent === null) return;
      if (intent.confidence <= 0 || intent.confidence < this.minConfidence) return;
      candidates.push({ intent: { ...intent, confidence: Math.min(1, intent.confidence) }, order });
    });

    if (candidates.length === 0) return [FALLBACK_INTENT];

    candidates.sort((a, b) => b.intent.confidence - a.intent.confidence || a.order - b.order);
    return candidates.map((c) => c.intent);
  }
}
