/** Values extracted from the user's text (named capture groups, keyword hits). */
export type IntentEntities = Record<string, string>;

/** A detected intent. `confidence` is always within [0, 1]. */
export interface Intent {
  readonly name: string;
  readonly confidence: number;
  readonly entities: Readonly<IntentEntities>;
}

export const FALLBACK_INTENT_NAME = 'fallback';

/** The zero-confidence "no match" intent. */
export const FALLBACK_INTENT: Intent = Object.freeze({
  name: FALLBACK_INTENT_NAME,
  confidence: 0,
  entities: Object.freeze({}),
});

/** Match rules a pattern group may contain. */
export type MatchRule =
  | { readonly kind: 'substring'; readonly value: string }
  | { readonly kind: 'regex'; readonly pattern: string; readonly flags?: string | undefined }
  | { readonly kind: 'keywords'; readonly keywords: readonly string[]; readonly mode: 'any' | 'all' };

/** One intent's rule group, as loaded from the intent catalog. */
export interface IntentPatternGroup {
  readonly intent: string;
  readonly rules: readonly MatchRule[];
}
