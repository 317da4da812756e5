import { z } from 'zod';

const matchRuleSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('substring'),
    value: z.string().min(1),
  }),
  z.object({
    kind: z.literal('regex'),
    pattern: z.string().min(1),
    flags: z.string().regex(/^[imsu]*$/, 'Only i, m, s and u flags are allowed').optional(),
  }),
  z.object({
    kind: z.literal('keywords'),
    keywords: z.array(z.string().min(1)).min(1),
    mode: z.enum(['any', 'all']).default('any'),
  }),
]);

function compiles(pattern: string, flags: string | undefined): boolean {
  try {
    new RegExp(pattern, flags);
    return true;
  } catch {
    return false;
  }
}

/**
 * Zod schema for config/intents.json.
 *
 * Group order is significant: it breaks confidence ties.
 * Intent names must be unique and every regex must compile.
 */
export const intentCatalogSchema = z.object({
  min_confidence: z.number().min(0).max(1).optional(),
  intents: z.array(z.object({
    intent: z.string().min(1).max(128),
    rules: z.array(matchRuleSchema).min(1),
  })).min(1),
}).superRefine((catalog, ctx) => {
  const seen = new Set<string>();
  catalog.intents.forEach((group, groupIndex) => {
    if (seen.has(group.intent)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['intents', groupIndex, 'intent'],
        message: `Duplicate intent "${group.intent}"`,
      });
    }
    seen.add(group.intent);

    group.rules.forEach((rule, ruleIndex) => {
      if (rule.kind === 'regex' && !compiles(rule.pattern, rule.flags)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['intents', groupIndex, 'rules', ruleIndex, 'pattern'],
          message: `Invalid regular expression: ${rule.pattern}`,
        });
      }
    });
  });
});

export type IntentCatalog = z.infer<typeof intentCatalogSchema>;

/**
 * Zod schema for config/responses.json.
 * Maps intent name → response variants; a `fallback` entry is required.
 */
export const responseCatalogSchema = z.object({
  responses: z.record(z.string().min(1), z.array(z.string().min(1)).min(1)),
}).refine(
  (catalog) => catalog.responses['fallback'] !== undefined,
  { message: 'A "fallback" response set is required', path: ['responses', 'fallback'] },
);

export type ResponseCatalog = z.infer<typeof responseCatalogSchema>;
