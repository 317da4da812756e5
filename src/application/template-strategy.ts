import {
  FALLBACK_INTENT_NAME,
  TemplateRenderError,
  type ContextSlots,
  type Intent,
  type SessionContext,
} from '../domain/index.js';
import type { GeneratedResponse, ResponseStrategy } from './response-generator.js';
import { ENTITY_SLOT_PREFIX, clockSlots, rememberedEntities, renderTemplate } from './template.js';

export type ResponseTemplates = Readonly<Record<string, readonly string[]>>;

/** Slot holding the index of the last variant used for an intent. */
export function variantSlot(intent: string): string {
  return `lastVariant.${intent}`;
}

export interface TemplateStrategyOptions {
  nowFn?: () => Date;
  /** Template set used for intents with no templates of their own. */
  fallbackIntent?: string;
}

/**
 * Deterministic template responses.
 *
 * Picks the lowest-index variant that differs from the one used last
 * time for the same intent, skipping variants whose placeholders cannot
 * be filled. Placeholders resolve from the intent's entities, then
 * entities remembered in the session, then the clock.
 */
export class TemplateStrategy implements ResponseStrategy {
  readonly name = 'template';
  private readonly templates: ResponseTemplates;
  private readonly nowFn: () => Date;
  private readonly fallbackIntent: string;

  constructor(templates: ResponseTemplates, options: TemplateStrategyOptions = {}) {
    this.templates = templates;
    this.nowFn = options.nowFn ?? (() => new Date());
    this.fallbackIntent = options.fallbackIntent ?? FALLBACK_INTENT_NAME;
  }

  async respond(intent: Intent, context: SessionContext): Promise<GeneratedResponse> {
    const key = this.templates[intent.name] !== undefined ? intent.name : this.fallbackIntent;
    const variants = this.templates[key];
    if (variants === undefined || variants.length === 0) {
      throw new TemplateRenderError(`No templates for intent "${intent.name}"`);
    }

    const values: Record<string, string> = {
      ...clockSlots(this.nowFn()),
      ...rememberedEntities(context.slots),
      ...intent.entities,
    };

    for (const index of variantOrder(variants.length, context.slots[variantSlot(key)])) {
      const template = variants[index];
      if (template === undefined) continue;

      const text = renderTemplate(template, values);
      if (text === null) continue;

      const slots: ContextSlots = { [variantSlot(key)]: index, lastIntent: intent.name };
      for (const [name, value] of Object.entries(intent.entities)) {
        slots[`${ENTITY_SLOT_PREFIX}${name}`] = value;
      }
      return { text, slots };
    }

    throw new TemplateRenderError(`No renderable template for intent "${intent.name}"`);
  }
}

/** Ascending indexes, with the last-used one moved to the end. */
function variantOrder(count: number, lastUsed: unknown): number[] {
  const all = Array.from({ length: count }, (_, i) => i);
  if (typeof lastUsed !== 'number' || count < 2) return all;
  return [...all.filter((i) => i !== lastUsed), ...all.filter((i) => i === lastUsed)];
}
