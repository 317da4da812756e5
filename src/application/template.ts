import type { ContextSlots } from '../domain/index.js';

const PLACEHOLDER_RE = /\{([a-z_][a-z0-9_]*)\}/gi;

const WEEKDAYS = ['Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday'] as const;
const MONTHS = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December',
] as const;

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

/**
 * Clock-derived slot values, in local time.
 *
 * current_time "09:05 AM", date "2026-02-18", weekday "Wednesday",
 * formatted_date "February 18, 2026", time_of_day morning|afternoon|evening.
 */
export function clockSlots(now: Date): Record<string, string> {
  const hours = now.getHours();
  const hours12 = hours % 12 === 0 ? 12 : hours % 12;

  return {
    current_time: `${pad2(hours12)}:${pad2(now.getMinutes())} ${hours < 12 ? 'AM' : 'PM'}`,
    date: `${now.getFullYear()}-${pad2(now.getMonth() + 1)}-${pad2(now.getDate())}`,
    weekday: WEEKDAYS[now.getDay()] ?? '',
    formatted_date: `${MONTHS[now.getMonth()] ?? ''} ${pad2(now.getDate())}, ${now.getFullYear()}`,
    time_of_day: hours < 12 ? 'morning' : hours < 17 ? 'afternoon' : 'evening',
  };
}

/** Slot key prefix under which detected entities are remembered. */
export const ENTITY_SLOT_PREFIX = 'entity.';

/** Entities remembered from earlier turns, keyed by entity name. */
export function rememberedEntities(slots: Readonly<ContextSlots>): Record<string, string> {
  const entities: Record<string, string> = {};
  for (const [key, value] of Object.entries(slots)) {
    if (key.startsWith(ENTITY_SLOT_PREFIX) && typeof value === 'string') {
      entities[key.slice(ENTITY_SLOT_PREFIX.length)] = value;
    }
  }
  return entities;
}

/** Names of every `{placeholder}` in a template. */
export function placeholders(template: string): string[] {
  return [...template.matchAll(PLACEHOLDER_RE)].map((m) => m[1] ?? '');
}

/**
 * Fills `{name}` placeholders. Returns null when any placeholder has no value.
 */
export function renderTemplate(template: string, values: Readonly<Record<string, string>>): string | null {
  let missing = false;
  const text = template.replace(PLACEHOLDER_RE, (_match, name: string) => {
    const value = values[name];
    if (value === undefined) {
      missing = true;
      return '';
    }
    return value;
  });
  return missing ? null : text;
}
