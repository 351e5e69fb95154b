import { z } from 'zod';
import rawRules from './datetime-rules.json';

const rulesSchema = z.object({
  nextMarkers: z.array(z.string().min(1)),
  weekdays: z.record(z.number().int().min(0).max(6)),
  relativeDays: z.array(
    z.object({
      phrases: z.array(z.string().min(1)),
      offsetDays: z.number().int().min(0),
    })
  ),
  partOfDayIdioms: z.array(z.string().min(1)),
  phraseTranslations: z.array(z.tuple([z.string().min(1), z.string().min(1)])),
  months: z.record(z.string().min(1)),
  suggestions: z.array(z.string().min(1)).min(1),
});

export type DateTimeRules = z.infer<typeof rulesSchema>;

export const DATETIME_RULES: DateTimeRules = rulesSchema.parse(rawRules);

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Whole-word (or whole-phrase) matcher that treats accented letters as letters,
 * unlike `\b`.
 */
export function phrasePattern(phrase: string, flags = ''): RegExp {
  return new RegExp(`(?<![\\p{L}\\d])${escapeRegExp(phrase)}(?![\\p{L}\\d])`, `u${flags}`);
}

export function containsPhrase(text: string, phrase: string): boolean {
  return phrasePattern(phrase).test(text);
}

export function normalizeInput(text: string): string {
  return text.normalize('NFC').toLowerCase().replace(/\s+/g, ' ').trim();
}

/** "por la mañana" is a part of day, not "tomorrow". */
export function stripPartOfDayIdioms(text: string, rules: DateTimeRules = DATETIME_RULES): string {
  return rules.partOfDayIdioms
    .reduce((acc, idiom) => acc.replace(phrasePattern(idiom, 'g'), ' '), text)
    .replace(/\s+/g, ' ')
    .trim();
}

export function findRelativeDayOffset(text: string, rules: DateTimeRules = DATETIME_RULES): number | null {
  for (const { phrases, offsetDays } of rules.relativeDays) {
    if (phrases.some((phrase) => containsPhrase(text, phrase))) {
      return offsetDays;
    }
  }
  return null;
}

export function hasNextMarker(text: string, rules: DateTimeRules = DATETIME_RULES): boolean {
  return rules.nextMarkers.some((marker) => containsPhrase(text, marker));
}

/**
 * Weekday (Monday = 0) named in a "next <weekday>" expression. The weekday
 * must co-occur with a next-marker; a bare weekday returns null.
 */
export function findNextWeekday(text: string, rules: DateTimeRules = DATETIME_RULES): number | null {
  if (!hasNextMarker(text, rules)) return null;

  let best: { index: number; weekday: number } | null = null;
  for (const [name, weekday] of Object.entries(rules.weekdays)) {
    const match = phrasePattern(name).exec(text);
    if (match && (best === null || match.index < best.index)) {
      best = { index: match.index, weekday };
    }
  }

  return best ? best.weekday : null;
}

export function daysUntilNextWeekday(referenceWeekday: number, targetWeekday: number): number {
  const ahead = (((targetWeekday - referenceWeekday) % 7) + 7) % 7;
  return ahead <= 0 ? ahead + 7 : ahead;
}

/**
 * Rewrites Spanish date phrases into English the fallback parser understands:
 * "el 15 de enero a las 2 pm" becomes "15 january at 2 pm".
 */
export function translatePhrases(text: string, rules: DateTimeRules = DATETIME_RULES): string {
  const monthNames = Object.keys(rules.months).map(escapeRegExp).join('|');
  const monthDay = new RegExp(`(?<![\\p{L}\\d])(?:el )?(\\d{1,2}) de (${monthNames})(?: (?:de|del) (\\d{4}))?(?![\\p{L}\\d])`, 'gu');

  let translated = stripPartOfDayIdioms(text, rules).replace(
    monthDay,
    (_match, day: string, month: string, year: string | undefined) =>
      [day, rules.months[month], year].filter(Boolean).join(' ')
  );

  for (const [spanish, english] of rules.phraseTranslations) {
    translated = translated.replace(phrasePattern(spanish, 'g'), english);
  }

  return translated.replace(/\s+/g, ' ').trim();
}
