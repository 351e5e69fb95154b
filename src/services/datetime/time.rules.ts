import { ExtractedTime } from '../../types/datetime';

const MERIDIEM = String.raw`([ap])\.?\s?m\.?(?![a-z])`;

interface TimeRule {
  name: string;
  pattern: RegExp;
  hourGroup: number;
  minuteGroup?: number;
  meridiemGroup?: number;
}

/**
 * Explicit clock-time alternatives, tried in order. The first rule that yields
 * a valid 24h time wins, so the Spanish "a la(s)" forms shadow the bare ones.
 */
export const TIME_RULES: readonly TimeRule[] = [
  {
    name: 'a_la_meridiem',
    pattern: new RegExp(String.raw`\ba la (\d{1,2})\s*${MERIDIEM}`),
    hourGroup: 1,
    meridiemGroup: 2,
  },
  {
    name: 'a_las_clock',
    pattern: new RegExp(String.raw`\ba las (\d{1,2}):(\d{2})(?:\s*${MERIDIEM})?`),
    hourGroup: 1,
    minuteGroup: 2,
    meridiemGroup: 3,
  },
  {
    name: 'a_las_meridiem',
    pattern: new RegExp(String.raw`\ba las (\d{1,2})\s*${MERIDIEM}`),
    hourGroup: 1,
    meridiemGroup: 2,
  },
  {
    name: 'at_meridiem',
    pattern: new RegExp(String.raw`\bat (\d{1,2})\s*${MERIDIEM}`),
    hourGroup: 1,
    meridiemGroup: 2,
  },
  {
    name: 'bare_clock',
    pattern: new RegExp(String.raw`\b(\d{1,2}):(\d{2})(?:\s*${MERIDIEM})?`),
    hourGroup: 1,
    minuteGroup: 2,
    meridiemGroup: 3,
  },
  {
    name: 'bare_meridiem',
    pattern: new RegExp(String.raw`\b(\d{1,2})\s*${MERIDIEM}`),
    hourGroup: 1,
    meridiemGroup: 2,
  },
];

export const DEFAULT_TIME: Readonly<ExtractedTime> = { hour: 0, minute: 0, rule: 'default' };

export function to24Hour(hour: number, meridiem?: string): number {
  if (meridiem === 'p' && hour !== 12) return hour + 12;
  if (meridiem === 'a' && hour === 12) return 0;
  return hour;
}

function applyRule(rule: TimeRule, text: string): ExtractedTime | null {
  const match = rule.pattern.exec(text);
  if (!match) return null;

  const rawHour = parseInt(match[rule.hourGroup], 10);
  const minute = rule.minuteGroup ? parseInt(match[rule.minuteGroup], 10) : 0;
  const meridiem = rule.meridiemGroup ? match[rule.meridiemGroup] : undefined;

  // "15pm" or "0am" are not clock times
  if (meridiem && (rawHour < 1 || rawHour > 12)) return null;

  const hour = to24Hour(rawHour, meridiem);
  if (hour > 23 || minute > 59) return null;

  return { hour, minute, rule: rule.name };
}

/**
 * Returns the first explicit time in `text`, or null when none of the rules
 * match. Expects lowercased input.
 */
export function extractTime(text: string): ExtractedTime | null {
  for (const rule of TIME_RULES) {
    const extracted = applyRule(rule, text);
    if (extracted) return extracted;
  }
  return null;
}

export function formatClock(hour: number, minute: number): string {
  return `${String(hour).padStart(2, '0')}:${String(minute).padStart(2, '0')}`;
}
