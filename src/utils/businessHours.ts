import { BusinessHours, TimeWindow } from '../types/booking';
import { extractTime, formatClock } from '../services/datetime/time.rules';

const NAMED_RANGES: { pattern: RegExp; window: TimeWindow }[] = [
  { pattern: /\b(morning|mañana|manana)\b/i, window: ['09:00', '12:00'] },
  { pattern: /\b(afternoon|tarde)\b/i, window: ['12:00', '17:00'] },
  { pattern: /\b(evening|night|noche)\b/i, window: ['17:00', '20:00'] },
];

const RANGE_SEPARATOR = /\s*[-–]\s*|\s+(?:to|until|till|a|hasta)\s+/i;

export function toMinutes(clock: string): number {
  const [hours, minutes] = clock.split(':').map(Number);
  return hours * 60 + (minutes || 0);
}

export function businessWindow(hours: BusinessHours): TimeWindow {
  return [formatClock(hours.startHour, 0), formatClock(hours.endHour, 0)];
}

function clockFromText(fragment: string): string | null {
  const trimmed = fragment.trim().toLowerCase();
  const explicit = extractTime(trimmed);
  if (explicit) return formatClock(explicit.hour, explicit.minute);

  const bareHour = /^(\d{1,2})$/.exec(trimmed);
  if (bareHour && Number(bareHour[1]) <= 23) return formatClock(Number(bareHour[1]), 0);

  return null;
}

/**
 * Maps a coarse range phrase ("morning", "tarde") or an explicit range
 * ("9am-12pm", "14:00 to 16:00") to a window. Returns null when the text names
 * no range, in which case callers use business hours.
 */
export function resolveTimeRange(text: string | undefined): TimeWindow | null {
  if (!text || !text.trim()) return null;

  for (const { pattern, window } of NAMED_RANGES) {
    if (pattern.test(text)) return window;
  }

  const parts = text.split(RANGE_SEPARATOR);
  if (parts.length === 2) {
    const start = clockFromText(parts[0]);
    const end = clockFromText(parts[1]);
    if (start && end && toMinutes(start) < toMinutes(end)) {
      return [start, end];
    }
  }

  return null;
}
