export const DEFAULT_CLASS_DURATION_MINUTES = 60;

export const CLASS_TYPE_CATALOG: Readonly<Record<string, number>> = Object.freeze({
  Yoga: 60,
  Pilates: 45,
  'HIIT Training': 30,
  'Personal Training': 60,
  'Group Fitness': 45,
});

/** Case-insensitive catalog lookup; unknown class types run for an hour. */
export function classDuration(classType: string): number {
  const wanted = classType.trim().toLowerCase();
  const entry = Object.entries(CLASS_TYPE_CATALOG).find(([name]) => name.toLowerCase() === wanted);
  return entry ? entry[1] : DEFAULT_CLASS_DURATION_MINUTES;
}

export function describeCatalog(): string {
  return Object.entries(CLASS_TYPE_CATALOG)
    .map(([name, minutes]) => `- ${name} (${minutes} minutes)`)
    .join('\n');
}
