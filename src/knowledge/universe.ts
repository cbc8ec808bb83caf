/**
 * The treatment universe of an entry: every treatment name the entry knows.
 */

interface TreatmentLists {
  readonly recommended_treatments: readonly string[];
  readonly other_treatments: readonly string[];
}

export function treatmentUniverse(entry: TreatmentLists): string[] {
  return [...new Set([...entry.recommended_treatments, ...entry.other_treatments])];
}

export function ownEntry<T>(record: Readonly<Record<string, T>>, key: string): T | undefined {
  return Object.hasOwn(record, key) ? record[key] : undefined;
}
