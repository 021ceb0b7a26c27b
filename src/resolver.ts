import suraLengths from './data/sura-lengths.json';
import { ExerciseEntry, VerseReference } from './types';

export const SURA_COUNT = suraLengths.length;

export function verseKey(reference: VerseReference): string {
    return `${reference.sura}:${reference.verse}`;
}

/** Number of verses in a sura, or 0 for a sura number outside 1..114. */
export function verseCount(sura: number): number {
    return Number.isInteger(sura) && sura >= 1 && sura <= SURA_COUNT ? suraLengths[sura - 1] : 0;
}

export function isValidVerseReference(reference: VerseReference): boolean {
    return Number.isInteger(reference.verse) && reference.verse >= 1 && reference.verse <= verseCount(reference.sura);
}

export function referenceOf(exercise: ExerciseEntry): VerseReference | null {
    if (exercise.sura === null || exercise.verse === null) {
        return null;
    }
    return { sura: exercise.sura, verse: exercise.verse };
}

/**
 * Distinct verse references in first-seen order, so lookups run in the same
 * order on every run. Exercises without a verse are skipped.
 */
export function resolveVerseReferences(exercises: readonly ExerciseEntry[], enrichmentEnabled: boolean): VerseReference[] {
    if (!enrichmentEnabled) {
        return [];
    }

    const seen = new Set<string>();
    const references: VerseReference[] = [];
    for (const exercise of exercises) {
        const reference = referenceOf(exercise);
        if (!reference) {
            continue;
        }
        const key = verseKey(reference);
        if (!seen.has(key)) {
            seen.add(key);
            references.push(reference);
        }
    }
    return references;
}
