import { VocabularyEntry } from './types';

export type GlossaryOrder = 'english' | 'arabic';

export interface GlossaryGroup {
    letter: string;
    entries: VocabularyEntry[];
}

// Harakat, superscript alif and tatweel do not affect alphabetical position
const ARABIC_NON_LETTERS = /[\u0640\u064B-\u065F\u0670]/g;

/** Drops a leading "(+ bi-)" or "[...]" qualifier. */
export function removeLeadingQualifier(text: string): string {
    const trimmed = text.trim();
    const close = trimmed.startsWith('(') ? trimmed.indexOf(')') : trimmed.startsWith('[') ? trimmed.indexOf(']') : -1;
    return close === -1 ? trimmed : trimmed.slice(close + 1).trim();
}

export function englishSortKey(english: string): string {
    const text = removeLeadingQualifier(english.toLowerCase());
    const verb = /^to\s+(?=\w)/.exec(text);
    return verb ? text.slice(verb[0].length) : text;
}

export function arabicHeadword(entry: VocabularyEntry): string {
    return [entry.singular_or_perfect, entry.dual_or_imperfect, entry.plural_or_verbal_noun].find(w => w.trim() !== '') ?? '';
}

export function arabicSortKey(entry: VocabularyEntry): string {
    return arabicHeadword(entry).replace(ARABIC_NON_LETTERS, '').trim();
}

function compareCodeUnits(a: string, b: string): number {
    return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Sorts vocabulary alphabetically and groups it by first letter. Keys compare
 * by code unit so the order does not depend on the host locale; ties keep
 * lesson order, then input order.
 */
export function buildGlossary(entries: readonly VocabularyEntry[], order: GlossaryOrder): GlossaryGroup[] {
    const keyOf = order === 'english' ? (e: VocabularyEntry) => englishSortKey(e.english) : arabicSortKey;

    const sorted = entries
        .map((entry, index) => ({ entry, index, key: keyOf(entry) }))
        .sort((a, b) =>
            compareCodeUnits(a.key, b.key) || a.entry.lesson_number - b.entry.lesson_number || a.index - b.index
        );

    const groups: GlossaryGroup[] = [];
    for (const item of sorted) {
        const first = Array.from(item.key)[0] ?? '';
        const letter = order === 'english' ? first.toUpperCase() : first;
        const last = groups[groups.length - 1];
        if (last && last.letter === letter) {
            last.entries.push(item.entry);
        } else {
            groups.push({ letter, entries: [item.entry] });
        }
    }
    return groups;
}
