import { EntryKind, RawRow } from './types';

export const Column = {
    SingularPerfect: 'Sing. / Perf.',
    DualImperfect: 'Dual / Imperf.',
    PluralVerbalNoun: 'Plural / Verbal N.',
    English: 'English',
    Sura: 'Sura',
    Verse: 'Verse',
    Lesson: 'Lesson #',
    Kind: 'Ex/Voc',
    Exercise: 'Exercise #',
    VerbForm: 'Verb Form',
} as const;

export type ColumnName = typeof Column[keyof typeof Column];

export const REQUIRED_COLUMNS: Record<EntryKind, ColumnName[]> = {
    Vocabulary: [Column.SingularPerfect, Column.English, Column.Lesson],
    Exercise: [Column.SingularPerfect, Column.English, Column.Lesson, Column.Exercise],
};

// Headers used by the exercise-only and combined sheet layouts
const HEADER_ALIASES: Record<string, ColumnName> = {
    'lesson number': Column.Lesson,
    'exercise number': Column.Exercise,
    'english translations': Column.English,
    'quran chapter/surah': Column.Sura,
    'quran verse/ayah': Column.Verse,
    'arabic text': Column.SingularPerfect,
};

const CANONICAL_BY_KEY = new Map<string, ColumnName>(
    Object.values(Column).map(name => [headerKey(name), name])
);

function headerKey(header: string): string {
    return header.toLowerCase().replace(/\s+/g, '');
}

/**
 * Maps a sheet header to its canonical column name. Headers that are neither
 * canonical nor a known alias are returned trimmed so they still reach the row.
 */
export function canonicalHeader(header: string): string {
    const trimmed = header.trim();
    const key = headerKey(trimmed);
    const canonical = CANONICAL_BY_KEY.get(key);
    if (canonical) {
        return canonical;
    }
    for (const [alias, name] of Object.entries(HEADER_ALIASES)) {
        if (headerKey(alias) === key) {
            return name;
        }
    }
    return trimmed;
}

/**
 * Sheets without an Ex/Voc column hold one kind of row only; an exercise
 * number column marks an exercise sheet.
 */
export function inferDefaultKind(headers: string[]): EntryKind | undefined {
    if (headers.includes(Column.Kind)) {
        return undefined;
    }
    return headers.includes(Column.Exercise) ? 'Exercise' : 'Vocabulary';
}

export function parseKind(value: string | undefined): EntryKind | undefined {
    const normalized = (value ?? '').trim().toLowerCase();
    if (normalized === 'exercise' || normalized === 'ex') {
        return 'Exercise';
    }
    if (normalized === 'vocabulary' || normalized === 'voc' || normalized === 'vocab') {
        return 'Vocabulary';
    }
    return undefined;
}

export function cell(row: RawRow, column: ColumnName): string | undefined {
    return Object.prototype.hasOwnProperty.call(row, column) ? row[column] : undefined;
}
