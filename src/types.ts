export type RawRow = Record<string, string>;

export type EntryKind = 'Exercise' | 'Vocabulary';

export interface VocabularyEntry {
    readonly singular_or_perfect: string;
    readonly dual_or_imperfect: string;
    readonly plural_or_verbal_noun: string;
    readonly english: string;
    readonly lesson_number: number;
    readonly verb_form?: string; // only when the sheet carries a "Verb Form" cell
}

export interface ExerciseEntry {
    readonly arabic_text: string;
    readonly english: string;
    readonly sura: number | null;
    readonly verse: number | null;
    readonly lesson_number: number;
    readonly exercise_number: number;
}

export interface VerseReference {
    readonly sura: number;
    readonly verse: number;
}

export interface VerseDetail {
    readonly arabic_text: string;
    readonly transliteration: string;
    readonly translations: Readonly<Record<string, string>>; // translator name -> text
}

export interface NormalizedRecords {
    vocabulary: VocabularyEntry[];
    exercises: ExerciseEntry[];
}

export interface EnrichedExercise {
    entry: ExerciseEntry;
    detail: VerseDetail | null;
}

export interface LessonSection {
    lessonNumber: number;
    vocabulary: VocabularyEntry[];
    exercises: EnrichedExercise[];
}

export interface Document {
    lessons: LessonSection[];
    // Translators requested for this run, in render order
    translators: string[];
}
