// Zod schemas for data crossing the process boundary: verse API responses
// and the intermediate JSON file

import { z } from 'zod';

// ============ Verse API ============

export const VerseTranslationSchema = z.object({
    resource_id: z.number(),
    text: z.string(),
});

export const VerseResponseSchema = z.object({
    verse: z.object({
        verse_key: z.string().optional(),
        text_imlaei: z.string().optional(),
        text_uthmani: z.string().optional(),
        translations: z.array(VerseTranslationSchema).optional(),
    }),
});

// ============ Intermediate JSON ============

const positiveInt = z.number().int().positive();

export const VocabularyEntrySchema = z.object({
    singular_or_perfect: z.string(),
    dual_or_imperfect: z.string(),
    plural_or_verbal_noun: z.string(),
    english: z.string(),
    lesson_number: positiveInt,
    verb_form: z.string().optional(),
});

export const ExerciseEntrySchema = z.object({
    arabic_text: z.string(),
    english: z.string(),
    sura: positiveInt.nullable(),
    verse: positiveInt.nullable(),
    lesson_number: positiveInt,
    exercise_number: z.number().int(),
}).refine(e => (e.sura === null) === (e.verse === null), {
    message: 'sura and verse must both be set or both be null',
});

export const VerseRecordSchema = z.object({
    sura: positiveInt,
    verse: positiveInt,
    arabic_text: z.string(),
    transliteration: z.string(),
    translations: z.record(z.string(), z.string()),
});

export const IntermediateFileSchema = z.object({
    vocabulary: z.array(VocabularyEntrySchema),
    exercises: z.array(ExerciseEntrySchema),
    verses: z.array(VerseRecordSchema).default([]),
});

export type VerseRecord = z.infer<typeof VerseRecordSchema>;
export type IntermediateFile = z.infer<typeof IntermediateFileSchema>;

export function formatIssues(error: z.ZodError): string {
    return error.issues.map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`).join('; ');
}
