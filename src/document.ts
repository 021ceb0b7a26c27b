import { referenceOf, verseKey } from './resolver';
import { Document, LessonSection, NormalizedRecords, VerseDetail } from './types';

/**
 * Groups records into lesson sections (ascending) and pairs each exercise
 * with its verse detail, or null when none was fetched.
 */
export function assembleDocument(
    records: NormalizedRecords,
    details: ReadonlyMap<string, VerseDetail>,
    translators: readonly string[]
): Document {
    const lessons = new Map<number, LessonSection>();
    const sectionFor = (lessonNumber: number): LessonSection => {
        let section = lessons.get(lessonNumber);
        if (!section) {
            section = { lessonNumber, vocabulary: [], exercises: [] };
            lessons.set(lessonNumber, section);
        }
        return section;
    };

    for (const entry of records.vocabulary) {
        sectionFor(entry.lesson_number).vocabulary.push(entry);
    }
    for (const entry of records.exercises) {
        const reference = referenceOf(entry);
        const detail = reference ? details.get(verseKey(reference)) ?? null : null;
        sectionFor(entry.lesson_number).exercises.push({ entry, detail });
    }

    const sections = [...lessons.values()].sort((a, b) => a.lessonNumber - b.lessonNumber);
    for (const section of sections) {
        // Array.prototype.sort is stable, so equal exercise numbers keep input order
        section.exercises.sort((a, b) => a.entry.exercise_number - b.entry.exercise_number);
    }

    return { lessons: sections, translators: [...translators] };
}
