import * as fs from 'fs';
import * as path from 'path';
import { IntermediateFormatError, describeError } from './errors';
import { IntermediateFile, IntermediateFileSchema, VerseRecord, formatIssues } from './schemas';
import { resolveVerseReferences, verseKey } from './resolver';
import { NormalizedRecords, VerseDetail } from './types';

export interface IntermediateData {
    records: NormalizedRecords;
    details: Map<string, VerseDetail>;
}

/**
 * Shapes records and fetched verse details into the intermediate file layout.
 * Verses follow the order in which exercises first cite them.
 */
export function toIntermediate(records: NormalizedRecords, details: ReadonlyMap<string, VerseDetail>): IntermediateFile {
    const verses: VerseRecord[] = [];
    for (const reference of resolveVerseReferences(records.exercises, true)) {
        const detail = details.get(verseKey(reference));
        if (detail) {
            verses.push({
                sura: reference.sura,
                verse: reference.verse,
                arabic_text: detail.arabic_text,
                transliteration: detail.transliteration,
                translations: { ...detail.translations },
            });
        }
    }
    return {
        vocabulary: records.vocabulary.map(v => ({ ...v })),
        exercises: records.exercises.map(e => ({ ...e })),
        verses,
    };
}

export async function writeIntermediate(
    filePath: string,
    records: NormalizedRecords,
    details: ReadonlyMap<string, VerseDetail>
): Promise<void> {
    await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
    const json = JSON.stringify(toIntermediate(records, details), null, 2);
    await fs.promises.writeFile(filePath, json + '\n', 'utf-8');
}

export async function readIntermediate(filePath: string): Promise<IntermediateData> {
    let raw: unknown;
    try {
        raw = JSON.parse(await fs.promises.readFile(filePath, 'utf-8'));
    } catch (error) {
        throw new IntermediateFormatError(filePath, `cannot read JSON: ${describeError(error)}`);
    }

    const parsed = IntermediateFileSchema.safeParse(raw);
    if (!parsed.success) {
        throw new IntermediateFormatError(filePath, formatIssues(parsed.error));
    }

    const data = parsed.data;
    const details = new Map<string, VerseDetail>();
    for (const verse of data.verses) {
        details.set(verseKey(verse), Object.freeze({
            arabic_text: verse.arabic_text,
            transliteration: verse.transliteration,
            translations: Object.freeze({ ...verse.translations }),
        }));
    }

    return {
        records: {
            vocabulary: data.vocabulary.map(v => Object.freeze(v)),
            exercises: data.exercises.map(e => Object.freeze(e)),
        },
        details,
    };
}
