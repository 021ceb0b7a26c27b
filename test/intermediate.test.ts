import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { IntermediateFormatError } from '../src/errors';
import { readIntermediate, toIntermediate, writeIntermediate } from '../src/intermediate';
import { NormalizedRecords, VerseDetail } from '../src/types';

const records: NormalizedRecords = {
    vocabulary: [{
        singular_or_perfect: 'كِتَابٌ',
        dual_or_imperfect: 'كِتَابَانِ',
        plural_or_verbal_noun: 'كُتُبٌ',
        english: 'book',
        lesson_number: 3,
    }],
    exercises: [
        { arabic_text: 'أ', english: 'one', sura: 2, verse: 255, lesson_number: 3, exercise_number: 1 },
        { arabic_text: 'ب', english: 'two', sura: 16, verse: 89, lesson_number: 3, exercise_number: 2 },
        { arabic_text: 'ج', english: 'three', sura: null, verse: null, lesson_number: 3, exercise_number: 3 },
    ],
};

const detail = (text: string): VerseDetail => ({
    arabic_text: text,
    transliteration: `${text}-translit`,
    translations: { 'Saheeh International': `${text}-en` },
});

describe('Intermediate JSON', () => {
    let dir: string;

    beforeAll(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'intermediate-test-'));
    });

    afterAll(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it('should list fetched verses in citation order', () => {
        const details = new Map([['16:89', detail('b')], ['2:255', detail('a')]]);

        const file = toIntermediate(records, details);

        expect(file.verses.map(v => `${v.sura}:${v.verse}`)).toEqual(['2:255', '16:89']);
        expect(file.verses[0]).toEqual({
            sura: 2,
            verse: 255,
            arabic_text: 'a',
            transliteration: 'a-translit',
            translations: { 'Saheeh International': 'a-en' },
        });
    });

    it('should leave out verses that were not fetched', () => {
        const file = toIntermediate(records, new Map([['16:89', detail('b')]]));

        expect(file.verses.map(v => v.verse)).toEqual([89]);
        expect(file.exercises).toHaveLength(3);
    });

    it('should write two-space indented JSON that reads back to the same records', async () => {
        const filePath = path.join(dir, 'out', 'book.json');
        const details = new Map([['2:255', detail('a')]]);

        await writeIntermediate(filePath, records, details);
        const text = fs.readFileSync(filePath, 'utf-8');
        const data = await readIntermediate(filePath);

        expect(text.startsWith('{\n  "vocabulary": [\n    {\n      "singular_or_perfect": "كِتَابٌ",')).toBe(true);
        expect(text.endsWith('}\n')).toBe(true);
        expect(data.records).toEqual(records);
        expect([...data.details.entries()]).toEqual([['2:255', detail('a')]]);
    });

    it('should accept files without a verses list', async () => {
        const filePath = path.join(dir, 'no-verses.json');
        fs.writeFileSync(filePath, JSON.stringify({ vocabulary: records.vocabulary, exercises: [] }), 'utf-8');

        const data = await readIntermediate(filePath);

        expect(data.records.vocabulary).toHaveLength(1);
        expect(data.details.size).toBe(0);
    });

    it('should name the field that fails validation', async () => {
        const filePath = path.join(dir, 'bad.json');
        fs.writeFileSync(filePath, JSON.stringify({ vocabulary: [], exercises: [{ ...records.exercises[0], lesson_number: 0 }] }), 'utf-8');

        const read = readIntermediate(filePath);

        await expect(read).rejects.toBeInstanceOf(IntermediateFormatError);
        await expect(read).rejects.toThrow('exercises.0.lesson_number: Number must be greater than 0');
    });

    it('should reject text that is not JSON', async () => {
        const filePath = path.join(dir, 'broken.json');
        fs.writeFileSync(filePath, '{ not json', 'utf-8');

        await expect(readIntermediate(filePath)).rejects.toThrow(`${filePath}: cannot read JSON: `);
    });
});
