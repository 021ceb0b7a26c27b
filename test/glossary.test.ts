import { arabicHeadword, arabicSortKey, buildGlossary, englishSortKey, removeLeadingQualifier } from '../src/glossary';
import { VocabularyEntry } from '../src/types';

const entry = (singular: string, english: string, lesson = 1): VocabularyEntry => ({
    singular_or_perfect: singular,
    dual_or_imperfect: '',
    plural_or_verbal_noun: '',
    english,
    lesson_number: lesson,
});

describe('Glossary', () => {
    const vocabulary = [
        entry('أَبْصَرَ', '(+ bi-) to see observe', 16),
        entry('كِتَابٌ', 'book', 3),
        entry('كَتَبَ', 'to write', 3),
        entry('بَيْتٌ', 'house', 2),
    ];

    describe('English order', () => {
        it('should ignore qualifiers and the infinitive marker', () => {
            expect(englishSortKey('(+ bi-) to see observe')).toBe('see observe');
            expect(englishSortKey('[lit.] Book')).toBe('book');
            expect(englishSortKey('towards')).toBe('towards');
        });

        it('should group entries by first letter', () => {
            const groups = buildGlossary(vocabulary, 'english');

            expect(groups.map(g => g.letter)).toEqual(['B', 'H', 'S', 'W']);
            expect(groups.map(g => g.entries.map(e => e.english))).toEqual([
                ['book'],
                ['house'],
                ['(+ bi-) to see observe'],
                ['to write'],
            ]);
        });

        it('should order equal keys by lesson, then input order', () => {
            const groups = buildGlossary([entry('ب', 'book', 5), entry('ج', 'book', 1), entry('د', 'book', 5)], 'english');

            expect(groups[0].entries.map(e => e.singular_or_perfect)).toEqual(['ج', 'ب', 'د']);
        });
    });

    describe('Arabic order', () => {
        it('should ignore harakat when sorting', () => {
            expect(arabicSortKey(entry('كِتَابٌ', 'book'))).toBe('كتاب');
        });

        it('should group entries by first letter', () => {
            const groups = buildGlossary(vocabulary, 'arabic');

            expect(groups.map(g => g.letter)).toEqual(['أ', 'ب', 'ك']);
            expect(groups[2].entries.map(e => e.english)).toEqual(['book', 'to write']);
        });

        it('should fall back to the next filled form for the headword', () => {
            const plural: VocabularyEntry = { ...entry('', 'people'), plural_or_verbal_noun: 'نَاسٌ' };

            expect(arabicHeadword(plural)).toBe('نَاسٌ');
        });
    });

    it('should drop a leading qualifier', () => {
        expect(removeLeadingQualifier('(+ bi-) to see')).toBe('to see');
        expect(removeLeadingQualifier('[pl.] people')).toBe('people');
    });
});
