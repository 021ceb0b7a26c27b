import * as fs from 'fs';
import * as path from 'path';
import * as core from '@actions/core';
import { Column } from './columns';
import { SerializationError } from './errors';
import { GlossaryOrder, buildGlossary } from './glossary';
import { FALLBACK_PREAMBLE, cleanupText, escapeLatex, removeQuranicMarks, stripFootnotes } from './latex';
import { Document, EnrichedExercise, ExerciseEntry, LessonSection, VocabularyEntry } from './types';

export const DEFAULT_TEMPLATE_PATH = path.join(__dirname, '..', 'templates', 'preamble.tex');
export const DEFAULT_TITLE = 'Arabic Textbook Exercises and Vocabulary';

export function verseUrl(sura: number, verse: number): string {
    return `https://quran.com/${sura}?startingVerse=${verse}`;
}

export function morphologyUrl(sura: number, verse: number): string {
    return `https://quranwbw.com/morphology?word=${sura}:${verse}`;
}

export interface LatexGeneratorOptions {
    templatePath?: string;
    title?: string;
    glossary?: boolean;
}

export class LatexGenerator {
    private templatePath: string;
    private title: string;
    private glossary: boolean;

    constructor(options: LatexGeneratorOptions = {}) {
        this.templatePath = options.templatePath ?? DEFAULT_TEMPLATE_PATH;
        this.title = options.title ?? DEFAULT_TITLE;
        this.glossary = options.glossary ?? true;
    }

    /** Renders the document and writes it to outputPath. Returns the text written. */
    public async generate(document: Document, outputPath: string): Promise<string> {
        await fs.promises.mkdir(path.dirname(outputPath), { recursive: true });
        const content = this.render(document, await this.loadPreamble());
        await fs.promises.writeFile(outputPath, content, 'utf-8');
        return content;
    }

    public async loadPreamble(): Promise<string> {
        if (fs.existsSync(this.templatePath)) {
            core.debug(`Using preamble template: ${this.templatePath}`);
            return fs.promises.readFile(this.templatePath, 'utf-8');
        }
        core.warning(`Preamble template not found: ${this.templatePath}. Falling back to the built-in preamble.`);
        return FALLBACK_PREAMBLE;
    }

    public render(document: Document, preamble: string = FALLBACK_PREAMBLE): string {
        let content = preamble.endsWith('\n') ? preamble : preamble + '\n';
        content += '\n';
        content += `\\title{${escapeLatex(this.title)}}\n`;
        content += '\\begin{document}\n\\maketitle\n\\tableofcontents\n\\clearpage\n\n';

        for (const section of document.lessons) {
            content += this.renderLesson(section, document.translators);
        }

        if (this.glossary) {
            const vocabulary = document.lessons.flatMap(s => s.vocabulary);
            if (vocabulary.length > 0) {
                content += this.renderGlossary(vocabulary, 'english');
                content += this.renderGlossary(vocabulary, 'arabic');
            }
        }

        content += '\\end{document}\n';
        return content;
    }

    private renderLesson(section: LessonSection, translators: readonly string[]): string {
        if (!Number.isInteger(section.lessonNumber) || section.lessonNumber <= 0) {
            throw new SerializationError(`Lesson number must be a positive integer, got ${section.lessonNumber}`);
        }

        let content = `\\chapter{Lesson ${section.lessonNumber}}\n\n`;

        if (section.exercises.length > 0) {
            content += '\\section{Exercises}\n\n';
            content += '\\begin{enumerate}\n';
            for (const exercise of section.exercises) {
                content += this.renderExercise(exercise, translators);
            }
            content += '\\end{enumerate}\n\n';
        }

        if (section.vocabulary.length > 0) {
            content += '\\section{Vocabulary}\n\n';
            content += this.tableStart(false);
            for (const entry of section.vocabulary) {
                content += this.vocabularyRow(entry, false);
            }
            content += this.tableEnd();
        }

        return content;
    }

    private renderExercise({ entry, detail }: EnrichedExercise, translators: readonly string[]): string {
        this.checkExercise(entry);

        let content = `\\item[${entry.exercise_number}.] \\arL{${cleanupText(entry.arabic_text)}}\n\n`;
        if (entry.english.trim()) {
            content += `${cleanupText(entry.english)}\n\n`;
        }

        if (entry.sura === null || entry.verse === null) {
            return content;
        }

        const label = `\\textbf{[${entry.sura}:${entry.verse}]}`;
        if (!detail) {
            return content + `${label}\n\n`;
        }

        content += `${label} \\href{${verseUrl(entry.sura, entry.verse)}}{Quran.com}`;
        content += ` \\href{${morphologyUrl(entry.sura, entry.verse)}}{QuranWBW.com}\n\n`;
        content += `\\arpar{${escapeLatex(removeQuranicMarks(detail.arabic_text))}}\n\n`;
        if (detail.transliteration.trim()) {
            content += `\\textit{${cleanupText(stripFootnotes(detail.transliteration))}}\n\n`;
        }
        for (const translator of translators) {
            const text = detail.translations[translator];
            if (text !== undefined && text.trim()) {
                content += `\\textit{${escapeLatex(translator)}}: ${cleanupText(stripFootnotes(text))}\n\n`;
            }
        }
        return content;
    }

    private checkExercise(entry: ExerciseEntry): void {
        if (!Number.isInteger(entry.exercise_number)) {
            throw new SerializationError(`Exercise number must be an integer, got ${entry.exercise_number} (lesson ${entry.lesson_number})`);
        }
        if ((entry.sura === null) !== (entry.verse === null)) {
            throw new SerializationError(`Exercise ${entry.lesson_number}.${entry.exercise_number} has a partial verse reference`);
        }
    }

    private renderGlossary(vocabulary: VocabularyEntry[], order: GlossaryOrder): string {
        const heading = order === 'english' ? 'English' : 'Arabic';
        let content = `\\chapter{Glossary: ${heading} Alphabetical Order}\n\n`;
        content += this.tableStart(true);
        for (const group of buildGlossary(vocabulary, order)) {
            if (group.letter) {
                const letter = order === 'english' ? `\\textbf{${escapeLatex(group.letter)}}` : `\\arL{${escapeLatex(group.letter)}}`;
                content += `\\multicolumn{5}{l}{${letter}} \\\\\n`;
            }
            for (const entry of group.entries) {
                content += this.vocabularyRow(entry, true);
            }
        }
        content += this.tableEnd();
        return content;
    }

    private tableStart(withLesson: boolean): string {
        const headers = [Column.SingularPerfect, Column.DualImperfect, Column.PluralVerbalNoun, Column.English];
        const spec = withLesson ? 'p{2.75cm}p{2.75cm}p{2.75cm}p{5.25cm}p{0.75cm}' : 'p{3cm}p{3cm}p{3cm}p{5.5cm}';
        const row = withLesson ? [...headers, 'Lesson'] : headers;
        return `\\begin{longtable}{${spec}}\n\\toprule\n${row.join(' & ')} \\\\\n\\midrule\n\\endhead\n`;
    }

    private tableEnd(): string {
        return '\\bottomrule\n\\end{longtable}\n\n';
    }

    private vocabularyRow(entry: VocabularyEntry, withLesson: boolean): string {
        const arabic = (text: string) => (text.trim() ? `\\arL{${cleanupText(text)}}` : '');
        let english = cleanupText(entry.english);
        if (entry.verb_form) {
            english += ` (${cleanupText(entry.verb_form)})`;
        }
        const cells = [
            arabic(entry.singular_or_perfect),
            arabic(entry.dual_or_imperfect),
            arabic(entry.plural_or_verbal_noun),
            english,
        ];
        if (withLesson) {
            cells.push(String(entry.lesson_number));
        }
        return `${cells.join(' & ')} \\\\\n`;
    }
}
