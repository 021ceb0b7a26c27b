import { SerializationError } from './errors';

const LATEX_ESCAPES: Record<string, string> = {
    '\\': '\\textbackslash{}',
    '&': '\\&',
    '%': '\\%',
    '$': '\\$',
    '#': '\\#',
    '_': '\\_',
    '{': '\\{',
    '}': '\\}',
    '^': '\\textasciicircum{}',
    '~': '\\textasciitilde{}',
};

// C0 controls other than tab, newline and carriage return have no LaTeX form
const UNSUPPORTED_CHARACTERS = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F]/;

// Small high/low Quranic annotation marks (pause signs and the like)
const QURANIC_MARKS = /[\u06D6-\u06DC\u06E0-\u06E8]/g;

const FOOTNOTE_TAG = /<sup foot_note=\d+>\d+<\/sup>/g;

/**
 * Escapes every LaTeX special character in one pass, so the backslashes
 * introduced by an escape are never escaped again.
 */
export function escapeLatex(text: string): string {
    const bad = UNSUPPORTED_CHARACTERS.exec(text);
    if (bad) {
        const code = bad[0].charCodeAt(0).toString(16).toUpperCase().padStart(4, '0');
        throw new SerializationError(`Unsupported control character U+${code} in text: ${JSON.stringify(text)}`);
    }
    return text.replace(/[\\&%$#_{}^~]/g, ch => LATEX_ESCAPES[ch]);
}

/** Escaped text with the ﷺ ligature set in the Arabic font. */
export function cleanupText(text: string): string {
    return escapeLatex(text).replace(/ﷺ/g, '(\\ar{ﷺ})');
}

export function stripFootnotes(text: string): string {
    return text.replace(FOOTNOTE_TAG, '');
}

export function removeQuranicMarks(text: string): string {
    return text.replace(QURANIC_MARKS, '');
}

// Used when the preamble template cannot be found
export const FALLBACK_PREAMBLE = [
    '\\documentclass[a4paper]{scrbook}',
    '\\usepackage{hyperref}',
    '\\usepackage{longtable}',
    '\\usepackage{booktabs}',
    '\\usepackage{polyglossia}',
    '\\setmainlanguage{english}',
    '\\setotherlanguage{arabic}',
    '\\newfontfamily\\arabicfont[Script=Arabic]{Noto Naskh Arabic}',
    '\\newcommand{\\ar}[1]{{\\textarabic{#1}}}',
    '\\newcommand{\\arL}[1]{{{\\Large \\textarabic{#1}}}}',
    '\\newcommand{\\arpar}[1]{\\begin{Arabic}{\\Large #1}\\end{Arabic}}',
    '',
].join('\n');
