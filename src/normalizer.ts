import * as core from '@actions/core';
import { Column, ColumnName, REQUIRED_COLUMNS, cell, parseKind } from './columns';
import { RowValidationError } from './errors';
import { isValidVerseReference } from './resolver';
import { EntryKind, ExerciseEntry, NormalizedRecords, RawRow, VocabularyEntry } from './types';

export interface NormalizationResult extends NormalizedRecords {
    diagnostics: RowValidationError[];
}

type ParsedInteger = { ok: true; value: number | null } | { ok: false };

const NUMERIC_COLUMNS: ColumnName[] = [Column.Lesson, Column.Exercise, Column.Sura, Column.Verse];

// Spreadsheet exports sometimes write whole numbers as "16.0"
const INTEGER_PATTERN = /^[-+]?\d+(?:\.0+)?$/;

export function parseInteger(value: string | undefined): ParsedInteger {
    const trimmed = (value ?? '').trim();
    if (trimmed === '') {
        return { ok: true, value: null };
    }
    if (!INTEGER_PATTERN.test(trimmed)) {
        return { ok: false };
    }
    return { ok: true, value: parseInt(trimmed, 10) };
}

/**
 * Turns raw spreadsheet rows into vocabulary and exercise records. Rows that
 * fail validation are left out and reported, one diagnostic per row.
 */
export class RecordNormalizer {
    private readonly kindColumn: ColumnName;
    private readonly log: (message: string) => void;

    constructor(kindColumn: ColumnName = Column.Kind, log: (message: string) => void = core.debug) {
        this.kindColumn = kindColumn;
        this.log = log;
    }

    public normalize(rows: readonly RawRow[]): NormalizationResult {
        const result: NormalizationResult = { vocabulary: [], exercises: [], diagnostics: [] };

        rows.forEach((row, i) => {
            const rowIndex = i + 1;
            const record = this.normalizeRow(row, rowIndex);
            if (record instanceof RowValidationError) {
                core.warning(`Skipping ${record.message}`);
                result.diagnostics.push(record);
            } else if (record.kind === 'Exercise') {
                this.log(`Row ${rowIndex}: exercise ${record.entry.lesson_number}.${record.entry.exercise_number}`);
                result.exercises.push(record.entry);
            } else {
                this.log(`Row ${rowIndex}: vocabulary '${record.entry.singular_or_perfect}' (lesson ${record.entry.lesson_number})`);
                result.vocabulary.push(record.entry);
            }
        });

        return result;
    }

    private normalizeRow(
        row: RawRow,
        rowIndex: number
    ): RowValidationError | { kind: 'Exercise'; entry: ExerciseEntry } | { kind: 'Vocabulary'; entry: VocabularyEntry } {
        const rawKind = cell(row, this.kindColumn);
        if (rawKind === undefined || rawKind.trim() === '') {
            return new RowValidationError(rowIndex, `missing required column(s): ${this.kindColumn}`, [this.kindColumn]);
        }
        const kind = parseKind(rawKind);
        if (!kind) {
            return new RowValidationError(rowIndex, `unknown ${this.kindColumn} value '${rawKind}'`);
        }

        const problems: string[] = [];
        const missing = this.missingColumns(row, kind);
        if (missing.length > 0) {
            problems.push(`missing required column(s): ${missing.join(', ')}`);
        }

        const numbers = new Map<ColumnName, number | null>();
        for (const column of NUMERIC_COLUMNS) {
            const raw = cell(row, column);
            const parsed = parseInteger(raw);
            if (!parsed.ok) {
                problems.push(`${column} '${raw}' is not a whole number`);
                continue;
            }
            numbers.set(column, parsed.value);
        }

        const lesson = numbers.get(Column.Lesson) ?? null;
        if (lesson !== null && lesson <= 0) {
            problems.push(`${Column.Lesson} must be a positive integer, got ${lesson}`);
        }

        let sura: number | null = null;
        let verse: number | null = null;
        if (kind === 'Exercise') {
            sura = numbers.get(Column.Sura) ?? null;
            verse = numbers.get(Column.Verse) ?? null;
            if ((sura === null) !== (verse === null) && numbers.has(Column.Sura) && numbers.has(Column.Verse)) {
                problems.push(`${Column.Sura} and ${Column.Verse} must both be given or both be blank`);
            } else if (sura !== null && verse !== null && !isValidVerseReference({ sura, verse })) {
                problems.push(`verse reference ${sura}:${verse} does not exist`);
            }
        }

        if (problems.length > 0 || lesson === null) {
            return new RowValidationError(rowIndex, problems.join('; '), missing);
        }

        if (kind === 'Exercise') {
            const exerciseNumber = numbers.get(Column.Exercise) ?? null;
            if (exerciseNumber === null) {
                return new RowValidationError(rowIndex, `missing required column(s): ${Column.Exercise}`, [Column.Exercise]);
            }
            const entry: ExerciseEntry = Object.freeze({
                arabic_text: row[Column.SingularPerfect],
                english: row[Column.English],
                sura,
                verse,
                lesson_number: lesson,
                exercise_number: exerciseNumber,
            });
            return { kind, entry };
        }

        const verbForm = cell(row, Column.VerbForm);
        const entry: VocabularyEntry = Object.freeze({
            singular_or_perfect: row[Column.SingularPerfect],
            dual_or_imperfect: cell(row, Column.DualImperfect) ?? '',
            plural_or_verbal_noun: cell(row, Column.PluralVerbalNoun) ?? '',
            english: row[Column.English],
            lesson_number: lesson,
            ...(verbForm && verbForm.trim() !== '' ? { verb_form: verbForm } : {}),
        });
        return { kind, entry };
    }

    private missingColumns(row: RawRow, kind: EntryKind): ColumnName[] {
        return REQUIRED_COLUMNS[kind].filter(column => {
            const value = cell(row, column);
            return value === undefined || value.trim() === '';
        });
    }
}

export function normalizeRows(
    rows: readonly RawRow[],
    kindColumn?: ColumnName,
    log?: (message: string) => void
): NormalizationResult {
    return new RecordNormalizer(kindColumn, log).normalize(rows);
}
