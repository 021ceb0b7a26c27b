import * as fs from 'fs';
import * as path from 'path';
import { parse } from 'csv-parse';
import * as cheerio from 'cheerio';
import * as core from '@actions/core';
import { Column, canonicalHeader, inferDefaultKind } from './columns';
import { SpreadsheetError } from './errors';
import { RawRow } from './types';

export interface SpreadsheetData {
    headers: string[]; // canonical names, in first-seen order
    rows: RawRow[];
}

const XML_EXTENSIONS = new Set(['.fods', '.xml']);
const TAB_EXTENSIONS = new Set(['.tsv', '.tab']);

// Flat XML spreadsheets tend to end each table with thousands of repeated blank cells
const MAX_REPEAT = 1000;

export async function readSpreadsheet(filePath: string, log: (message: string) => void = core.debug): Promise<SpreadsheetData> {
    if (!fs.existsSync(filePath)) {
        throw new SpreadsheetError(filePath, 'file not found');
    }

    const ext = path.extname(filePath).toLowerCase();
    if (XML_EXTENSIONS.has(ext)) {
        const content = await fs.promises.readFile(filePath, 'utf-8');
        return parseFlatXml(content, filePath, log);
    }
    if (ext === '.ods' || ext === '.xlsx' || ext === '.xls') {
        throw new SpreadsheetError(filePath, `unsupported format '${ext}'. Save the sheet as CSV, TSV or flat XML (.fods).`);
    }

    const delimiter = TAB_EXTENSIONS.has(ext) ? '\t' : ext === '.csv' ? ',' : await sniffDelimiter(filePath);
    return readDelimited(filePath, delimiter, log);
}

async function sniffDelimiter(filePath: string): Promise<string> {
    const content = await fs.promises.readFile(filePath, 'utf-8');
    const headerLine = content.split(/\r?\n/, 1)[0] ?? '';
    return headerLine.includes('\t') && !headerLine.includes(',') ? '\t' : ',';
}

export async function readDelimited(
    filePath: string,
    delimiter: string,
    log: (message: string) => void = core.debug
): Promise<SpreadsheetData> {
    let headers: string[] = [];

    const parser = fs.createReadStream(filePath).pipe(
        parse({
            delimiter,
            bom: true,
            trim: true,
            skip_empty_lines: true,
            skip_records_with_empty_values: true,
            relax_column_count: true,
            columns: (header: string[]) => {
                headers = header.map(canonicalHeader);
                return headers;
            },
        })
    );

    const rows: RawRow[] = [];
    for await (const record of parser) {
        rows.push(toRawRow(record));
    }

    const defaultKind = inferDefaultKind(headers);
    if (defaultKind) {
        log(`${filePath}: no ${Column.Kind} column, treating every row as ${defaultKind}`);
        for (const row of rows) {
            row[Column.Kind] = defaultKind;
        }
        headers = [...headers, Column.Kind];
    }

    return { headers, rows };
}

function toRawRow(record: unknown): RawRow {
    const row: RawRow = {};
    if (typeof record !== 'object' || record === null) {
        return row;
    }
    for (const [key, value] of Object.entries(record)) {
        row[key] = value === undefined || value === null ? '' : String(value);
    }
    return row;
}

function expandSelfClosingMarkup(content: string): string {
    return content
        .replace(/<text:s\s+text:c="(\d+)"\s*\/>/g, (_match, count: string) => ' '.repeat(Number(count)))
        .replace(/<text:s\s*\/>/g, ' ')
        .replace(/<text:tab\s*\/>/g, '\t')
        .replace(/<text:line-break\s*\/>/g, '\n');
}

function repeatCount(value: string | undefined): number {
    const count = value ? parseInt(value, 10) : 1;
    return Number.isFinite(count) && count > 0 ? Math.min(count, MAX_REPEAT) : 1;
}

/**
 * Reads an OpenDocument flat XML spreadsheet. Only tables whose name starts
 * with "lesson" are read when there are any, so summary sheets that repeat
 * lesson rows are not read twice.
 */
export function parseFlatXml(content: string, filePath = '<xml>', log: (message: string) => void = core.debug): SpreadsheetData {
    const $ = cheerio.load(expandSelfClosingMarkup(content), { xml: true });

    const tables = $('table\\:table').toArray();
    if (tables.length === 0) {
        throw new SpreadsheetError(filePath, 'no table:table elements found');
    }
    const lessonTables = tables.filter(t => ($(t).attr('table:name') ?? '').trim().toLowerCase().startsWith('lesson'));
    const selected = lessonTables.length > 0 ? lessonTables : tables;

    const allHeaders: string[] = [];
    const rows: RawRow[] = [];

    for (const table of selected) {
        const tableName = $(table).attr('table:name') ?? '';
        const grid: string[][] = [];

        $(table).find('table\\:table-row').each((_, rowEl) => {
            const cells: string[] = [];
            $(rowEl).children('table\\:table-cell, table\\:covered-table-cell').each((__, cellEl) => {
                const text = $(cellEl).find('text\\:p').map((___, p) => $(p).text()).get().join('\n').trim();
                const times = repeatCount($(cellEl).attr('table:number-columns-repeated'));
                for (let i = 0; i < times; i++) {
                    cells.push(text);
                }
            });
            if (cells.every(c => c === '')) {
                return;
            }
            const times = repeatCount($(rowEl).attr('table:number-rows-repeated'));
            for (let i = 0; i < times; i++) {
                grid.push(cells);
            }
        });

        if (grid.length === 0) {
            log(`Table '${tableName}' is empty, skipping`);
            continue;
        }

        const headerCells = grid[0];
        let width = headerCells.length;
        while (width > 0 && headerCells[width - 1] === '') {
            width--;
        }
        const headers = headerCells.slice(0, width).map(canonicalHeader);
        const defaultKind = inferDefaultKind(headers);

        for (const cells of grid.slice(1)) {
            const row: RawRow = {};
            headers.forEach((header, i) => {
                if (header) {
                    row[header] = cells[i] ?? '';
                }
            });
            if (defaultKind) {
                row[Column.Kind] = defaultKind;
            }
            rows.push(row);
        }

        for (const header of defaultKind ? [...headers, Column.Kind] : headers) {
            if (header && !allHeaders.includes(header)) {
                allHeaders.push(header);
            }
        }
        log(`Read ${grid.length - 1} rows from table '${tableName}'`);
    }

    return { headers: allHeaders, rows };
}
