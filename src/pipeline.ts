import * as path from 'path';
import * as core from '@actions/core';
import { DEFAULT_TRANSLATORS, FetchLike, VerseApiClient, VerseApiConfig, resolveTranslators } from './client';
import { ApiSettings, readApiSettings, resolveApiConfig } from './config';
import { assembleDocument } from './document';
import { EnrichmentResult, VerseLookup, enrichReferences } from './enricher';
import { ConfigurationError, RowValidationError, VerseFailure } from './errors';
import { LatexGenerator } from './generator';
import { readIntermediate, writeIntermediate } from './intermediate';
import { normalizeRows } from './normalizer';
import { readSpreadsheet } from './reader';
import { resolveVerseReferences } from './resolver';
import { Document, NormalizedRecords, VerseDetail } from './types';

export type ClientFactory = (config: VerseApiConfig, translators: string[]) => VerseLookup;

export type LogFn = (message: string) => void;

export interface PipelineOptions {
    inputPath: string;
    outputPath: string;
    enrich: boolean;
    translators?: string[];
    verbose?: boolean;
    glossary?: boolean;
    title?: string;
    templatePath?: string;
    // Defaults to the output path with a .json extension
    jsonOutputPath?: string;
    // Read from env (QURAN_API_*) when apiSettings is not given
    apiSettings?: ApiSettings;
    env?: NodeJS.ProcessEnv;
    fetch?: FetchLike;
    createClient?: ClientFactory;
}

export interface Diagnostics {
    skippedRows: RowValidationError[];
    failedLookups: VerseFailure[];
    configurationErrors: ConfigurationError[];
}

export interface PipelineResult {
    document: Document;
    texPath: string;
    jsonPath: string | null;
    versesFetched: number;
    diagnostics: Diagnostics;
}

export function defaultJsonPath(texPath: string): string {
    const parsed = path.parse(texPath);
    return path.join(parsed.dir, `${parsed.name}.json`);
}

export async function runPipeline(options: PipelineOptions): Promise<PipelineResult> {
    const detail: LogFn = options.verbose ? core.info : core.debug;
    const diagnostics: Diagnostics = { skippedRows: [], failedLookups: [], configurationErrors: [] };

    let enrich = options.enrich;
    let translators: string[] = [];
    try {
        translators = resolveTranslators(options.translators ?? DEFAULT_TRANSLATORS);
    } catch (error) {
        if (!(error instanceof ConfigurationError)) {
            throw error;
        }
        core.warning(`${error.message}. Enrichment disabled.`);
        diagnostics.configurationErrors.push(error);
        enrich = false;
    }

    const fromJson = path.extname(options.inputPath).toLowerCase() === '.json';
    let records: NormalizedRecords;
    let details = new Map<string, VerseDetail>();

    core.startGroup(`Reading ${options.inputPath}`);
    if (fromJson) {
        const data = await readIntermediate(options.inputPath);
        records = data.records;
        details = data.details;
        if (enrich) {
            core.info('Input is intermediate JSON: using the verse details it carries, no lookups are made.');
        }
        enrich = false;
    } else {
        const sheet = await readSpreadsheet(options.inputPath, detail);
        detail(`Columns: ${sheet.headers.join(', ')}`);
        const normalized = normalizeRows(sheet.rows, undefined, detail);
        records = { vocabulary: normalized.vocabulary, exercises: normalized.exercises };
        diagnostics.skippedRows = normalized.diagnostics;
    }
    core.info(`Found ${records.vocabulary.length} vocabulary entries and ${records.exercises.length} exercises.`);
    core.endGroup();

    let versesFetched = 0;
    if (enrich) {
        core.startGroup('Fetching verse details');
        const result = await enrichStage(records, translators, options, diagnostics, detail);
        if (result) {
            details = result.details;
            versesFetched = result.details.size;
            diagnostics.failedLookups = result.failures;
        }
        core.endGroup();
    } else if (!fromJson) {
        detail('Enrichment disabled, exercises are rendered without verse text.');
    }

    let jsonPath: string | null = null;
    if (!fromJson) {
        jsonPath = options.jsonOutputPath ?? defaultJsonPath(options.outputPath);
        await writeIntermediate(jsonPath, records, details);
        detail(`Saved JSON to ${jsonPath}`);
    }

    const document = assembleDocument(records, details, translators);
    const generator = new LatexGenerator({
        templatePath: options.templatePath,
        title: options.title,
        glossary: options.glossary,
    });
    await generator.generate(document, options.outputPath);
    core.info(`LaTeX file written to ${options.outputPath}`);

    for (const line of summarize(records, versesFetched, diagnostics)) {
        core.info(line);
    }

    return { document, texPath: options.outputPath, jsonPath, versesFetched, diagnostics };
}

async function enrichStage(
    records: NormalizedRecords,
    translators: string[],
    options: PipelineOptions,
    diagnostics: Diagnostics,
    detail: LogFn
): Promise<EnrichmentResult | null> {
    const references = resolveVerseReferences(records.exercises, true);
    if (references.length === 0) {
        core.info('No exercise cites a verse, nothing to look up.');
        return null;
    }

    let config: VerseApiConfig;
    try {
        const settings = options.apiSettings ?? (options.env ? readApiSettings(options.env) : undefined);
        if (!settings) {
            throw new ConfigurationError('enrichment disabled: no API configuration was provided');
        }
        config = resolveApiConfig(settings);
    } catch (error) {
        if (!(error instanceof ConfigurationError)) {
            throw error;
        }
        core.warning(error.message);
        diagnostics.configurationErrors.push(error);
        return null;
    }

    const client = options.createClient
        ? options.createClient(config, translators)
        : new VerseApiClient({ ...config, translators, fetch: options.fetch, log: detail });

    core.info(`Looking up ${references.length} distinct verse(s)...`);
    return enrichReferences(references, client, detail);
}

export function summarize(records: NormalizedRecords, versesFetched: number, diagnostics: Diagnostics): string[] {
    const lines = [
        `Summary: ${records.vocabulary.length} vocabulary, ${records.exercises.length} exercises, ${versesFetched} verse(s) fetched.`,
    ];
    if (diagnostics.skippedRows.length > 0) {
        lines.push(`Skipped ${diagnostics.skippedRows.length} row(s):`);
        lines.push(...diagnostics.skippedRows.map(e => `  ${e.message}`));
    }
    if (diagnostics.failedLookups.length > 0) {
        lines.push(`Rendered without verse text after ${diagnostics.failedLookups.length} failed lookup(s):`);
        lines.push(...diagnostics.failedLookups.map(e => `  ${e.message}`));
    }
    for (const error of diagnostics.configurationErrors) {
        lines.push(`Configuration: ${error.message}`);
    }
    return lines;
}
