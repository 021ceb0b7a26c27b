import * as core from '@actions/core';
import { config } from 'dotenv';
import { compilePdf } from './compiler';
import { runPipeline } from './pipeline';

function booleanInput(name: string, defaultValue: boolean): boolean {
    return core.getInput(name) === '' ? defaultValue : core.getBooleanInput(name);
}

function listInput(name: string): string[] | undefined {
    const items = core.getInput(name).split(',').map(s => s.trim()).filter(Boolean);
    return items.length > 0 ? items : undefined;
}

export async function run(): Promise<void> {
    try {
        config();

        const inputPath = core.getInput('input-path', { required: true });
        const outputPath = core.getInput('output-path') || 'arabic-textbook.tex';
        const enrich = booleanInput('enrich', true);

        const result = await runPipeline({
            inputPath,
            outputPath,
            enrich,
            translators: listInput('translations'),
            verbose: booleanInput('verbose', false),
            glossary: booleanInput('glossary', true),
            title: core.getInput('title') || undefined,
            templatePath: core.getInput('template-path') || undefined,
            jsonOutputPath: core.getInput('json-output-path') || undefined,
            env: process.env,
        });

        core.setOutput('tex-path', result.texPath);
        core.setOutput('json-path', result.jsonPath ?? '');
        core.setOutput('skipped-rows', result.diagnostics.skippedRows.length);
        core.setOutput('failed-lookups', result.diagnostics.failedLookups.length);

        if (booleanInput('compile-pdf', false)) {
            core.startGroup('Building PDF');
            const pdfPath = await compilePdf(result.texPath);
            core.setOutput('pdf-path', pdfPath);
            core.info(`PDF written to ${pdfPath}`);
            core.endGroup();
        }

        core.info('Done!');
    } catch (error) {
        core.setFailed(error instanceof Error ? error.message : String(error));
    }
}

if (require.main === module) {
    void run();
}
