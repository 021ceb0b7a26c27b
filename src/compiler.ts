import * as path from 'path';
import * as core from '@actions/core';
import * as exec from '@actions/exec';
import * as io from '@actions/io';
import { CompileError, ConfigurationError } from './errors';

export const TEX_ENGINE = 'xelatex';

/**
 * Builds a PDF next to the .tex file. Runs the engine twice so the table of
 * contents picks up page numbers.
 */
export async function compilePdf(texPath: string, passes = 2): Promise<string> {
    const engine = await io.which(TEX_ENGINE, false);
    if (!engine) {
        throw new ConfigurationError(`${TEX_ENGINE} not found on PATH. Install TeX Live (with polyglossia) to build the PDF.`);
    }

    const absolute = path.resolve(texPath);
    const outputDir = path.dirname(absolute);
    const args = ['-interaction=nonstopmode', '-halt-on-error', `-output-directory=${outputDir}`, absolute];

    for (let pass = 1; pass <= passes; pass++) {
        core.info(`${TEX_ENGINE} pass ${pass}/${passes}: ${absolute}`);
        const exitCode = await exec.exec(engine, args, { ignoreReturnCode: true, silent: !core.isDebug() });
        if (exitCode !== 0) {
            throw new CompileError(`${TEX_ENGINE} exited with code ${exitCode} on pass ${pass}. See ${absolute.replace(/\.tex$/i, '.log')}.`);
        }
    }

    return absolute.replace(/\.tex$/i, '') + '.pdf';
}
