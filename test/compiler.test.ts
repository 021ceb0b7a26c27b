import * as path from 'path';
import * as exec from '@actions/exec';
import * as io from '@actions/io';
import { compilePdf } from '../src/compiler';
import { CompileError, ConfigurationError } from '../src/errors';

jest.mock('@actions/exec');
jest.mock('@actions/io');

describe('compilePdf', () => {
    const texPath = path.join('out', 'book.tex');
    const absolute = path.resolve(texPath);

    beforeEach(() => {
        jest.mocked(exec.exec).mockReset();
        jest.mocked(io.which).mockReset();
    });

    it('should run xelatex twice and return the PDF path', async () => {
        jest.mocked(io.which).mockResolvedValue('/usr/bin/xelatex');
        jest.mocked(exec.exec).mockResolvedValue(0);

        const pdfPath = await compilePdf(texPath);

        expect(pdfPath).toBe(path.join(path.dirname(absolute), 'book.pdf'));
        expect(exec.exec).toHaveBeenCalledTimes(2);
        expect(exec.exec).toHaveBeenCalledWith(
            '/usr/bin/xelatex',
            ['-interaction=nonstopmode', '-halt-on-error', `-output-directory=${path.dirname(absolute)}`, absolute],
            { ignoreReturnCode: true, silent: true }
        );
    });

    it('should fail when xelatex is not installed', async () => {
        jest.mocked(io.which).mockResolvedValue('');

        await expect(compilePdf(texPath)).rejects.toBeInstanceOf(ConfigurationError);
        expect(exec.exec).not.toHaveBeenCalled();
    });

    it('should stop at the first failing pass', async () => {
        jest.mocked(io.which).mockResolvedValue('/usr/bin/xelatex');
        jest.mocked(exec.exec).mockResolvedValueOnce(0).mockResolvedValueOnce(1);

        const compile = compilePdf(texPath);

        await expect(compile).rejects.toBeInstanceOf(CompileError);
        await expect(compile).rejects.toThrow(`xelatex exited with code 1 on pass 2. See ${path.join(path.dirname(absolute), 'book.log')}.`);
    });
});
